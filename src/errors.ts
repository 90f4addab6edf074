import type { SourceLocation } from './common'

export type ConversionErrorKind =
  | 'SourceUnreadable'
  | 'MalformedDirective'
  | 'MissingActiveMaterial'
  | 'AttributeIndexOutOfRange'
  | 'ArtifactUnwritable'
  | 'MalformedArtifact'
  | 'MalformedDescriptor'

/**
 * Base class for every error that aborts a conversion.
 * When a location is known the message is prefixed with `file:line`.
 */
export class ConversionError extends Error {
  constructor(
    public readonly kind: ConversionErrorKind,
    message: string,
    public readonly location?: SourceLocation,
    options?: { cause?: unknown }
  ) {
    super(location ? `${location.file}:${location.line}: ${message}` : message, options)
    this.name = 'ConversionError'
  }
}

export class SourceUnreadableError extends ConversionError {
  constructor(public readonly path: string, cause?: unknown) {
    super('SourceUnreadable', `Cannot open "${path}"`, undefined, { cause })
    this.name = 'SourceUnreadableError'
  }
}

export class MalformedDirectiveError extends ConversionError {
  constructor(message: string, location?: SourceLocation) {
    super('MalformedDirective', message, location)
    this.name = 'MalformedDirectiveError'
  }
}

export class MissingActiveMaterialError extends ConversionError {
  constructor(location?: SourceLocation) {
    super('MissingActiveMaterial', 'Face declared before any material was activated', location)
    this.name = 'MissingActiveMaterialError'
  }
}

export type AttributeKind = 'position' | 'uv' | 'normal'

export class AttributeIndexOutOfRangeError extends ConversionError {
  constructor(
    public readonly attribute: AttributeKind,
    public readonly index: number,
    public readonly count: number,
    location?: SourceLocation
  ) {
    super(
      'AttributeIndexOutOfRange',
      `${attribute} index ${index} out of range (${count} declared)`,
      location
    )
    this.name = 'AttributeIndexOutOfRangeError'
  }
}

export class ArtifactUnwritableError extends ConversionError {
  constructor(public readonly path: string, cause?: unknown) {
    super('ArtifactUnwritable', `Cannot write "${path}"`, undefined, { cause })
    this.name = 'ArtifactUnwritableError'
  }
}

export class MalformedArtifactError extends ConversionError {
  constructor(message: string) {
    super('MalformedArtifact', message)
    this.name = 'MalformedArtifactError'
  }
}

export class MalformedDescriptorError extends ConversionError {
  constructor(public readonly path: string, message: string, cause?: unknown) {
    super('MalformedDescriptor', `Invalid descriptor "${path}": ${message}`, undefined, { cause })
    this.name = 'MalformedDescriptorError'
  }
}
