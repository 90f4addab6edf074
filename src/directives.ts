import type { SourceLocation } from './common'
import { MalformedDirectiveError } from './errors'

/**
 * One line of an OBJ or MTL file, split into its command and the rest
 */
export interface Directive {
  command: string
  rest: string
  location: SourceLocation
}

/**
 * Split a line-oriented source into directives.
 * Blank lines and lines starting with `#` are skipped.
 *
 * @param source File contents
 * @param file Name used in error locations
 */
export function parseDirectives(source: string, file: string): Directive[] {
  const directives: Directive[] = []
  const lines = source.split(/\r?\n/)

  lines.forEach((raw, i) => {
    const line = raw.trim()
    if (!line || line.startsWith('#')) return

    const match = /^(\S+)\s*([\s\S]*)$/.exec(line)
    if (!match) {
      throw new MalformedDirectiveError(`Cannot read line "${line}"`, { file, line: i + 1 })
    }

    directives.push({
      command: match[1],
      rest: match[2],
      location: { file, line: i + 1 }
    })
  })

  return directives
}

/**
 * Parse exactly `count` whitespace-separated floats from a directive
 */
export function parseFloats(directive: Directive, count: number): number[] {
  const fields = directive.rest.split(/\s+/).filter(Boolean)
  if (fields.length < count) {
    throw new MalformedDirectiveError(
      `"${directive.command}" expects ${count} numbers, got ${fields.length}`,
      directive.location
    )
  }

  // Extra fields (vertex weights, w coordinates) are ignored
  return fields.slice(0, count).map((field) => {
    const value = Number(field)
    if (!Number.isFinite(value)) {
      throw new MalformedDirectiveError(
        `"${field}" is not a number in "${directive.command}"`,
        directive.location
      )
    }
    return value
  })
}

/**
 * A face corner as written in the file: 1-based position/uv/normal indices
 */
export type CornerReference = [position: number, uv: number, normal: number]

/**
 * Parse the corners of an `f` directive. Every corner must be a full `v/vt/vn` triple.
 */
export function parseFaceCorners(directive: Directive): CornerReference[] {
  const fields = directive.rest.split(/\s+/).filter(Boolean)
  if (fields.length < 3) {
    throw new MalformedDirectiveError(
      `Face needs at least 3 corners, got ${fields.length}`,
      directive.location
    )
  }

  return fields.map((field): CornerReference => {
    const parts = field.split('/')
    if (parts.length !== 3 || parts.some((part) => !/^[+-]?\d+$/.test(part))) {
      throw new MalformedDirectiveError(
        `Face corner "${field}" is not a position/uv/normal index triple`,
        directive.location
      )
    }
    const [position, uv, normal] = parts.map((part) => parseInt(part, 10))
    return [position, uv, normal]
  })
}
