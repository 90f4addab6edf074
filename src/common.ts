/**
 * Sink for progress messages. Defaults to the console.
 */
export interface Logger {
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message)
}

/** Logger that drops every message */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {}
}

/**
 * Resolves a material library referenced by `mtllib` to its source text
 */
export type MaterialLibraryResolver = (name: string) => string

/**
 * Position of a directive in its source file
 */
export interface SourceLocation {
  file: string
  line: number
}
