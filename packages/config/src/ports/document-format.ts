import type { ConfigMapping } from "./document"

export type ParseContext = {
  /** Absolute path of the document being parsed. */
  readonly sourcePath: string

  /**
   * Reads and parses another document, relative to the one being parsed.
   * Returns the raw parsed value.
   */
  readonly include: (fileName: string) => unknown
}

/**
 * A serialization format for configuration documents.
 *
 * Formats only turn text into raw values and back. Validation of the parsed
 * tree happens in the loader.
 */
export interface DocumentFormat {
  readonly name: string

  /** File extensions handled by this format, lower case and without the dot. */
  readonly extensions: readonly string[]

  parse(text: string, context: ParseContext): unknown

  stringify(value: ConfigMapping): string
}
