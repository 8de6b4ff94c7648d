/**
 * Synchronous file access used by the configuration engine.
 *
 * Paths handed to the port are absolute; callers resolve them against `cwd()`.
 */
export interface ConfigFileSystem {
  cwd(): string
  exists(filePath: string): boolean
  readText(filePath: string): string
  writeText(filePath: string, contents: string): void
}
