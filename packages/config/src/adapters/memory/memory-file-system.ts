import path from "node:path"
import type { ConfigFileSystem } from "../../ports/file-system"

/**
 * In-memory file system for tests and embedded documents.
 *
 * Relative paths resolve against the configured working directory.
 * A directory exists when some file lives beneath it.
 */
export class MemoryFileSystem implements ConfigFileSystem {
  private readonly files = new Map<string, string>()

  constructor(
    files: Readonly<Record<string, string>> = {},
    private readonly workingDirectory = "/",
  ) {
    for (const [filePath, contents] of Object.entries(files)) {
      this.writeText(filePath, contents)
    }
  }

  cwd(): string {
    return this.workingDirectory
  }

  exists(filePath: string): boolean {
    const resolved = this.resolve(filePath)
    if (this.files.has(resolved)) return true

    const prefix = resolved.endsWith(path.sep) ? resolved : `${resolved}${path.sep}`
    for (const candidate of this.files.keys()) {
      if (candidate.startsWith(prefix)) return true
    }

    return false
  }

  readText(filePath: string): string {
    const contents = this.files.get(this.resolve(filePath))
    if (contents === undefined) {
      throw new Error(`ENOENT: no such file, open '${filePath}'`)
    }

    return contents
  }

  writeText(filePath: string, contents: string): void {
    this.files.set(this.resolve(filePath), contents)
  }

  private resolve(filePath: string): string {
    return path.resolve(this.workingDirectory, filePath)
  }
}
