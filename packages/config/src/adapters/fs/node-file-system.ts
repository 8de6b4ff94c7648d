import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs"
import path from "node:path"
import type { ConfigFileSystem } from "../../ports/file-system"

export class NodeFileSystem implements ConfigFileSystem {
  cwd(): string {
    return process.cwd()
  }

  exists(filePath: string): boolean {
    return existsSync(filePath)
  }

  readText(filePath: string): string {
    return readFileSync(filePath, "utf-8")
  }

  writeText(filePath: string, contents: string): void {
    mkdirSync(path.dirname(filePath), { recursive: true })
    writeFileSync(filePath, contents, "utf-8")
  }
}
