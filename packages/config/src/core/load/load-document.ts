import path from "node:path"
import type { Logger } from "@strata/logger"
import type { ConfigMapping } from "../../ports/document"
import type { DocumentFormat } from "../../ports/document-format"
import type { ConfigFileSystem } from "../../ports/file-system"
import { toDocument } from "../document/document"
import { ConfigError, isConfigError } from "../errors/config-error"
import { formatForPath } from "./formats"

export type LoadDocumentDeps = Readonly<{
  fileSystem: ConfigFileSystem
  formats: readonly DocumentFormat[]
  logger: Logger
}>

/**
 * Reads, parses and validates a configuration document.
 *
 * Inline includes are resolved relative to the directory of the file that
 * contains them.
 */
export function loadDocument(filePath: string, deps: LoadDocumentDeps): ConfigMapping {
  return toDocument(readDocument(filePath, deps), filePath)
}

function readDocument(filePath: string, deps: LoadDocumentDeps): unknown {
  const format = formatForPath(filePath, deps.formats)

  if (!deps.fileSystem.exists(filePath)) throw ConfigError.fileNotFound(filePath)

  const text = deps.fileSystem.readText(filePath)

  try {
    return format.parse(text, {
      sourcePath: filePath,
      include: (fileName) => {
        const target = path.resolve(path.dirname(filePath), fileName)
        deps.logger.debug("Opening file via inline include", { module: "config", file: target })

        return readDocument(target, deps)
      },
    })
  } catch (err) {
    if (isConfigError(err)) throw err

    const reason = err instanceof Error ? err.message : String(err)
    throw ConfigError.invalidDocument(filePath, reason, err)
  }
}
