import path from "node:path"
import type { DocumentFormat } from "../../ports/document-format"
import { ConfigError } from "../errors/config-error"

export function formatForPath(filePath: string, formats: readonly DocumentFormat[]): DocumentFormat {
  const extension = path.extname(filePath).slice(1).toLowerCase()
  const format = formats.find((candidate) => candidate.extensions.includes(extension))

  if (!format) throw ConfigError.unsupportedDocumentKind(filePath)

  return format
}

export function formatByName(name: string, formats: readonly DocumentFormat[]): DocumentFormat {
  const format = formats.find((candidate) => candidate.name === name)

  if (!format) {
    throw ConfigError.invalidArgument(`Unknown document format ${JSON.stringify(name)}`, {
      format: name,
      available: formats.map((candidate) => candidate.name),
    })
  }

  return format
}
