import type { ConfigMapping } from "../../ports/document"
import type { DocumentFormat } from "../../ports/document-format"

/**
 * Plain JSON documents. JSON has no include syntax; use `includeConfigs`.
 */
export class JsonDocumentFormat implements DocumentFormat {
  readonly name = "json"
  readonly extensions = ["json"] as const

  parse(text: string): unknown {
    return JSON.parse(text)
  }

  stringify(value: ConfigMapping): string {
    return `${JSON.stringify(value, null, 2)}\n`
  }
}
