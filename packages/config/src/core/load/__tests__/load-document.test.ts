import { createNullLogger } from "@strata/logger"
import { JsonDocumentFormat } from "../../../adapters/json/json-format"
import { MemoryFileSystem } from "../../../adapters/memory/memory-file-system"
import { YamlDocumentFormat } from "../../../adapters/yaml/yaml-format"
import { catchError } from "../../__tests__/catch-error"
import { formatByName, formatForPath } from "../formats"
import { loadDocument } from "../load-document"

const formats = [new YamlDocumentFormat(), new JsonDocumentFormat()]

describe("formatForPath", () => {
  it("matches extensions case-insensitively", () => {
    expect(formatForPath("/a/b.YML", formats).name).toBe("yaml")
    expect(formatForPath("/a/b.json", formats).name).toBe("json")
  })

  it("rejects other extensions", () => {
    expect(catchError(() => formatForPath("/a/b.ini", formats))).toMatchObject({
      code: "unsupported_document_kind",
      context: { file: "/a/b.ini" },
    })
  })
})

describe("formatByName", () => {
  it("lists the available formats when the name is unknown", () => {
    expect(catchError(() => formatByName("toml", formats))).toMatchObject({
      code: "invalid_argument",
      context: { format: "toml", available: ["yaml", "json"] },
    })
  })
})

describe("loadDocument", () => {
  function deps(files: Record<string, string>) {
    return { fileSystem: new MemoryFileSystem(files), formats, logger: createNullLogger() }
  }

  it("leaves includeConfigs directives in place", () => {
    const document = loadDocument("/conf/a.yaml", deps({ "/conf/a.yaml": "includeConfigs: [b.yaml]\n" }))

    expect(document).toEqual({ includeConfigs: ["b.yaml"] })
  })

  it("resolves !include tags against the including file", () => {
    const document = loadDocument(
      "/conf/a.yaml",
      deps({ "/conf/a.yaml": "b: !include sub/b.json\n", "/conf/sub/b.json": '{"x": 1}' }),
    )

    expect(document).toEqual({ b: { x: 1 } })
  })

  it("wraps parse failures as invalid_document", () => {
    const err = catchError(() => loadDocument("/conf/a.json", deps({ "/conf/a.json": "{" })))

    expect(err).toMatchObject({ code: "invalid_document", context: { source: "/conf/a.json" } })
  })
})
