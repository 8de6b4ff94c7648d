import { ConfigError } from "../../../core/errors/config-error"
import { YamlDocumentFormat } from "../yaml-format"

describe("YamlDocumentFormat behavior", () => {
  const format = new YamlDocumentFormat()
  const documents: Record<string, unknown> = {
    "a.yaml": { a: 1 },
    "b.yaml": ["x", "y"],
  }

  function contextFor(includes: string[] = []) {
    return {
      sourcePath: "/conf/root.yaml",
      include: (fileName: string) => {
        includes.push(fileName)
        return documents[fileName] ?? null
      },
    }
  }

  it("handles yaml and yml files", () => {
    expect(format.name).toBe("yaml")
    expect(format.extensions).toEqual(["yaml", "yml"])
  })

  it("parses plain documents", () => {
    expect(format.parse("a: 1\nb: [true, null]\n", contextFor())).toEqual({ a: 1, b: [true, null] })
  })

  it("replaces a scalar !include with the included document", () => {
    const includes: string[] = []

    expect(format.parse("first: !include a.yaml\n", contextFor(includes))).toEqual({ first: { a: 1 } })
    expect(includes).toEqual(["a.yaml"])
  })

  it("replaces a sequence !include with a list of documents", () => {
    expect(format.parse("both: !include [a.yaml, b.yaml]\n", contextFor())).toEqual({
      both: [{ a: 1 }, ["x", "y"]],
    })
  })

  it("replaces a mapping !include key by key", () => {
    expect(format.parse("named: !include\n  one: a.yaml\n  two: b.yaml\n", contextFor())).toEqual({
      named: { one: { a: 1 }, two: ["x", "y"] },
    })
  })

  it("surfaces the include callback's error unchanged", () => {
    const failure = ConfigError.fileNotFound("/conf/gone.yaml")
    const context = {
      sourcePath: "/conf/root.yaml",
      include: () => {
        throw failure
      },
    }

    expect(() => format.parse("x: !include gone.yaml\n", context)).toThrow(failure)
  })

  it("stringifies mappings as block YAML", () => {
    expect(format.stringify({ a: { b: [1, 2] } })).toBe("a:\n  b:\n    - 1\n    - 2\n")
  })
})
