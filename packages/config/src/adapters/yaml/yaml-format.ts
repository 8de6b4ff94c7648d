import { type CollectionTag, isMap, isSeq, parse, type ScalarTag, stringify } from "yaml"
import { z } from "zod"
import type { ConfigMapping } from "../../ports/document"
import type { DocumentFormat, ParseContext } from "../../ports/document-format"

export const INCLUDE_TAG = "!include"

const includeSequenceSchema = z.array(z.string())
const includeMappingSchema = z.record(z.string(), z.string())

type IncludeFn = (fileName: string) => unknown

/**
 * The `!include` tag in its three shapes:
 *
 *     single: !include other.yaml
 *     list: !include [a.yaml, b.yaml]
 *     named: !include { first: a.yaml, second: b.yaml }
 */
function includeTags(include: IncludeFn): Array<ScalarTag | CollectionTag> {
  const single: ScalarTag = {
    tag: INCLUDE_TAG,
    resolve: (value) => include(value),
  }

  const list: CollectionTag = {
    tag: INCLUDE_TAG,
    collection: "seq",
    resolve: (value, onError) => {
      const fileNames = includeSequenceSchema.safeParse(isSeq(value) ? value.toJSON() : undefined)
      if (!fileNames.success) {
        onError(`${INCLUDE_TAG} sequences must list file names`)
        return null
      }

      return fileNames.data.map((fileName) => include(fileName))
    },
  }

  const named: CollectionTag = {
    tag: INCLUDE_TAG,
    collection: "map",
    resolve: (value, onError) => {
      const fileNames = includeMappingSchema.safeParse(isMap(value) ? value.toJSON() : undefined)
      if (!fileNames.success) {
        onError(`${INCLUDE_TAG} mappings must map names to file names`)
        return null
      }

      return Object.fromEntries(
        Object.entries(fileNames.data).map(([name, fileName]) => [name, include(fileName)]),
      )
    },
  }

  return [single, list, named]
}

export class YamlDocumentFormat implements DocumentFormat {
  readonly name = "yaml"
  readonly extensions = ["yaml", "yml"] as const

  parse(text: string, context: ParseContext): unknown {
    // The parser turns tag failures into its own errors; rethrow the callback's error instead.
    let failure: { error: unknown } | undefined

    const include = (fileName: string): unknown => {
      if (failure) return null

      try {
        return context.include(fileName)
      } catch (error) {
        failure = { error }
        return null
      }
    }

    let parsed: unknown
    try {
      parsed = parse(text, { customTags: includeTags(include) })
    } catch (err) {
      if (failure) throw failure.error
      throw err
    }

    if (failure) throw failure.error

    return parsed
  }

  stringify(value: ConfigMapping): string {
    return stringify(value)
  }
}
