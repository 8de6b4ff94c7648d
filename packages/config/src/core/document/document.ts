import { isDeepStrictEqual } from "node:util"
import { z } from "zod"
import type { ConfigMapping, ConfigValue } from "../../ports/document"
import type { Segment } from "../../ports/key-path"
import { ConfigError } from "../errors/config-error"

const configValueSchema: z.ZodType<ConfigValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(configValueSchema),
    z.record(z.string(), configValueSchema),
  ]),
)

const documentSchema = z.record(z.string(), configValueSchema)

const INTEGER = /^\s*[+-]?\d+\s*$/

/** Assigning this key replaces an object's prototype instead of adding an entry. */
export const RESERVED_KEY = "__proto__"

export function isMapping(value: ConfigValue | undefined): value is ConfigMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function cloneValue<T extends ConfigValue>(value: T): T {
  return structuredClone(value)
}

export function valuesEqual(a: ConfigValue, b: ConfigValue): boolean {
  return isDeepStrictEqual(a, b)
}

export function describeType(value: ConfigValue | undefined): string {
  if (value === undefined) return "undefined"
  if (value === null) return "null"
  if (Array.isArray(value)) return "sequence"
  if (isMapping(value)) return "mapping"

  return typeof value
}

/**
 * Reads a segment as a sequence index. Returns null for non-integer segments.
 */
export function parseIndex(segment: Segment): number | null {
  if (typeof segment === "number") {
    return Number.isFinite(segment) ? Math.trunc(segment) : null
  }

  return INTEGER.test(segment) ? Number.parseInt(segment, 10) : null
}

/**
 * Resolves an index against a sequence length, counting negative indices
 * from the end. Returns null when out of range.
 */
export function resolveIndex(index: number, length: number): number | null {
  const resolved = index < 0 ? index + length : index

  return resolved >= 0 && resolved < length ? resolved : null
}

/**
 * Key path of the first mapping key named `__proto__` in `value`, or null.
 */
export function findReservedKey(value: unknown, keyPath: readonly Segment[] = []): Segment[] | null {
  if (typeof value !== "object" || value === null) return null

  const children: [Segment, unknown][] = Array.isArray(value)
    ? value.map((child: unknown, index) => [index, child])
    : Object.entries(value)

  for (const [segment, child] of children) {
    if (segment === RESERVED_KEY) return [...keyPath, segment]

    const found = findReservedKey(child, [...keyPath, segment])
    if (found !== null) return found
  }

  return null
}

/**
 * Validates a raw parsed document. An empty document is an empty mapping.
 */
export function toDocument(raw: unknown, source: string): ConfigMapping {
  if (raw === null || raw === undefined) return {}

  const reserved = findReservedKey(raw)
  if (reserved !== null) {
    throw ConfigError.invalidDocument(source, `Reserved key at ${JSON.stringify(reserved)}`)
  }

  const result = documentSchema.safeParse(raw)

  if (!result.success) {
    throw ConfigError.invalidDocument(source, z.prettifyError(result.error), result.error)
  }

  return result.data
}
