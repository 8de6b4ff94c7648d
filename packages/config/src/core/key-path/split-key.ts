import type { ConfigMapping } from "../../ports/document"
import type { KeyExpression, Segment } from "../../ports/key-path"
import { ConfigError } from "../errors/config-error"

const ESCAPE_SENTINEL = "\r"
const ALPHANUMERIC = /^[\p{L}\p{N}]+$/u

export function isAlphanumeric(text: string): boolean {
  return ALPHANUMERIC.test(text)
}

export function escapeSegment(segment: Segment, delimiter: string): string {
  return String(segment).replaceAll(delimiter, `\\${delimiter}`)
}

/**
 * Turns a key expression into a key path.
 *
 * A string naming an existing top-level key of `data` is taken as-is.
 * Otherwise a string whose first character is not alphanumeric is split on
 * that character, honouring `\` escapes of it.
 */
export function splitKey(key: KeyExpression, data?: ConfigMapping): Segment[] {
  if (typeof key === "number") return [key]
  if (typeof key !== "string") return [...key]
  if (data !== undefined && Object.hasOwn(data, key)) return [key]

  return splitDelimited(key)
}

function splitDelimited(key: string): string[] {
  const first = key.codePointAt(0)
  if (first === undefined) return [key]

  const delimiter = String.fromCodePoint(first)
  if (isAlphanumeric(delimiter)) return [key]

  const rest = key.slice(delimiter.length)
  const escaped = `\\${delimiter}`

  if (!rest.includes(escaped)) return rest.split(delimiter)

  if (rest.includes(`\\${escaped}`)) {
    throw ConfigError.malformedKeyExpression(key, "escaping an escaped delimiter is not supported")
  }
  if (delimiter === ESCAPE_SENTINEL || rest.includes(ESCAPE_SENTINEL)) {
    throw ConfigError.malformedKeyExpression(
      key,
      "a carriage return cannot appear in a key that escapes its delimiter",
    )
  }

  return rest
    .replaceAll(escaped, ESCAPE_SENTINEL)
    .split(delimiter)
    .map((segment) => segment.replaceAll(ESCAPE_SENTINEL, delimiter))
}
