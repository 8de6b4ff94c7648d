/**
 * One step of a key path: a mapping key or a sequence index.
 */
export type Segment = string | number

export type KeyPath = readonly Segment[]

/**
 * Anything that addresses a node in a configuration tree.
 *
 * - a plain key (`"logLevel"`)
 * - a delimited expression whose first character is the delimiter (`".a.b.0"`)
 * - an integer, addressing a sequence element
 * - an explicit key path (`["a", "b", 0]`)
 */
export type KeyExpression = string | number | KeyPath
