import type { KeyExpression } from "./key-path"

/**
 * Describes a component's slice of a configuration tree and the defaults
 * that apply to it.
 */
export type SubsetDescriptor = Readonly<{
  /** Human readable name, used in logs and errors. */
  kind: string

  /** Top-level key under which this subset lives in a combined document. */
  component?: string | null

  /** Defaults file name, looked up on every search path. */
  defaultConfigFile?: string | null

  /** Key whose value names the registered type of the subset. Defaults to `cls`. */
  discriminatorKey?: string

  requiredKeys?: readonly KeyExpression[]
}>

/**
 * A registered type that a subset may name through its discriminator key.
 */
export type TypeDescriptor = Readonly<{
  defaultConfigFile?: string | null

  /**
   * Key holding a sequence of child subsets. Each child is composed with
   * the same descriptor and written back in place.
   */
  containerKey?: string | null
}>
