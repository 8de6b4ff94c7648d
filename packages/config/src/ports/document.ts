export type ConfigScalar = string | number | boolean | null

/**
 * Any value a configuration document may hold.
 *
 * Documents are trees: mappings keyed by string, sequences, and scalar leaves.
 */
export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigMapping

export interface ConfigMapping {
  [key: string]: ConfigValue
}
