/**
 * Ordered list of directories searched for defaults files.
 * Earlier entries take precedence over later ones.
 */
export type SearchContext = Readonly<{
  paths: readonly string[]
}>
