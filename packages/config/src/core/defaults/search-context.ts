import path from "node:path"
import { fileURLToPath } from "node:url"
import type { SearchContext } from "../../ports/search-context"

export const CONFIG_PATH_ENV = "STRATA_CONFIG_PATH"

/** Defaults shipped with this package. Always searched last. */
export const BUILTIN_DEFAULTS_DIR = fileURLToPath(new URL("../../../defaults", import.meta.url))

export type CreateSearchContextOptions = {
  /** Searched before anything from the environment. */
  searchPaths?: readonly string[]
  env?: Record<string, string | undefined>
  builtinDir?: string
}

/**
 * Resolves the defaults search path once. The environment variable holds a
 * list separated by the platform path delimiter; empty entries are skipped.
 */
export function createSearchContext(options: CreateSearchContextOptions = {}): SearchContext {
  const env = options.env ?? process.env
  const fromEnv = (env[CONFIG_PATH_ENV] ?? "").split(path.delimiter).filter((entry) => entry.length > 0)

  return Object.freeze({
    paths: Object.freeze([
      ...(options.searchPaths ?? []),
      ...fromEnv,
      options.builtinDir ?? BUILTIN_DEFAULTS_DIR,
    ]),
  })
}
