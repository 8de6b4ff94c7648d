import path from "node:path"
import type { Logger } from "@strata/logger"
import { z } from "zod"
import type { ConfigMapping } from "../../ports/document"
import type { ConfigFileSystem } from "../../ports/file-system"
import type { Config } from "../config"
import { ConfigError, describeKey } from "../errors/config-error"
import { escapeSegment } from "../key-path/split-key"

export const INCLUDE_KEY = "includeConfigs"

const includeListSchema = z.union([z.string(), z.array(z.string())])

export type IncludeResolverDeps = Readonly<{
  fileSystem: ConfigFileSystem
  logger: Logger
  /** Builds a config from a file path, or an empty one. */
  createConfig: (input?: string | ConfigMapping) => Config
}>

/**
 * Replaces every `includeConfigs` directive in `config` with the merged
 * contents of the files it names.
 *
 * Later files win over earlier ones and the including mapping wins over all
 * of them. Relative names are searched in the working directory first, then
 * in the directory of the including file.
 */
export function resolveIncludes(config: Config, deps: IncludeResolverDeps): void {
  const searchPaths = [deps.fileSystem.cwd()]
  if (config.configFile !== null) {
    searchPaths.push(path.dirname(path.resolve(deps.fileSystem.cwd(), config.configFile)))
  }

  for (const keyPath of config.nameTuples()) {
    if (keyPath.at(-1) !== INCLUDE_KEY || !config.has(keyPath)) continue

    const basePath = keyPath.slice(0, -1)
    const delimiter = config.delimiter
    deps.logger.debug("Processing file include directive", {
      module: "include",
      keyPath: delimiter + keyPath.map((segment) => escapeSegment(segment, delimiter)).join(delimiter),
    })

    const fileNames = readIncludeList(config.get(keyPath), keyPath)
    config.delete(keyPath)

    const included = fileNames.map((fileName) =>
      deps.createConfig(locateInclude(fileName, searchPaths, deps.fileSystem)),
    )

    const [first, ...rest] = included
    const merged = first ?? deps.createConfig()
    for (const next of rest) merged.update(next)

    if (basePath.length === 0) {
      merged.update(config)
      config.clear()
      config.update(merged)
    } else {
      merged.update(config.getMapping(basePath))
      config.set(basePath, merged)
    }
  }
}

function readIncludeList(value: unknown, keyPath: readonly (string | number)[]): string[] {
  const result = includeListSchema.safeParse(value)
  if (!result.success) {
    throw ConfigError.invalidDocument(
      describeKey(keyPath),
      `${INCLUDE_KEY} must be a file name or a list of file names`,
    )
  }

  return typeof result.data === "string" ? [result.data] : result.data
}

function locateInclude(
  fileName: string,
  searchPaths: readonly string[],
  fileSystem: ConfigFileSystem,
): string {
  if (path.isAbsolute(fileName)) {
    if (fileSystem.exists(fileName)) return fileName
    throw ConfigError.unresolvedInclude(fileName, searchPaths)
  }

  for (const directory of searchPaths) {
    const candidate = path.resolve(directory, fileName)
    if (fileSystem.exists(candidate)) return candidate
  }

  throw ConfigError.unresolvedInclude(fileName, searchPaths)
}
