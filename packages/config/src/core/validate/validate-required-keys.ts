import type { KeyExpression } from "../../ports/key-path"
import type { SubsetDescriptor } from "../../ports/subset"
import type { Config } from "../config"
import { ConfigError } from "../errors/config-error"

export function findMissingKeys(config: Config, requiredKeys: readonly KeyExpression[]): KeyExpression[] {
  return requiredKeys.filter((key) => !config.has(key))
}

export function validateRequiredKeys(config: Config, descriptor: SubsetDescriptor): void {
  const missing = findMissingKeys(config, descriptor.requiredKeys ?? [])

  if (missing.length > 0) throw ConfigError.missingRequiredKeys(descriptor.kind, missing)
}
