import type { ConfigValue } from "../../ports/document"
import type { KeyExpression } from "../../ports/key-path"
import type { SubsetDescriptor } from "../../ports/subset"
import type { Config } from "../config"
import { ConfigError, describeKey } from "../errors/config-error"
import { composeSubset } from "./compose-subset"

export type UpdateParametersOptions = {
  /** Values assigned into the subset, keyed by key expression. */
  toUpdate?: Readonly<Record<string, ConfigValue | Config>>
  /** Keys copied from the subset of `full`. */
  toCopy?: readonly KeyExpression[]
  /** Replace keys the subset already has. Default: true */
  overwrite?: boolean
}

/**
 * Edits a component's subset of `config` in place, assigning `toUpdate`
 * values and copying `toCopy` keys over from the same subset of `full`.
 */
export function updateParameters(
  descriptor: SubsetDescriptor,
  config: Config,
  full: Config,
  options: UpdateParametersOptions,
): void {
  const { toUpdate, toCopy, overwrite = true } = options
  if (toUpdate === undefined && toCopy === undefined) {
    throw ConfigError.invalidArgument("One of toUpdate or toCopy must be given", {
      kind: descriptor.kind,
    })
  }

  const logger = config.deps.logger
  const component = descriptor.component

  if (component && full.has([component]) && !config.has([component])) {
    config.set([component], {})
  }

  const subsetOptions = { ...config.deps, mergeDefaults: false, validate: false }
  const local = composeSubset(config, descriptor, subsetOptions).config

  const assign = (key: KeyExpression, read: () => ConfigValue | Config) => {
    if (!overwrite && local.has(key)) {
      logger.debug("Keeping existing value", {
        module: "defaults",
        kind: descriptor.kind,
        keyPath: describeKey(key),
      })
      return
    }

    local.set(key, read())
  }

  for (const [key, value] of Object.entries(toUpdate ?? {})) {
    assign(key, () => value)
  }

  if (toCopy !== undefined) {
    const source = composeSubset(full, descriptor, subsetOptions).config

    for (const key of toCopy) {
      assign(key, () => source.get(key))
    }
  }

  if (component && config.has([component])) {
    config.set([component], local)
  } else {
    config.update(local)
  }
}
