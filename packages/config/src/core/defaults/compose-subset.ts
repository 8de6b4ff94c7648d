import path from "node:path"
import type { Logger } from "@strata/logger"
import type { ConfigMapping } from "../../ports/document"
import type { SearchContext } from "../../ports/search-context"
import type { SubsetDescriptor } from "../../ports/subset"
import { Config, type ConfigDeps, type ConfigInput, type ResolvedConfigDeps, resolveConfigDeps } from "../config"
import { isMapping } from "../document/document"
import { ConfigError } from "../errors/config-error"
import { validateRequiredKeys } from "../validate/validate-required-keys"
import { createSearchContext } from "./search-context"
import { TypeRegistry } from "./type-registry"

export const DEFAULT_DISCRIMINATOR_KEY = "cls"

export type ComposeSubsetOptions = ConfigDeps & {
  /** Check required keys after composing. Default: true */
  validate?: boolean
  /** Layer defaults files under the input. Default: true */
  mergeDefaults?: boolean
  /** Where defaults files are looked up. Default: `createSearchContext()` */
  searchContext?: SearchContext
  registry?: TypeRegistry
}

export type ComposedSubset = Readonly<{
  config: Config
  /** Defaults files read, in the order they were applied. */
  filesRead: readonly string[]
}>

type ComposeContext = Readonly<{
  validate: boolean
  mergeDefaults: boolean
  searchContext: SearchContext
  registry: TypeRegistry
  deps: ResolvedConfigDeps
}>

/**
 * Builds a component's effective configuration.
 *
 * Layers, lowest precedence first:
 * 1. the descriptor's defaults file, from each search path in reverse order
 * 2. the defaults file of the type named by the discriminator key
 * 3. the component's section of `input`
 *
 * Children listed under the type's container key are composed the same way
 * and written back in place.
 */
export function composeSubset(
  input: ConfigInput,
  descriptor: SubsetDescriptor,
  options: ComposeSubsetOptions = {},
): ComposedSubset {
  return compose(input, descriptor, {
    validate: options.validate ?? true,
    mergeDefaults: options.mergeDefaults ?? true,
    searchContext: options.searchContext ?? createSearchContext(),
    registry: options.registry ?? new TypeRegistry(),
    deps: resolveConfigDeps(options),
  })
}

function compose(input: ConfigInput, descriptor: SubsetDescriptor, ctx: ComposeContext): ComposedSubset {
  const logger = ctx.deps.logger
  const external = selectComponent(new Config(input, ctx.deps), descriptor, logger)
  const composed = new Config(undefined, ctx.deps)
  const filesRead: string[] = []

  const applyDefaults = (configFile: string) => {
    for (const file of locateDefaults(configFile, ctx)) {
      logger.debug("Reading defaults file", { module: "defaults", kind: descriptor.kind, file })
      filesRead.push(file)

      const defaults = compose(file, descriptor, { ...ctx, validate: false, mergeDefaults: false })
      composed.update(defaults.config)
    }
  }

  let containerKey: string | undefined

  if (ctx.mergeDefaults) {
    if (descriptor.defaultConfigFile) applyDefaults(descriptor.defaultConfigFile)

    const typeName = readDiscriminator(descriptor, external, composed)
    if (typeName !== undefined) {
      const type = ctx.registry.lookup(typeName, descriptor.kind)

      if (type.defaultConfigFile) applyDefaults(type.defaultConfigFile)
      containerKey = type.containerKey ?? undefined
    }
  }

  composed.update(external)

  if (containerKey !== undefined && composed.has([containerKey])) {
    expandChildren(composed, containerKey, descriptor, ctx)
  }

  if (ctx.validate) validateRequiredKeys(composed, descriptor)

  return { config: composed, filesRead }
}

/**
 * Picks the component's section out of a combined document. A section
 * nested under its own name (`datastore: { datastore: ... }`) is unwrapped.
 */
function selectComponent(external: Config, descriptor: SubsetDescriptor, logger: Logger): Config {
  const component = descriptor.component
  if (!component) return external

  const meta = { module: "defaults", kind: descriptor.kind, component }

  if (external.has([component, component])) {
    logger.debug("Selecting doubled component path", meta)
    return external.getMapping([component, component])
  }

  if (external.has([component])) {
    logger.debug("Selecting component", meta)
    return external.getMapping([component])
  }

  return external
}

/**
 * Defaults file candidates, lowest precedence first.
 */
function locateDefaults(configFile: string, ctx: ComposeContext): string[] {
  const fileSystem = ctx.deps.fileSystem

  if (path.isAbsolute(configFile)) return fileSystem.exists(configFile) ? [configFile] : []

  return [...ctx.searchContext.paths]
    .reverse()
    .map((directory) => path.resolve(fileSystem.cwd(), directory, configFile))
    .filter((candidate) => fileSystem.exists(candidate))
}

function readDiscriminator(
  descriptor: SubsetDescriptor,
  external: Config,
  composed: Config,
): string | undefined {
  const key = [descriptor.discriminatorKey ?? DEFAULT_DISCRIMINATOR_KEY]
  const source = external.has(key) ? external : composed.has(key) ? composed : undefined
  if (!source) return undefined

  const value = source.get(key)
  if (typeof value !== "string") {
    throw ConfigError.invalidDocument(descriptor.kind, `${key[0]} must name a registered type`)
  }

  return value
}

function expandChildren(
  composed: Config,
  containerKey: string,
  descriptor: SubsetDescriptor,
  ctx: ComposeContext,
): void {
  const children = composed.get([containerKey])
  if (!Array.isArray(children)) {
    throw ConfigError.invalidDocument(descriptor.kind, `${containerKey} must be a sequence`)
  }

  children.forEach((child, index) => {
    const input: string | ConfigMapping | undefined =
      typeof child === "string" || isMapping(child) ? child : undefined

    if (input === undefined) {
      throw ConfigError.invalidDocument(
        descriptor.kind,
        `${containerKey} entries must be mappings or file names`,
      )
    }

    ctx.deps.logger.debug("Composing child", {
      module: "defaults",
      kind: descriptor.kind,
      keyPath: `${containerKey}[${index}]`,
    })
    composed.set([containerKey, index], compose(input, descriptor, ctx).config)
  })
}
