export { NodeFileSystem } from "./adapters/fs/node-file-system"
export { JsonDocumentFormat } from "./adapters/json/json-format"
export { MemoryFileSystem } from "./adapters/memory/memory-file-system"
export { INCLUDE_TAG, YamlDocumentFormat } from "./adapters/yaml/yaml-format"
export {
  Config,
  type ConfigDeps,
  type ConfigEntry,
  type ConfigInput,
  type DumpOptions,
  defaultDocumentFormats,
  type ResolvedConfigDeps,
  resolveConfigDeps,
} from "./core/config"
export {
  type ComposedSubset,
  type ComposeSubsetOptions,
  composeSubset,
  DEFAULT_DISCRIMINATOR_KEY,
} from "./core/defaults/compose-subset"
export {
  BUILTIN_DEFAULTS_DIR,
  CONFIG_PATH_ENV,
  type CreateSearchContextOptions,
  createSearchContext,
} from "./core/defaults/search-context"
export { TypeRegistry } from "./core/defaults/type-registry"
export { type UpdateParametersOptions, updateParameters } from "./core/defaults/update-parameters"
export {
  ConfigError,
  type ConfigErrorCode,
  type ConfigErrorContext,
  type ConfigErrorOptions,
  isConfigError,
  type SerializedConfigError,
} from "./core/errors/config-error"
export { INCLUDE_KEY, type IncludeResolverDeps, resolveIncludes } from "./core/include/resolve-includes"
export { escapeSegment, isAlphanumeric, splitKey } from "./core/key-path/split-key"
export { loadDocument } from "./core/load/load-document"
export { findMissingKeys, validateRequiredKeys } from "./core/validate/validate-required-keys"
export type { ConfigMapping, ConfigScalar, ConfigValue } from "./ports/document"
export type { DocumentFormat, ParseContext } from "./ports/document-format"
export type { ConfigFileSystem } from "./ports/file-system"
export type { KeyExpression, KeyPath, Segment } from "./ports/key-path"
export type { SearchContext } from "./ports/search-context"
export type { SubsetDescriptor, TypeDescriptor } from "./ports/subset"
