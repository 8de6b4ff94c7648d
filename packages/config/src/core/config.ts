import path from "node:path"
import { createNullLogger, type Logger } from "@strata/logger"
import { JsonDocumentFormat } from "../adapters/json/json-format"
import { NodeFileSystem } from "../adapters/fs/node-file-system"
import { YamlDocumentFormat } from "../adapters/yaml/yaml-format"
import type { ConfigMapping, ConfigScalar, ConfigValue } from "../ports/document"
import type { DocumentFormat } from "../ports/document-format"
import type { ConfigFileSystem } from "../ports/file-system"
import type { KeyExpression, KeyPath, Segment } from "../ports/key-path"
import {
  cloneValue,
  describeType,
  findReservedKey,
  isMapping,
  parseIndex,
  RESERVED_KEY,
  resolveIndex,
  valuesEqual,
} from "./document/document"
import { ConfigError, describeKey } from "./errors/config-error"
import { INCLUDE_KEY, resolveIncludes } from "./include/resolve-includes"
import { escapeSegment, isAlphanumeric, splitKey } from "./key-path/split-key"
import { formatByName, formatForPath } from "./load/formats"
import { loadDocument } from "./load/load-document"

export type ConfigDeps = {
  fileSystem?: ConfigFileSystem
  formats?: readonly DocumentFormat[]
  logger?: Logger
}

export type ResolvedConfigDeps = Readonly<Required<ConfigDeps>>

export type ConfigInput = Config | ConfigMapping | string | null | undefined

/** What a lookup returns: mappings come back wrapped as configs. */
export type ConfigEntry = ConfigScalar | ConfigValue[] | Config

export type DumpOptions = {
  /** Name of a registered document format. Defaults to `yaml`. */
  format?: string
  /** Top-level keys written first, in this order. */
  keyOrder?: readonly string[]
}

const MAX_DELIMITER_ATTEMPTS = 100

export function defaultDocumentFormats(): DocumentFormat[] {
  return [new YamlDocumentFormat(), new JsonDocumentFormat()]
}

export function resolveConfigDeps(deps: ConfigDeps = {}, inherited?: ResolvedConfigDeps): ResolvedConfigDeps {
  return {
    fileSystem: deps.fileSystem ?? inherited?.fileSystem ?? new NodeFileSystem(),
    formats: deps.formats ?? inherited?.formats ?? defaultDocumentFormats(),
    logger: deps.logger ?? inherited?.logger ?? createNullLogger(),
  }
}

type Step = { found: true; value: ConfigValue } | { found: false }

/**
 * A hierarchical configuration tree addressed by key paths.
 *
 * Keys may be plain top-level names, delimited expressions such as
 * `"→a→b→0"` or `".a.b.0"`, or explicit key paths such as `["a", "b", 0]`.
 * Values are copied on the way in, so a config never aliases the data it
 * was built from.
 *
 * @example
 * const config = new Config({ server: { port: 8080 } })
 * config.set(".server.host", "localhost")
 * config.get(["server", "port"]) // 8080
 */
export class Config implements Iterable<string> {
  static readonly DEFAULT_DELIMITER = "→"
  static readonly INCLUDE_KEY = INCLUDE_KEY
  static readonly DUMP_KEY_ORDER: readonly string[] = []

  /** Delimiter used when listing names; inherited by extracted sub-configs. */
  delimiter = Config.DEFAULT_DELIMITER

  /** Absolute path of the file this config was loaded from, if any. */
  configFile: string | null = null

  readonly deps: ResolvedConfigDeps

  private data: ConfigMapping = {}

  constructor(other?: ConfigInput, deps?: ConfigDeps) {
    this.deps = resolveConfigDeps(deps, other instanceof Config ? other.deps : undefined)

    if (other === undefined || other === null) return

    if (other instanceof Config) {
      this.data = cloneValue(other.data)
    } else if (typeof other === "string") {
      this.loadFile(other)
      this.processIncludes()
    } else {
      this.update(other)
    }
  }

  static fromFile(filePath: string, deps?: ConfigDeps): Config {
    return new Config(filePath, deps)
  }

  get size(): number {
    return Object.keys(this.data).length
  }

  [Symbol.iterator](): Iterator<string> {
    return this.keys()[Symbol.iterator]()
  }

  keys(): string[] {
    return Object.keys(this.data)
  }

  values(): ConfigEntry[] {
    return this.keys().map((key) => this.get([key]))
  }

  entries(): [string, ConfigEntry][] {
    return this.keys().map((key) => [key, this.get([key])])
  }

  has(key: KeyExpression): boolean {
    const keys = this.keyHierarchy(key)

    return keys.length > 0 && this.findInHierarchy(keys).complete
  }

  get(key: KeyExpression): ConfigEntry {
    const keys = this.keyHierarchy(key)
    const { hierarchy, complete } = this.findInHierarchy(keys)
    const value = hierarchy.at(-1)

    if (keys.length === 0 || !complete || value === undefined) throw ConfigError.keyNotFound(key)

    return this.wrap(value)
  }

  getOrDefault<T>(key: KeyExpression, fallback: T): ConfigEntry | T {
    return this.has(key) ? this.get(key) : fallback
  }

  /**
   * Returns the mapping at `key` as a config. Throws when the value there is
   * not a mapping.
   */
  getMapping(key: KeyExpression): Config {
    const value = this.get(key)
    if (!(value instanceof Config)) throw ConfigError.mergeTypeMismatch(describeType(value), key)

    return value
  }

  /**
   * Returns the value at `key` as a list: sequences as they are, anything
   * else wrapped. A missing key yields `[null]`.
   */
  asArray(key: KeyExpression): (ConfigValue | Config)[] {
    const value = this.getOrDefault(key, null)

    return Array.isArray(value) ? value : [value]
  }

  /**
   * Assigns `value` at `key`, creating intermediate mappings as needed.
   * Sequence elements can only be replaced, not appended.
   */
  set(key: KeyExpression, value: ConfigValue | Config): void {
    const keys = this.keyHierarchy(key)
    const raw = value instanceof Config ? value.data : value
    assertNoReservedKey([...keys, ...(findReservedKey(raw) ?? [])], key)

    const stored = cloneValue(raw)

    const last = keys.pop()
    if (last === undefined) throw ConfigError.keyNotFound(key)
    const container = this.containerAt(keys, key, true)

    if (Array.isArray(container)) {
      const index = this.sequenceIndex(container, last)
      if (index === null) throw ConfigError.keyNotFound(key)

      container[index] = stored
      return
    }

    if (!isMapping(container)) throw ConfigError.keyNotFound(key)

    container[String(last)] = stored
  }

  /**
   * Removes the leaf at `key`. Ancestors stay in place.
   */
  delete(key: KeyExpression): void {
    const keys = this.keyHierarchy(key)
    const last = keys.pop()
    if (last === undefined) throw ConfigError.keyNotFound(key)

    const container = this.containerAt(keys, key, false)

    if (Array.isArray(container)) {
      const index = this.sequenceIndex(container, last)
      if (index === null) throw ConfigError.keyNotFound(key)

      container.splice(index, 1)
      return
    }

    const name = String(last)
    if (!isMapping(container) || !Object.hasOwn(container, name)) throw ConfigError.keyNotFound(key)

    delete container[name]
  }

  clear(): void {
    this.data = {}
  }

  /**
   * Recursively merges `other` into this config. Values from `other` win;
   * nested mappings are merged rather than replaced.
   */
  update(other: Config | ConfigMapping): void {
    deepUpdate(this.data, other instanceof Config ? other.data : other, [])
  }

  /**
   * Merges this config on top of `other`: values already present here win.
   */
  merge(other: Config | ConfigMapping): void {
    const result = new Config(other, this.deps)
    result.update(this)

    this.data = result.data
  }

  /**
   * Every key path in the tree, parents before children. Sequence elements
   * contribute integer segments.
   */
  nameTuples(topLevelOnly = false): KeyPath[] {
    if (topLevelOnly) return this.keys().map((key) => [key])

    const tuples: Segment[][] = []

    const walk = (node: ConfigValue[] | ConfigMapping, base: Segment[]) => {
      const children: [Segment, ConfigValue][] = Array.isArray(node)
        ? node.map((value, index) => [index, value])
        : Object.entries(node)

      for (const [segment, value] of children) {
        const keyPath = [...base, segment]
        tuples.push(keyPath)

        if (Array.isArray(value) || isMapping(value)) walk(value, keyPath)
      }
    }

    walk(this.data, [])

    return tuples
  }

  /**
   * Every key path rendered as a delimited expression. Without an explicit
   * delimiter, the first character not present in any key is chosen, starting
   * from this config's delimiter.
   */
  names(topLevelOnly = false, delimiter?: string): string[] {
    if (topLevelOnly) return this.keys()

    if (delimiter !== undefined && (delimiter.length === 0 || isAlphanumeric(delimiter))) {
      throw ConfigError.invalidArgument(`Delimiter cannot be alphanumeric: ${JSON.stringify(delimiter)}`, {
        delimiter,
      })
    }

    const tuples = this.nameTuples()
    const chosen = delimiter ?? this.pickDelimiter(tuples)

    return tuples.map(
      (keyPath) => chosen + keyPath.map((segment) => escapeSegment(segment, chosen)).join(chosen),
    )
  }

  equals(other: Config | ConfigMapping): boolean {
    return valuesEqual(this.data, other instanceof Config ? other.data : other)
  }

  clone(): Config {
    const copy = new Config(this)
    copy.delimiter = this.delimiter
    copy.configFile = this.configFile

    return copy
  }

  toObject(): ConfigMapping {
    return cloneValue(this.data)
  }

  toJSON(): ConfigMapping {
    return this.toObject()
  }

  toString(): string {
    return JSON.stringify(this.data, null, 2)
  }

  dump(options: DumpOptions = {}): string {
    const format = formatByName(options.format ?? "yaml", this.deps.formats)

    return format.stringify(this.ordered(options.keyOrder ?? Config.DUMP_KEY_ORDER))
  }

  /**
   * Writes this config to `filePath` in the format matching its extension.
   */
  dumpToFile(filePath: string, keyOrder?: readonly string[]): void {
    const target = path.resolve(this.deps.fileSystem.cwd(), filePath)
    const format = formatForPath(target, this.deps.formats)

    this.deps.logger.debug("Writing config file", { module: "config", file: target })
    this.deps.fileSystem.writeText(
      target,
      format.stringify(this.ordered(keyOrder ?? Config.DUMP_KEY_ORDER)),
    )
  }

  private loadFile(filePath: string): void {
    const target = path.resolve(this.deps.fileSystem.cwd(), filePath)

    this.deps.logger.debug("Opening config file", { module: "config", file: target })
    this.data = loadDocument(target, this.deps)
    this.configFile = target
  }

  private processIncludes(): void {
    resolveIncludes(this, {
      fileSystem: this.deps.fileSystem,
      logger: this.deps.logger,
      createConfig: (input) => new Config(input, this.deps),
    })
  }

  private keyHierarchy(key: KeyExpression): Segment[] {
    return splitKey(key, this.data)
  }

  private findInHierarchy(
    keys: readonly Segment[],
    create = false,
  ): { hierarchy: ConfigValue[]; complete: boolean } {
    const hierarchy: ConfigValue[] = []
    let node: ConfigValue = this.data

    for (const segment of keys) {
      const step = this.step(node, segment, create)
      if (!step.found) return { hierarchy, complete: false }

      hierarchy.push(step.value)
      node = step.value
    }

    return { hierarchy, complete: true }
  }

  private step(node: ConfigValue, segment: Segment, create: boolean): Step {
    if (Array.isArray(node)) {
      const index = parseIndex(segment)

      // Non-integer segments test sequence membership.
      if (index === null) {
        return node.includes(segment) ? { found: true, value: null } : { found: false }
      }

      const resolved = resolveIndex(index, node.length)
      const value = resolved === null ? undefined : node[resolved]

      return value === undefined ? { found: false } : { found: true, value }
    }

    if (!isMapping(node)) return { found: false }

    const name = String(segment)
    const value = node[name]

    if (Object.hasOwn(node, name) && value !== undefined) return { found: true, value }

    if (!create) return { found: false }

    const created: ConfigMapping = {}
    node[name] = created

    return { found: true, value: created }
  }

  private containerAt(keys: readonly Segment[], key: KeyExpression, create: boolean): ConfigValue {
    if (keys.length === 0) return this.data

    const { hierarchy, complete } = this.findInHierarchy(keys, create)
    const container = hierarchy.at(-1)

    if (!complete || container === undefined) throw ConfigError.keyNotFound(key)

    return container
  }

  private sequenceIndex(sequence: readonly ConfigValue[], segment: Segment): number | null {
    const index = parseIndex(segment)

    return index === null ? null : resolveIndex(index, sequence.length)
  }

  private wrap(value: ConfigValue): ConfigEntry {
    if (Array.isArray(value)) return cloneValue(value)
    if (!isMapping(value)) return value

    const sub = new Config(value, this.deps)
    sub.delimiter = this.delimiter

    return sub
  }

  private pickDelimiter(tuples: readonly KeyPath[]): string {
    const combined = tuples.map((keyPath) => keyPath.map(String).join("")).join("")
    let delimiter = this.delimiter
    let attempts = 0

    while (combined.includes(delimiter)) {
      this.deps.logger.debug("Delimiter appears in a key, trying another", { module: "config", delimiter })

      attempts += 1
      if (attempts > MAX_DELIMITER_ATTEMPTS) {
        throw ConfigError.delimiterSelectionFailed(MAX_DELIMITER_ATTEMPTS)
      }

      delimiter = nextNonAlphanumeric(delimiter)
    }

    this.deps.logger.debug("Using delimiter", { module: "config", delimiter })

    return delimiter
  }

  private ordered(keyOrder: readonly string[]): ConfigMapping {
    const remaining = cloneValue(this.data)
    const result: ConfigMapping = {}

    for (const key of keyOrder) {
      const value = remaining[key]
      if (value === undefined) continue

      result[key] = value
      delete remaining[key]
    }

    return { ...result, ...remaining }
  }
}

function nextNonAlphanumeric(delimiter: string): string {
  let code = delimiter.codePointAt(0) ?? 0
  let next: string

  do {
    code += 1
    next = String.fromCodePoint(code)
  } while (isAlphanumeric(next))

  return next
}

function assertNoReservedKey(keyPath: readonly Segment[], key: KeyExpression): void {
  if (!keyPath.includes(RESERVED_KEY)) return

  const described = describeKey(key)

  throw ConfigError.invalidArgument(`Reserved key ${JSON.stringify(RESERVED_KEY)} in ${described}`, {
    key: described,
  })
}

function deepUpdate(target: ConfigMapping, source: ConfigMapping, keyPath: Segment[]): void {
  for (const [key, value] of Object.entries(source)) {
    if (key === RESERVED_KEY) assertNoReservedKey([key], [...keyPath, key])

    if (!isMapping(value)) {
      target[key] = cloneValue(value)
      continue
    }

    const existing = Object.hasOwn(target, key) ? target[key] : undefined
    if (existing !== undefined && !isMapping(existing)) {
      throw ConfigError.mergeTypeMismatch(describeType(existing), [...keyPath, key])
    }

    const merged = existing ?? {}
    deepUpdate(merged, value, [...keyPath, key])
    target[key] = merged
  }
}
