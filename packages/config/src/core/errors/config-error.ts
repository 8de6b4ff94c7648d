import type { KeyExpression } from "../../ports/key-path"

export type ConfigErrorCode =
  | "key_not_found"
  | "malformed_key_expression"
  | "delimiter_selection_failed"
  | "unresolved_include"
  | "merge_type_mismatch"
  | "missing_required_keys"
  | "unsupported_document_kind"
  | "file_not_found"
  | "invalid_document"
  | "unknown_type"
  | "invalid_argument"

export type ConfigErrorContext = Readonly<Record<string, unknown>>

export type ConfigErrorOptions = Readonly<{
  code: ConfigErrorCode
  context?: ConfigErrorContext
  cause?: unknown
  isOperational?: boolean
}>

export type SerializedConfigError = Readonly<{
  name: string
  code: ConfigErrorCode
  message: string
  context: ConfigErrorContext
  isOperational: boolean
  timestamp: string
  cause?: Readonly<{ name: string; message: string }>
}>

export function describeKey(key: KeyExpression): string {
  return typeof key === "object" ? JSON.stringify(key) : String(key)
}

export class ConfigError extends Error {
  readonly code: ConfigErrorCode
  readonly context: ConfigErrorContext
  readonly isRetryable = false
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: ConfigErrorOptions) {
    super(message, { cause: options.cause })

    this.name = "ConfigError"
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedConfigError {
    const cause = this.cause

    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
      isOperational: this.isOperational,
      timestamp: this.timestamp.toISOString(),
      ...(cause instanceof Error && { cause: { name: cause.name, message: cause.message } }),
    }
  }

  static keyNotFound(key: KeyExpression): ConfigError {
    return new ConfigError(`Key not found: ${describeKey(key)}`, {
      code: "key_not_found",
      context: { key: describeKey(key) },
    })
  }

  static malformedKeyExpression(key: string, reason: string): ConfigError {
    return new ConfigError(`Malformed key expression ${JSON.stringify(key)}: ${reason}`, {
      code: "malformed_key_expression",
      context: { key, reason },
    })
  }

  static delimiterSelectionFailed(attempts: number): ConfigError {
    return new ConfigError(`Could not find a usable delimiter after ${attempts} attempts`, {
      code: "delimiter_selection_failed",
      context: { attempts },
    })
  }

  static unresolvedInclude(fileName: string, searchPaths: readonly string[]): ConfigError {
    return new ConfigError(
      `Could not find include file ${fileName} in search paths: ${searchPaths.join(", ")}`,
      {
        code: "unresolved_include",
        context: { fileName, searchPaths: [...searchPaths] },
      },
    )
  }

  static mergeTypeMismatch(found: string, key?: KeyExpression): ConfigError {
    return new ConfigError(`Cannot merge a mapping with a value of type ${found}`, {
      code: "merge_type_mismatch",
      context: {
        found,
        ...(key !== undefined && { key: describeKey(key) }),
      },
    })
  }

  static missingRequiredKeys(kind: string, missing: readonly KeyExpression[]): ConfigError {
    const names = missing.map(describeKey)

    return new ConfigError(`Missing required keys for ${kind}: ${names.join(", ")}`, {
      code: "missing_required_keys",
      context: { kind, missing: names },
    })
  }

  static unsupportedDocumentKind(filePath: string): ConfigError {
    return new ConfigError(`Unsupported configuration document: ${filePath}`, {
      code: "unsupported_document_kind",
      context: { file: filePath },
    })
  }

  static fileNotFound(filePath: string): ConfigError {
    return new ConfigError(`Configuration file not found: ${filePath}`, {
      code: "file_not_found",
      context: { file: filePath },
    })
  }

  static invalidDocument(source: string, reason: string, cause?: unknown): ConfigError {
    return new ConfigError(`Invalid configuration document ${source}:\n${reason}`, {
      code: "invalid_document",
      context: { source, reason },
      cause,
    })
  }

  static unknownType(name: string, kind?: string): ConfigError {
    return new ConfigError(`Unknown type ${JSON.stringify(name)}${kind ? ` for ${kind}` : ""}`, {
      code: "unknown_type",
      context: {
        name,
        ...(kind !== undefined && { kind }),
      },
    })
  }

  static invalidArgument(message: string, context: ConfigErrorContext = {}): ConfigError {
    return new ConfigError(message, {
      code: "invalid_argument",
      context,
      isOperational: false,
    })
  }
}

export function isConfigError(value: unknown): value is ConfigError {
  return value instanceof ConfigError
}
