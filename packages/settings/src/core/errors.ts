export type SettingsErrorCode =
  | "source_type"
  | "unsupported_source"
  | "source_not_found"
  | "source_parse_failed"
  | "section_not_found"
  | "key_not_found"
  | "invalid_section_value"
  | "ambiguous_subset"
  | "invalid_parser"
  | "invalid_policy"

/**
 * Structured metadata attached to errors (section names, terms, paths).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type SettingsErrorOptions<C extends SettingsErrorCode = SettingsErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

/**
 * JSON-safe error shape for logs and CLI output.
 */
export type SerializedSettingsError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedSettingsError
}>

export class SettingsError<C extends SettingsErrorCode = SettingsErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable = false
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: SettingsErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedSettingsError {
    return serializeError(this)
  }
}

export class SourceTypeError extends SettingsError<"source_type"> {
  static of(source: unknown): SourceTypeError {
    return new SourceTypeError("source must be a path, a settings source or a mapping", {
      code: "source_type",
      context: { received: kindOf(source) },
    })
  }
}

export class UnsupportedSourceError extends SettingsError<"unsupported_source"> {
  static forExtension(file: string, extension: string): UnsupportedSourceError {
    return new UnsupportedSourceError(
      `loading settings from "${extension || "(none)"}" files is not supported`,
      { code: "unsupported_source", context: { file, extension } },
    )
  }
}

export class SourceNotFoundError extends SettingsError<"source_not_found"> {
  static forFile(file: string, cause?: unknown): SourceNotFoundError {
    return new SourceNotFoundError(`settings file ${file} not found`, {
      code: "source_not_found",
      context: { file },
      cause,
    })
  }
}

export class SourceParseError extends SettingsError<"source_parse_failed"> {
  static forSource(source: string, reason: string, cause?: unknown): SourceParseError {
    return new SourceParseError(`failed to parse ${source}: ${reason}`, {
      code: "source_parse_failed",
      context: { source },
      cause,
    })
  }
}

export class SectionNotFoundError extends SettingsError<"section_not_found"> {
  static forName(section: string): SectionNotFoundError {
    return new SectionNotFoundError(`section "${section}" not found`, {
      code: "section_not_found",
      context: { section },
    })
  }

  static forTerms(terms: readonly string[]): SectionNotFoundError {
    return new SectionNotFoundError(`no section matches ${formatTerms(terms)}`, {
      code: "section_not_found",
      context: { terms: [...terms] },
    })
  }
}

export class KeyNotFoundError extends SettingsError<"key_not_found"> {
  static forTerms(terms: readonly string[]): KeyNotFoundError {
    return new KeyNotFoundError(`no key in any section matches ${formatTerms(terms)}`, {
      code: "key_not_found",
      context: { terms: [...terms] },
    })
  }
}

export class InvalidSectionValueError extends SettingsError<"invalid_section_value"> {
  static forSection(section: string, value: unknown): InvalidSectionValueError {
    return new InvalidSectionValueError(`key must map to a dict-like value: "${section}"`, {
      code: "invalid_section_value",
      context: { section, received: kindOf(value) },
    })
  }
}

export class AmbiguousSubsetRequestError extends SettingsError<"ambiguous_subset"> {
  constructor() {
    super("subset needs include or exclude", { code: "ambiguous_subset" })
  }
}

export class InvalidParserError extends SettingsError<"invalid_parser"> {}

export class InvalidPolicyError extends SettingsError<"invalid_policy"> {}

export function isSettingsError(err: unknown): err is SettingsError {
  return err instanceof SettingsError
}

/**
 * Serialize a SettingsError, any other Error, or a thrown value.
 */
export function serializeError(err: unknown): SerializedSettingsError {
  if (err instanceof SettingsError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause) }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause) }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}

function formatTerms(terms: readonly string[]): string {
  return terms.map((t) => `"${t}"`).join(", ")
}

function kindOf(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  return typeof value
}
