/**
 * Error types and codes for wrapgen.
 * Every failure raised by the generator extends WrapgenError and is fatal:
 * nothing is retried and no output is written.
 */

/**
 * Base error class for all wrapgen errors.
 */
export class WrapgenError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'WrapgenError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends WrapgenError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Failures while locating the interface or resolving its types.
 * Error codes: X001-X006
 */
export class ExtractionError extends WrapgenError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ExtractionError';
  }
}

/**
 * No top-level type declaration carries the requested name.
 */
export class NotFoundError extends ExtractionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.NOT_FOUND, message, details);
    this.name = 'NotFoundError';
  }
}

/**
 * The requested name resolves to a type that is not an interface.
 */
export class NotAnInterfaceError extends ExtractionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.NOT_AN_INTERFACE, message, details);
    this.name = 'NotAnInterfaceError';
  }
}

/**
 * The type checker could not resolve a type the interface refers to.
 */
export class TypeResolutionError extends ExtractionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.TYPE_RESOLUTION, message, details);
    this.name = 'TypeResolutionError';
  }
}

/**
 * A method failed one of the registered validation predicates.
 * Error codes: V001
 */
export class ValidationError extends WrapgenError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * No zero value is known for a result type that needs one.
 */
export class ZeroValueError extends WrapgenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.NO_ZERO_VALUE, message, details);
    this.name = 'ZeroValueError';
  }
}

/**
 * The requested pattern cannot be applied with the given inputs.
 * Error codes: P001-P007
 */
export class PatternConfigurationError extends WrapgenError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'PatternConfigurationError';
  }
}

/**
 * Rendering the generated module failed.
 */
export class RenderError extends WrapgenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.RENDER_FAILED, message, details);
    this.name = 'RenderError';
  }
}

/**
 * Writing the generated module failed.
 */
export class WriteError extends WrapgenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.WRITE_FAILED, message, details);
    this.name = 'WriteError';
  }
}

/**
 * System errors (unreadable files, parse errors).
 * Error codes: S001-S002
 */
export class SystemError extends WrapgenError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Extraction errors (X001-X006)
  NOT_FOUND: 'X001',
  NOT_AN_INTERFACE: 'X002',
  TYPE_RESOLUTION: 'X003',
  UNSUPPORTED_INTERFACE: 'X004',
  UNSUPPORTED_MEMBER: 'X005',
  OVERLOADED_METHOD: 'X006',

  // Validation errors
  METHOD_INVALID: 'V001',

  // Zero values
  NO_ZERO_VALUE: 'Z001',

  // Pattern configuration errors (P001-P008)
  NOT_A_CLIENT: 'P001',
  MISSING_DELEGATE: 'P002',
  UNKNOWN_METHOD: 'P003',
  INVALID_NAME: 'P004',
  RESERVED_MEMBER: 'P005',
  UNKNOWN_KIND: 'P006',
  OPTION_UNSUPPORTED: 'P007',
  CONTEXT_UNSUPPORTED: 'P008',

  // Output errors
  RENDER_FAILED: 'R001',
  WRITE_FAILED: 'W001',

  // System errors (S001-S002)
  PARSE_ERROR: 'S001',
  INVALID_CONFIG: 'S002',
} as const;
