/**
 * Error classes for csp-compose
 */

/**
 * Base error class for all csp-compose errors
 */
export class CSPError extends Error {
  /**
   * HTTP status code
   */
  public readonly statusCode: number

  /**
   * Error code for programmatic handling
   */
  public readonly code: string

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>

  constructor(
    message: string,
    options: {
      statusCode?: number
      code?: string
      details?: Record<string, unknown>
      cause?: Error
    } = {}
  ) {
    super(message, { cause: options.cause })
    this.name = 'CSPError'
    this.statusCode = options.statusCode ?? 500
    this.code = options.code ?? 'CSP_ERROR'
    this.details = options.details

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Convert error to JSON response body
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
    }
  }

  /**
   * Create a Response object from this error
   */
  toResponse(headers?: HeadersInit): Response {
    return new Response(JSON.stringify(this.toJSON()), {
      status: this.statusCode,
      headers: {
        'Content-Type': 'application/json',
        ...headers,
      },
    })
  }
}

/**
 * Reasons a policy can fail to assemble
 */
export type AssemblyErrorReason =
  | 'TEMPLATE_INVALID'
  | 'REPORT_TO_MISSING'
  | 'REPORT_TO_MISMATCH'

/**
 * Policy assembly failed before any header was produced
 */
export class AssemblyError extends CSPError {
  public readonly reason: AssemblyErrorReason

  constructor(
    reason: AssemblyErrorReason,
    message: string,
    options: {
      details?: Record<string, unknown>
      cause?: Error
    } = {}
  ) {
    super(message, {
      statusCode: 500,
      code: reason,
      details: options.details,
      cause: options.cause,
    })
    this.name = 'AssemblyError'
    this.reason = reason
  }
}

/**
 * A directive could not be rendered with its template
 */
export class RenderError extends CSPError {
  /**
   * Directive being rendered, when known
   */
  public readonly directive?: string

  constructor(
    message: string,
    options: {
      directive?: string
      details?: Record<string, unknown>
      cause?: Error
    } = {}
  ) {
    super(message, {
      statusCode: 500,
      code: 'RENDER_ERROR',
      details: {
        ...options.details,
        ...(options.directive !== undefined ? { directive: options.directive } : {}),
      },
      cause: options.cause,
    })
    this.name = 'RenderError'
    this.directive = options.directive
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends CSPError {
  constructor(
    message: string,
    options: {
      details?: Record<string, unknown>
      cause?: Error
    } = {}
  ) {
    super(message, {
      statusCode: 500,
      code: 'CONFIGURATION_ERROR',
      details: options.details,
      cause: options.cause,
    })
    this.name = 'ConfigurationError'
  }
}

/**
 * Violation report rejected by the report receiver
 */
export class ReportError extends CSPError {
  constructor(
    message = 'Invalid CSP violation report',
    options: {
      statusCode?: number
      code?: string
      details?: Record<string, unknown>
    } = {}
  ) {
    super(message, {
      statusCode: options.statusCode ?? 400,
      code: options.code ?? 'INVALID_REPORT',
      details: options.details,
    })
    this.name = 'ReportError'
  }
}

/**
 * Check if an error is a CSPError
 */
export function isCSPError(error: unknown): error is CSPError {
  return error instanceof CSPError
}

/**
 * Convert unknown error to CSPError
 */
export function toCSPError(error: unknown): CSPError {
  if (error instanceof CSPError) {
    return error
  }

  if (error instanceof Error) {
    return new CSPError(error.message, {
      cause: error,
    })
  }

  return new CSPError(String(error))
}
