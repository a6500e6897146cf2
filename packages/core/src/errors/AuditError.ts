/**
 * Audit Error Classes
 *
 * Custom error classes with cause chaining. Context travels with the error so
 * that per-package failures can be reported without losing the original cause.
 */

/**
 * Base error class for all ctv-audit errors.
 */
export class AuditError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Additional context about the error */
  readonly context?: Record<string, unknown>

  constructor(
    message: string,
    options?: {
      code?: string
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, { cause: options?.cause })
    this.name = 'AuditError'
    this.code = options?.code ?? 'AUDIT_ERROR'
    this.context = options?.context

    Error.captureStackTrace?.(this, this.constructor)
  }
}

/**
 * Non-success HTTP response from a remote service. Attached as the cause of
 * the domain error it leads to, so the status survives in logs.
 */
export class ApiError extends AuditError {
  readonly statusCode: number

  constructor(
    message: string,
    options: {
      statusCode: number
      url?: string
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'API_ERROR',
      cause: options.cause,
      context: {
        ...options.context,
        url: options.url,
        statusCode: options.statusCode,
      },
    })
    this.name = 'ApiError'
    this.statusCode = options.statusCode
  }
}

/**
 * The named task view could not be found or parsed. Fatal for a run.
 */
export class TaskViewResolutionError extends AuditError {
  readonly taskView: string

  constructor(
    message: string,
    options: {
      taskView: string
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'TASK_VIEW_RESOLUTION_ERROR',
      cause: options.cause,
      context: {
        ...options.context,
        taskView: options.taskView,
      },
    })
    this.name = 'TaskViewResolutionError'
    this.taskView = options.taskView
  }
}

export type MetadataFailureReason = 'unknown_package' | 'registry_unavailable' | 'invalid_response'

/**
 * Metadata for a single package could not be retrieved. The package is
 * excluded from the check matrix; the run continues.
 */
export class MetadataFetchError extends AuditError {
  readonly packageName: string
  readonly reason: MetadataFailureReason

  constructor(
    message: string,
    options: {
      packageName: string
      reason: MetadataFailureReason
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'METADATA_FETCH_ERROR',
      cause: options.cause,
      context: {
        ...options.context,
        packageName: options.packageName,
        reason: options.reason,
      },
    })
    this.name = 'MetadataFetchError'
    this.packageName = options.packageName
    this.reason = options.reason
  }
}

/**
 * Invalid configuration (environment variables or CLI flags)
 */
export class ConfigError extends AuditError {
  constructor(
    message: string,
    options?: {
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'CONFIG_ERROR',
      cause: options?.cause,
      context: options?.context,
    })
    this.name = 'ConfigError'
  }
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return 'Unknown error'
}

export function isAuditError(error: unknown): error is AuditError {
  return error instanceof AuditError
}
