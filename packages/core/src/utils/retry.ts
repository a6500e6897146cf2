/**
 * Retry Utility
 *
 * Exponential backoff retry logic for transient network failures and
 * rate-limited responses. Attempts are bounded; callers decide what an
 * exhausted retry means for them.
 */

import { timeoutSignal } from './abort.js'
import { createLogger } from './logger.js'

const log = createLogger('RetryUtil')

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number
  /** Initial delay in milliseconds (default: 1000) */
  initialDelayMs?: number
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number
  /** Add jitter to prevent thundering herd (default: true) */
  jitter?: boolean
  /** Custom function to determine if error is retryable */
  isRetryable?: (error: unknown) => boolean
  /**
   * Server-suggested delay for an error (Retry-After, rate limit reset).
   * Used in place of the computed backoff when it returns a number; still
   * capped at maxDelayMs.
   */
  suggestedDelayMs?: (error: unknown) => number | null
  /** Callback on each retry attempt */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void
  /** Stops retrying (and waiting) once aborted */
  signal?: AbortSignal
}

export const DEFAULT_RETRY_CONFIG: Required<
  Omit<RetryConfig, 'isRetryable' | 'suggestedDelayMs' | 'onRetry' | 'signal'>
> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
}

/**
 * Error codes that indicate transient network failures
 */
const TRANSIENT_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'EPIPE',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
])

const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
])

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

/**
 * Determines if an error is a transient network error
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof Error) {
    const code = errorCode(error)
    if (code && TRANSIENT_ERROR_CODES.has(code)) {
      return true
    }

    // undici wraps the socket error in `cause`
    if (error.cause instanceof Error) {
      const causeCode = errorCode(error.cause)
      if (causeCode && TRANSIENT_ERROR_CODES.has(causeCode)) {
        return true
      }
    }

    // fetch timeouts surface as AbortError or TimeoutError
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return true
    }

    if (error.message.includes('network') || error.message.includes('fetch failed')) {
      return true
    }
  }

  return false
}

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS_CODES.has(status)
}

/**
 * Calculate delay with exponential backoff and optional jitter
 */
export function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
  jitter: boolean
): number {
  let delay = initialDelayMs * Math.pow(backoffMultiplier, attempt)
  delay = Math.min(delay, maxDelayMs)

  // ±25%
  if (jitter) {
    const jitterFactor = 0.75 + Math.random() * 0.5
    delay = Math.floor(delay * jitterFactor)
  }

  return delay
}

/**
 * Sleep for a specified duration; resolves early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const onAbort = (): void => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Retry a function with exponential backoff
 *
 * @throws The original error when retries are exhausted, the error is not
 * retryable, or the signal aborted
 *
 * @example
 * ```typescript
 * const result = await withRetry(
 *   () => client.get(repo, 'LICENSE.md'),
 *   { maxRetries: 3, initialDelayMs: 1000 }
 * )
 * ```
 */
export async function withRetry<T>(fn: () => Promise<T>, config: RetryConfig = {}): Promise<T> {
  const {
    maxRetries = DEFAULT_RETRY_CONFIG.maxRetries,
    initialDelayMs = DEFAULT_RETRY_CONFIG.initialDelayMs,
    maxDelayMs = DEFAULT_RETRY_CONFIG.maxDelayMs,
    backoffMultiplier = DEFAULT_RETRY_CONFIG.backoffMultiplier,
    jitter = DEFAULT_RETRY_CONFIG.jitter,
    isRetryable = isTransientError,
    suggestedDelayMs,
    onRetry,
    signal,
  } = config

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      if (attempt >= maxRetries || signal?.aborted || !isRetryable(error)) {
        throw error
      }

      const suggested = suggestedDelayMs?.(error) ?? null
      const delayMs =
        suggested !== null
          ? Math.min(suggested, maxDelayMs)
          : calculateDelay(attempt, initialDelayMs, maxDelayMs, backoffMultiplier, jitter)

      log.debug(`Retry attempt ${attempt + 1}/${maxRetries}`, {
        error: error instanceof Error ? error.message : String(error),
        delayMs,
      })

      onRetry?.(attempt + 1, error, delayMs)

      await sleep(delayMs, signal)
    }
  }
}

/**
 * Error thrown for HTTP responses that should be retried
 */
export class HttpRetryableError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly retryAfterMs: number | null = null
  ) {
    super(message)
    this.name = 'HttpRetryableError'
  }
}

export interface FetchWithRetryOptions extends RequestInit {
  /** Timeout applied to each attempt separately */
  timeoutMs?: number
}

/**
 * Retry a fetch request with exponential backoff
 *
 * Retries network errors, 408/429/5xx responses (honoring Retry-After).
 * Once retries are exhausted the last error is thrown. `timeoutMs` bounds each
 * attempt, while `signal` aborts the whole call.
 *
 * @example
 * ```typescript
 * const response = await fetchWithRetry(
 *   'https://crandb.r-pkg.org/testthat',
 *   { headers: { Accept: 'application/json' } },
 *   { maxRetries: 3 }
 * )
 * ```
 */
export async function fetchWithRetry(
  url: string,
  options: FetchWithRetryOptions = {},
  retryConfig: RetryConfig = {}
): Promise<Response> {
  const { timeoutMs, ...init } = options
  const config: RetryConfig = {
    ...retryConfig,
    isRetryable: (error) => isTransientError(error) || error instanceof HttpRetryableError,
    suggestedDelayMs: (error) =>
      error instanceof HttpRetryableError ? error.retryAfterMs : null,
    signal: retryConfig.signal ?? init.signal ?? undefined,
  }

  return withRetry(async () => {
    const timeout =
      timeoutMs !== undefined ? timeoutSignal(timeoutMs, init.signal ?? undefined) : undefined
    try {
      const response = await fetch(url, { ...init, signal: timeout?.signal ?? init.signal })

      if (isRetryableStatus(response.status)) {
        await response.body?.cancel()
        throw new HttpRetryableError(
          response.status,
          `HTTP ${response.status} - retryable`,
          parseRetryAfter(response.headers.get('Retry-After'))
        )
      }

      return response
    } finally {
      timeout?.dispose()
    }
  }, config)
}

/**
 * Parse Retry-After header value
 * @param value - Retry-After header value (seconds or HTTP-date)
 * @returns Delay in milliseconds, or null if invalid
 */
export function parseRetryAfter(value: string | null): number | null {
  if (value === null || value.trim() === '') {
    return null
  }

  const trimmed = value.trim()

  // Pure integer strings only, not "12.5" or "12abc"
  if (/^-?\d+$/.test(trimmed)) {
    const seconds = parseInt(trimmed, 10)
    if (seconds < 0) {
      return null
    }
    return seconds * 1000
  }

  // HTTP-date must contain letters, e.g. "Wed, 21 Oct 2015 07:28:00 GMT"
  if (/[a-zA-Z]/.test(trimmed)) {
    const date = Date.parse(trimmed)
    if (!isNaN(date)) {
      return Math.max(0, date - Date.now())
    }
  }

  return null
}

/**
 * Parse an `x-ratelimit-reset` header (epoch seconds) into a delay from now
 */
export function parseRateLimitReset(value: string | null, now: number = Date.now()): number | null {
  if (value === null || !/^\d+$/.test(value.trim())) {
    return null
  }
  return Math.max(0, parseInt(value.trim(), 10) * 1000 - now)
}
