/**
 * Remote File Prober
 *
 * Answers "does this path exist on the default branch of this repository?"
 * through a {@link ContentsClient}. Results are cached per (repository, path)
 * for the lifetime of the prober.
 *
 * Only a 2xx answer counts as present. A 404 is a confirmed absence; every
 * other outcome (rate limit exhausted, 5xx, network error) is a probe failure.
 * Both score as `false`, but failures are logged at warn level and counted
 * separately so systemic problems do not pass for missing files.
 */

import { createAuditEvent, createLogger, type Logger } from '../utils/logger.js'
import {
  HttpRetryableError,
  isRetryableStatus,
  isTransientError,
  parseRateLimitReset,
  parseRetryAfter,
  withRetry,
} from '../utils/retry.js'
import { getErrorMessage } from '../errors/index.js'
import { formatRepositoryRef } from '../locator/RepositoryLocator.js'
import type { RepositoryRef } from '../types/audit.js'
import { LruProbeCache } from './ProbeCache.js'
import type {
  ContentsClient,
  ContentsResponse,
  ProbeCache,
  ProbeFailureReason,
  ProbeOutcome,
  ProbeStats,
  RemoteFileProberOptions,
} from './types.js'

const PRESENT: ProbeOutcome = { status: 'present' }
const ABSENT: ProbeOutcome = { status: 'absent' }

/**
 * GitHub signals an exhausted quota with 429, or with 403 plus either a zero
 * remaining count or a Retry-After header
 */
export function isRateLimitResponse(response: ContentsResponse): boolean {
  if (response.status === 429) return true
  if (response.status !== 403) return false
  return (
    response.headers.get('x-ratelimit-remaining') === '0' ||
    response.headers.get('retry-after') !== null
  )
}

function rateLimitDelayMs(response: ContentsResponse): number | null {
  return (
    parseRetryAfter(response.headers.get('retry-after')) ??
    parseRateLimitReset(response.headers.get('x-ratelimit-reset'))
  )
}

function failed(reason: ProbeFailureReason, message: string, statusCode?: number): ProbeOutcome {
  return { status: 'failed', reason, message, statusCode }
}

export class RemoteFileProber {
  private readonly client: ContentsClient
  private readonly cache: ProbeCache
  private readonly maxRetries: number
  private readonly initialDelayMs: number
  private readonly maxDelayMs: number
  private readonly jitter: boolean
  private readonly signal?: AbortSignal
  private readonly log: Logger
  private readonly stats: ProbeStats = {
    requests: 0,
    cacheHits: 0,
    present: 0,
    absent: 0,
    failed: 0,
    rateLimited: 0,
    retries: 0,
  }

  constructor(options: RemoteFileProberOptions, log: Logger = createLogger('RemoteFileProber')) {
    this.client = options.client
    this.cache = options.cache ?? new LruProbeCache()
    this.maxRetries = options.maxRetries ?? 3
    this.initialDelayMs = options.initialDelayMs ?? 1000
    this.maxDelayMs = options.maxDelayMs ?? 30000
    this.jitter = options.jitter ?? true
    this.signal = options.signal
    this.log = log
  }

  /**
   * Whether `path` could be confirmed present in `repo`
   */
  async exists(repo: RepositoryRef, path: string): Promise<boolean> {
    const outcome = await this.probe(repo, path)
    return outcome.status === 'present'
  }

  /**
   * Whether any of `paths` exists. Probes in order and stops at the first hit.
   */
  async existsAny(repo: RepositoryRef, paths: readonly string[]): Promise<boolean> {
    for (const path of paths) {
      if (await this.exists(repo, path)) {
        return true
      }
    }
    return false
  }

  /**
   * Detailed outcome for one (repository, path). Never rejects.
   */
  async probe(repo: RepositoryRef, path: string): Promise<ProbeOutcome> {
    const key = LruProbeCache.key(repo, path)

    const cached = this.cache.get(key)
    if (cached) {
      this.stats.cacheHits++
      this.log.auditLog(createAuditEvent('cache.hit', 'RemoteFileProber', key, 'probe', 'success'))
      return cached
    }

    const pending = this.fetchOutcome(repo, path)
    this.cache.set(key, pending)

    const outcome = await pending
    // An aborted probe says nothing about the repository
    if (outcome.status === 'failed' && outcome.reason === 'aborted') {
      this.cache.delete(key)
    }
    return outcome
  }

  getStats(): ProbeStats {
    return { ...this.stats }
  }

  private async fetchOutcome(repo: RepositoryRef, path: string): Promise<ProbeOutcome> {
    const resource = `${formatRepositoryRef(repo)}:${path}`
    const outcome = await this.request(repo, path, resource)

    switch (outcome.status) {
      case 'present':
        this.stats.present++
        this.log.debug('File present', { resource })
        break
      case 'absent':
        this.stats.absent++
        this.log.debug('File absent', { resource })
        this.log.auditLog(
          createAuditEvent('probe.absent', 'RemoteFileProber', resource, 'probe', 'success', {
            statusCode: 404,
          })
        )
        break
      case 'failed':
        this.stats.failed++
        if (outcome.reason === 'rate_limited') {
          this.stats.rateLimited++
        }
        this.log.warn('Probe failed; scoring as absent', {
          resource,
          reason: outcome.reason,
          statusCode: outcome.statusCode,
          message: outcome.message,
        })
        this.log.auditLog(
          createAuditEvent('probe.failure', 'RemoteFileProber', resource, 'probe', 'error', {
            reason: outcome.reason,
            statusCode: outcome.statusCode,
            message: outcome.message,
          })
        )
        break
    }

    return outcome
  }

  private async request(repo: RepositoryRef, path: string, resource: string): Promise<ProbeOutcome> {
    if (this.signal?.aborted) {
      return failed('aborted', 'Probe aborted before it started')
    }

    try {
      const response = await withRetry(
        async () => {
          this.stats.requests++
          this.log.auditLog(
            createAuditEvent('probe.request', 'RemoteFileProber', resource, 'probe', 'success')
          )
          const res = await this.client.getContents(repo, path, this.signal)

          if (isRateLimitResponse(res)) {
            throw new HttpRetryableError(res.status, 'Rate limit exceeded', rateLimitDelayMs(res))
          }
          if (isRetryableStatus(res.status)) {
            throw new HttpRetryableError(
              res.status,
              `HTTP ${res.status} - retryable`,
              parseRetryAfter(res.headers.get('retry-after'))
            )
          }
          return res
        },
        {
          maxRetries: this.maxRetries,
          initialDelayMs: this.initialDelayMs,
          maxDelayMs: this.maxDelayMs,
          jitter: this.jitter,
          signal: this.signal,
          isRetryable: (error) => error instanceof HttpRetryableError || isTransientError(error),
          suggestedDelayMs: (error) =>
            error instanceof HttpRetryableError ? error.retryAfterMs : null,
          onRetry: () => {
            this.stats.retries++
          },
        }
      )

      if (response.status >= 200 && response.status < 300) {
        return PRESENT
      }
      if (response.status === 404) {
        return ABSENT
      }
      return failed('http_error', `Unexpected HTTP ${response.status}`, response.status)
    } catch (error) {
      if (this.signal?.aborted) {
        return failed('aborted', getErrorMessage(error))
      }
      if (error instanceof HttpRetryableError) {
        const reason = error.status === 429 || error.status === 403 ? 'rate_limited' : 'http_error'
        return failed(reason, `${error.message} after ${this.maxRetries} retries`, error.status)
      }
      return failed('network_error', getErrorMessage(error))
    }
  }
}
