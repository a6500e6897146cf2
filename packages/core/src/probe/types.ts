/**
 * Remote File Prober types
 */

import type { RepositoryRef } from '../types/audit.js'

/**
 * Minimal response surface the prober needs from the network layer
 */
export interface ContentsResponse {
  status: number
  headers: {
    get(name: string): string | null
  }
}

/**
 * Network boundary: asks the hosting service whether `path` exists on the
 * default branch of `repo`. Rejects on transport failures only; any HTTP
 * status is returned as a response.
 */
export interface ContentsClient {
  getContents(repo: RepositoryRef, path: string, signal?: AbortSignal): Promise<ContentsResponse>
}

export type ProbeFailureReason = 'rate_limited' | 'http_error' | 'network_error' | 'aborted'

export type ProbeOutcome =
  | { status: 'present' }
  | { status: 'absent' }
  | {
      status: 'failed'
      reason: ProbeFailureReason
      statusCode?: number
      message: string
    }

/**
 * Shared key-value store for probe results. Holds the pending promise so
 * concurrent probes of one key share a single remote call.
 */
export interface ProbeCache {
  get(key: string): Promise<ProbeOutcome> | undefined
  set(key: string, value: Promise<ProbeOutcome>): void
  delete(key: string): void
  readonly size: number
}

export interface ProbeStats {
  /** Remote calls issued, retries included */
  requests: number
  cacheHits: number
  present: number
  absent: number
  failed: number
  rateLimited: number
  retries: number
}

export interface RemoteFileProberOptions {
  client: ContentsClient
  cache?: ProbeCache
  /** Retries after the first attempt for rate limits, 5xx and network errors */
  maxRetries?: number
  initialDelayMs?: number
  maxDelayMs?: number
  jitter?: boolean
  /** Aborts pending and future probes of this prober */
  signal?: AbortSignal
}
