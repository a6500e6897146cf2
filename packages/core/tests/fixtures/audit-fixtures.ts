/**
 * Shared fakes for audit tests. Nothing here touches the network.
 */

import { createPackageRecord, type PackageRecordInput } from '../../src/metadata/package-record.js'
import type { ContentsClient, ContentsResponse } from '../../src/probe/types.js'
import type { PackageRecord, RepositoryRef } from '../../src/types/audit.js'

export type FakeResponse = number | { status: number; headers?: Record<string, string> } | Error

function toResponse(response: number | { status: number; headers?: Record<string, string> }): ContentsResponse {
  if (typeof response === 'number') {
    return { status: response, headers: new Headers() }
  }
  return { status: response.status, headers: new Headers(response.headers ?? {}) }
}

/**
 * Contents client answering from a table keyed by `owner/repo:path`.
 * Queued responses are consumed in order; the last one repeats. Unknown keys
 * answer with the fallback (404 unless given).
 */
export class FakeContentsClient implements ContentsClient {
  readonly calls: string[] = []
  private readonly responses = new Map<string, FakeResponse[]>()

  constructor(private readonly fallback: FakeResponse = 404) {}

  respond(key: string, ...responses: FakeResponse[]): this {
    this.responses.set(key, responses)
    return this
  }

  callsFor(key: string): number {
    return this.calls.filter((call) => call === key).length
  }

  async getContents(repo: RepositoryRef, path: string): Promise<ContentsResponse> {
    const key = `${repo.owner}/${repo.repo}:${path}`
    this.calls.push(key)

    const queue = this.responses.get(key)
    const next = queue && queue.length > 1 ? queue.shift() : queue?.[0]
    const response = next ?? this.fallback
    if (response instanceof Error) {
      throw response
    }
    return toResponse(response)
  }
}

/**
 * Contents client that never answers until the signal aborts
 */
export class HangingContentsClient implements ContentsClient {
  calls = 0

  getContents(_repo: RepositoryRef, _path: string, signal?: AbortSignal): Promise<ContentsResponse> {
    this.calls++
    return new Promise((_resolve, reject) => {
      signal?.addEventListener(
        'abort',
        () => {
          const error = new Error('This operation was aborted')
          error.name = 'AbortError'
          reject(error)
        },
        { once: true }
      )
    })
  }
}

/**
 * Every descriptor check passes
 */
export function compliantRecord(name: string, overrides: Partial<PackageRecordInput> = {}): PackageRecord {
  return createPackageRecord({
    name,
    url: `https://github.com/owner${name}/${name}`,
    roxygenNote: '7.3.2',
    vignetteBuilder: 'knitr',
    dependencies: [{ package: 'testthat', kind: 'Suggests' }],
    ...overrides,
  })
}

export function bareRecord(name: string, overrides: Partial<PackageRecordInput> = {}): PackageRecord {
  return createPackageRecord({ name, ...overrides })
}

export const NETWORK_TIMEOUT = Object.assign(new Error('connect ETIMEDOUT 140.82.112.6:443'), {
  code: 'ETIMEDOUT',
})
