/**
 * GitHub contents API transport for the Remote File Prober
 */

import type { RepositoryRef } from '../types/audit.js'
import { timeoutSignal } from '../utils/abort.js'
import type { ContentsClient, ContentsResponse } from './types.js'

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com'

export interface GitHubContentsClientConfig {
  /** Base URL for API requests (default: https://api.github.com) */
  baseUrl?: string
  /** Personal access token; raises the hourly quota from 60 to 5000 requests */
  token?: string
  /** Per-request timeout in milliseconds (default: 15000) */
  timeoutMs?: number
  userAgent?: string
}

/**
 * Issues `HEAD /repos/{owner}/{repo}/contents/{path}` without a ref, which
 * GitHub resolves against the default branch.
 *
 * @example
 * ```typescript
 * const client = new GitHubContentsClient({ token: process.env.GITHUB_TOKEN })
 * const res = await client.getContents({ owner: 'foo', repo: 'bar' }, 'README.Rmd')
 * res.status // 200 or 404
 * ```
 */
export class GitHubContentsClient implements ContentsClient {
  private readonly baseUrl: string
  private readonly token?: string
  private readonly timeoutMs: number
  private readonly userAgent: string

  constructor(config: GitHubContentsClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_GITHUB_API_URL).replace(/\/+$/, '')
    this.token = config.token
    this.timeoutMs = config.timeoutMs ?? 15000
    this.userAgent = config.userAgent ?? 'ctv-audit'
  }

  buildUrl(repo: RepositoryRef, path: string): string {
    const encodedPath = path.split('/').map(encodeURIComponent).join('/')
    return `${this.baseUrl}/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.repo)}/contents/${encodedPath}`
  }

  async getContents(
    repo: RepositoryRef,
    path: string,
    signal?: AbortSignal
  ): Promise<ContentsResponse> {
    const headers = new Headers({
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
      'User-Agent': this.userAgent,
    })
    if (this.token) {
      headers.set('Authorization', `Bearer ${this.token}`)
    }

    const timeout = timeoutSignal(this.timeoutMs, signal)
    try {
      const response = await fetch(this.buildUrl(repo, path), {
        method: 'HEAD',
        headers,
        signal: timeout.signal,
      })

      return {
        status: response.status,
        headers: response.headers,
      }
    } finally {
      timeout.dispose()
    }
  }
}
