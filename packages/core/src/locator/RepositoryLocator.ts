/**
 * Repository Locator
 *
 * Extracts the GitHub repository of a package from its free-text URL and
 * BugReports fields. Every GitHub URL pattern used by the audit lives here.
 */

import type { PackageRecord, RepositoryRef } from '../types/audit.js'

export const GITHUB_URL_PREFIX = 'https://github.com/'

/**
 * `https://github.com/<owner>/<repo>` anywhere in the URL field
 */
const URL_PATTERN = /https:\/\/github\.com\/(\w+)\/(\w+)/

/**
 * `https://github.com/<owner>/<repo>/issues` anywhere in the BugReports field
 */
const BUG_REPORTS_PATTERN = /https:\/\/github\.com\/(\w+)\/(\w+)\/issues/

function matchRepository(value: string | null, pattern: RegExp): RepositoryRef | null {
  if (!value) return null

  // Non-global pattern: only the first occurrence counts
  const match = pattern.exec(value)
  const owner = match?.[1]
  const repo = match?.[2]
  if (!owner || !repo) return null

  return { owner, repo }
}

/**
 * Locate the GitHub repository of a package.
 *
 * The URL field takes priority over BugReports. Returns null when neither
 * field holds a recognised GitHub URL.
 *
 * @example
 * ```typescript
 * locateRepository({ ...record, url: 'https://github.com/foo/bar, https://foo.dev' })
 * // => { owner: 'foo', repo: 'bar' }
 * ```
 */
export function locateRepository(record: PackageRecord): RepositoryRef | null {
  return (
    matchRepository(record.url, URL_PATTERN) ??
    matchRepository(record.bugReports, BUG_REPORTS_PATTERN)
  )
}

/**
 * True when either field starts with the GitHub URL prefix
 */
export function hasGitHubUrl(record: PackageRecord): boolean {
  return (
    (record.url?.startsWith(GITHUB_URL_PREFIX) ?? false) ||
    (record.bugReports?.startsWith(GITHUB_URL_PREFIX) ?? false)
  )
}

export function formatRepositoryRef(ref: RepositoryRef): string {
  return `${ref.owner}/${ref.repo}`
}
