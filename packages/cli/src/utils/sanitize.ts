/**
 * Error output sanitization
 *
 * Error messages can carry local paths (config files, stack frames) and, when
 * a request URL is echoed, credentials. Both are scrubbed before printing.
 */

import { homedir } from 'os'

const TOKEN_PATTERN = /\b(?:gh[pousr]_[A-Za-z0-9]{20,}|github_pat_[A-Za-z0-9_]{20,})\b/g
const BEARER_PATTERN = /(Bearer\s+)\S+/gi

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Replace the home directory with `~` and redact GitHub tokens
 */
export function sanitizeError(error: unknown, home: string = homedir()): string {
  const message = error instanceof Error ? error.message : String(error)

  let sanitized = home ? message.replace(new RegExp(escapeRegExp(home), 'g'), '~') : message
  sanitized = sanitized.replace(/\/Users\/[^/]+\//g, '~/')
  sanitized = sanitized.replace(/\/home\/[^/]+\//g, '~/')
  sanitized = sanitized.replace(/C:\\Users\\[^\\]+\\/gi, '~\\')

  return sanitized.replace(TOKEN_PATTERN, '[REDACTED]').replace(BEARER_PATTERN, '$1[REDACTED]')
}
