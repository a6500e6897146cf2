/**
 * Audit configuration from environment variables
 *
 * | Variable                   | Default                           |
 * | -------------------------- | --------------------------------- |
 * | GITHUB_TOKEN / GITHUB_PAT  | none (60 unauthenticated req/h)   |
 * | CTV_AUDIT_GITHUB_API_URL   | https://api.github.com            |
 * | CTV_AUDIT_TASK_VIEW_URL    | https://raw.githubusercontent.com |
 * | CTV_AUDIT_METADATA_URL     | https://crandb.r-pkg.org          |
 * | CTV_AUDIT_CONCURRENCY      | 8                                 |
 * | CTV_AUDIT_MAX_RETRIES      | 3                                 |
 * | CTV_AUDIT_TIMEOUT_MS       | 15000                             |
 */

import { z } from 'zod'
import { ConfigError } from '../errors/index.js'
import { DEFAULT_GITHUB_API_URL } from '../probe/GitHubContentsClient.js'
import { DEFAULT_METADATA_URL } from '../metadata/MetadataSource.js'
import { DEFAULT_TASK_VIEW_URL } from '../taskview/TaskViewSource.js'

export const AuditConfigSchema = z.object({
  githubToken: z.string().min(1).optional(),
  githubApiUrl: z.string().url().default(DEFAULT_GITHUB_API_URL),
  taskViewUrl: z.string().url().default(DEFAULT_TASK_VIEW_URL),
  metadataUrl: z.string().url().default(DEFAULT_METADATA_URL),
  concurrency: z.coerce.number().int().min(1).max(64).default(8),
  maxRetries: z.coerce.number().int().min(0).max(10).default(3),
  timeoutMs: z.coerce.number().int().min(100).max(300_000).default(15_000),
})

export type AuditConfig = z.infer<typeof AuditConfigSchema>

/**
 * Raw values; numbers may arrive as strings from the environment or argv
 */
export interface AuditConfigInput {
  githubToken?: string
  githubApiUrl?: string
  taskViewUrl?: string
  metadataUrl?: string
  concurrency?: number | string
  maxRetries?: number | string
  timeoutMs?: number | string
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim()
}

/**
 * Validate configuration values
 *
 * @throws ConfigError listing every invalid field
 */
export function parseConfig(input: AuditConfigInput): AuditConfig {
  const result = AuditConfigSchema.safeParse(input)
  if (!result.success) {
    const fields = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigError(`Invalid configuration: ${fields.join('; ')}`, {
      cause: result.error,
      context: { fields },
    })
  }
  return result.data
}

/**
 * Read configuration from the environment, with optional overrides (CLI flags)
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: AuditConfigInput = {}
): AuditConfig {
  const fromEnv: AuditConfigInput = {
    githubToken: nonEmpty(env.GITHUB_TOKEN) ?? nonEmpty(env.GITHUB_PAT),
    githubApiUrl: nonEmpty(env.CTV_AUDIT_GITHUB_API_URL),
    taskViewUrl: nonEmpty(env.CTV_AUDIT_TASK_VIEW_URL),
    metadataUrl: nonEmpty(env.CTV_AUDIT_METADATA_URL),
    concurrency: nonEmpty(env.CTV_AUDIT_CONCURRENCY),
    maxRetries: nonEmpty(env.CTV_AUDIT_MAX_RETRIES),
    timeoutMs: nonEmpty(env.CTV_AUDIT_TIMEOUT_MS),
  }

  const merged: AuditConfigInput = { ...fromEnv }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value })
    }
  }
  return parseConfig(merged)
}
