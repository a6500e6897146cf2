/**
 * Wires the default adapters into a ready-to-run auditor
 *
 * @example
 * const { auditor } = createAuditContext(loadConfig())
 * const report = await auditor.audit('Spatial')
 */

import { ComplianceAuditor } from './audit/ComplianceAuditor.js'
import type { AuditConfig } from './config/index.js'
import { CranDbMetadataSource, type MetadataSource } from './metadata/MetadataSource.js'
import { GitHubContentsClient } from './probe/GitHubContentsClient.js'
import { LruProbeCache } from './probe/ProbeCache.js'
import { RemoteFileProber } from './probe/RemoteFileProber.js'
import type { ContentsClient, ProbeCache } from './probe/types.js'
import { GitHubTaskViewSource, type TaskViewSource } from './taskview/TaskViewSource.js'
import type { Logger } from './utils/logger.js'

export interface AuditContext {
  auditor: ComplianceAuditor
  prober: RemoteFileProber
  cache: ProbeCache
}

export interface AuditContextOptions {
  /** Aborts in-flight probes; pass the same signal to `audit()` */
  signal?: AbortSignal
  logger?: Logger
  /** Replacements for the network-backed defaults */
  taskViews?: TaskViewSource
  metadata?: MetadataSource
  contents?: ContentsClient
  cache?: ProbeCache
}

export function createAuditContext(
  config: AuditConfig,
  options: AuditContextOptions = {}
): AuditContext {
  const retry = { maxRetries: config.maxRetries }
  const cache = options.cache ?? new LruProbeCache()

  const prober = new RemoteFileProber(
    {
      client:
        options.contents ??
        new GitHubContentsClient({
          baseUrl: config.githubApiUrl,
          token: config.githubToken,
          timeoutMs: config.timeoutMs,
        }),
      cache,
      maxRetries: config.maxRetries,
      signal: options.signal,
    },
    options.logger
  )

  const auditor = new ComplianceAuditor({
    taskViews:
      options.taskViews ??
      new GitHubTaskViewSource(
        { baseUrl: config.taskViewUrl, timeoutMs: config.timeoutMs, retry },
        options.logger
      ),
    metadata:
      options.metadata ??
      new CranDbMetadataSource(
        { baseUrl: config.metadataUrl, timeoutMs: config.timeoutMs, retry },
        options.logger
      ),
    prober,
    concurrency: config.concurrency,
    logger: options.logger,
  })

  return { auditor, prober, cache }
}
