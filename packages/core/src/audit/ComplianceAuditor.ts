/**
 * Compliance Auditor
 *
 * Runs a task-view audit end to end: resolve the view, fetch metadata for
 * each package, evaluate the nine checks, aggregate. Packages are independent;
 * one package failing never affects the others.
 */

import { evaluatePackage } from '../checks/index.js'
import { MetadataFetchError, getErrorMessage } from '../errors/index.js'
import type { MetadataSource } from '../metadata/MetadataSource.js'
import type { RemoteFileProber } from '../probe/RemoteFileProber.js'
import { aggregateScores } from '../scoring/ScoreAggregator.js'
import type { TaskViewSource } from '../taskview/TaskViewSource.js'
import type { PackageCheckResult, PackageRecord } from '../types/audit.js'
import { asyncPool } from '../utils/async-pool.js'
import { createAuditEvent, createLogger, type Logger } from '../utils/logger.js'
import type { AuditReport, AuditRunOptions, MetadataFailure } from './types.js'

export const DEFAULT_CONCURRENCY = 8

export interface ComplianceAuditorOptions {
  taskViews: TaskViewSource
  metadata: MetadataSource
  prober: RemoteFileProber
  /** Packages audited at once (default: 8) */
  concurrency?: number
  logger?: Logger
}

function toMetadataFailure(packageName: string, error: unknown): MetadataFailure {
  if (error instanceof MetadataFetchError) {
    return { package: packageName, reason: error.reason, message: error.message }
  }
  return { package: packageName, reason: 'registry_unavailable', message: getErrorMessage(error) }
}

export class ComplianceAuditor {
  private readonly taskViews: TaskViewSource
  private readonly metadata: MetadataSource
  private readonly prober: RemoteFileProber
  private readonly concurrency: number
  private readonly log: Logger

  constructor(options: ComplianceAuditorOptions) {
    this.taskViews = options.taskViews
    this.metadata = options.metadata
    this.prober = options.prober
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY
    this.log = options.logger ?? createLogger('ComplianceAuditor')
  }

  /**
   * Audit every package of a task view.
   *
   * @throws TaskViewResolutionError when the view cannot be resolved
   */
  async audit(taskView: string, options: AuditRunOptions = {}): Promise<AuditReport> {
    const startedAt = new Date()
    const packages = await this.taskViews.resolve(taskView, options.signal)
    this.log.info('Resolved task view', { taskView, packages: packages.length })
    return this.run(taskView, packages, options, startedAt)
  }

  /**
   * Audit an explicit list of packages
   */
  async auditPackages(
    packages: readonly string[],
    options: AuditRunOptions = {}
  ): Promise<AuditReport> {
    return this.run(null, [...new Set(packages)], options, new Date())
  }

  private async run(
    taskView: string | null,
    packages: string[],
    options: AuditRunOptions,
    startedAt: Date
  ): Promise<AuditReport> {
    const { signal, onPackage, onFailure } = options
    const results: PackageCheckResult[] = []
    const failures: MetadataFailure[] = []

    const tasks = packages.map((name) => async () => {
      const result = await this.auditPackage(name, signal)
      if (result === null) {
        return
      }
      if ('checks' in result) {
        results.push(result)
        onPackage?.(result)
      } else {
        failures.push(result)
        onFailure?.(result)
      }
    })

    const settled = await asyncPool(this.concurrency, tasks, () => !signal?.aborted)
    for (const outcome of settled) {
      // auditPackage never rejects; a thrown callback is a caller bug
      if (outcome instanceof Error) {
        this.log.error('Package task failed', outcome)
      }
    }

    const aborted = signal?.aborted ?? false
    if (aborted) {
      this.log.warn('Audit aborted; reporting completed packages', {
        completed: results.length,
        requested: packages.length,
      })
    }

    return {
      taskView,
      packages,
      summary: aggregateScores(results),
      failures: failures.sort((a, b) => (a.package < b.package ? -1 : a.package > b.package ? 1 : 0)),
      probeStats: this.prober.getStats(),
      aborted,
      startedAt: startedAt.toISOString(),
      completedAt: new Date().toISOString(),
    }
  }

  private async auditPackage(
    name: string,
    signal?: AbortSignal
  ): Promise<PackageCheckResult | MetadataFailure | null> {
    let record: PackageRecord
    try {
      record = await this.metadata.fetch(name, signal)
    } catch (error) {
      // Interrupted, not unavailable
      if (signal?.aborted) {
        return null
      }
      const failure = toMetadataFailure(name, error)
      this.log.warn('Metadata unavailable; package excluded', { ...failure })
      this.log.auditLog(
        createAuditEvent('metadata.failure', 'ComplianceAuditor', name, 'fetch', 'error', {
          reason: failure.reason,
        })
      )
      return failure
    }

    const result = await evaluatePackage(record, this.prober)
    // Probes cut short by the abort would score as false
    if (signal?.aborted) {
      return null
    }
    this.log.debug('Package evaluated', { package: name, repository: result.repository })
    return result
  }
}
