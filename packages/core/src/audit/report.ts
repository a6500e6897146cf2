import { formatRepositoryRef } from '../locator/RepositoryLocator.js'
import type { ProbeStats } from '../probe/types.js'
import { toCheckMatrix, type CheckMatrixRow } from '../scoring/ScoreAggregator.js'
import { CHECK_IDS, type CheckId, type CheckPassCount } from '../types/audit.js'
import type { AuditReport, MetadataFailure } from './types.js'

export interface JsonReport {
  taskView: string | null
  startedAt: string
  completedAt: string
  aborted: boolean
  checks: readonly CheckId[]
  packageCount: number
  rows: Array<CheckMatrixRow & { repository: string | null }>
  passCounts: CheckPassCount[]
  failures: MetadataFailure[]
  probeStats: ProbeStats
}

/**
 * Plain-data form of a report for JSON output
 */
export function toJsonReport(report: AuditReport): JsonReport {
  const matrix = toCheckMatrix(report.summary)
  return {
    taskView: report.taskView,
    startedAt: report.startedAt,
    completedAt: report.completedAt,
    aborted: report.aborted,
    checks: CHECK_IDS,
    packageCount: report.summary.packageCount,
    rows: matrix.map((row, index) => {
      const repository = report.summary.rows[index]?.repository ?? null
      return {
        ...row,
        repository: repository ? formatRepositoryRef(repository) : null,
      }
    }),
    passCounts: report.summary.passCounts,
    failures: report.failures,
    probeStats: report.probeStats,
  }
}
