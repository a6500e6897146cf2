import type { MetadataFailureReason } from '../errors/index.js'
import type { ProbeStats } from '../probe/types.js'
import type { PackageCheckResult, ScoreSummary } from '../types/audit.js'

/**
 * A package left out of the check matrix because its metadata was unavailable
 */
export interface MetadataFailure {
  package: string
  reason: MetadataFailureReason
  message: string
}

export interface AuditRunOptions {
  /** Stops scheduling packages; completed ones stay in the report */
  signal?: AbortSignal
  onPackage?: (result: PackageCheckResult) => void
  onFailure?: (failure: MetadataFailure) => void
}

export interface AuditReport {
  /** null for ad-hoc package lists */
  taskView: string | null
  /** Package names requested, in task-view order */
  packages: string[]
  summary: ScoreSummary
  failures: MetadataFailure[]
  probeStats: ProbeStats
  aborted: boolean
  startedAt: string
  completedAt: string
}
