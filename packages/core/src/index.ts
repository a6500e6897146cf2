/**
 * @ctv-audit/core - Compliance audit engine for CRAN Task View packages
 */

// Version
export const VERSION = '0.1.0'

// Domain types
export {
  DEPENDENCY_KINDS,
  DESCRIPTOR_CHECK_IDS,
  REPOSITORY_CHECK_IDS,
  CHECK_IDS,
  type DependencyKind,
  type Dependency,
  type PackageRecord,
  type RepositoryRef,
  type DescriptorCheckId,
  type RepositoryCheckId,
  type CheckId,
  type DescriptorCheckResult,
  type RepositoryCheckResult,
  type CheckResult,
  type PackageCheckResult,
  type ScoreRow,
  type CheckPassCount,
  type ScoreSummary,
} from './types/audit.js'

// Errors
export * from './errors/index.js'

// Logging, retry, concurrency
export * from './utils/index.js'

// Repository location
export {
  locateRepository,
  hasGitHubUrl,
  formatRepositoryRef,
  GITHUB_URL_PREFIX,
} from './locator/RepositoryLocator.js'

// Remote file probing
export * from './probe/index.js'

// Checks
export * from './checks/index.js'

// Scoring
export * from './scoring/index.js'

// Task views and package metadata
export * from './taskview/index.js'
export * from './metadata/index.js'

// Orchestration
export * from './audit/index.js'
export {
  loadConfig,
  parseConfig,
  AuditConfigSchema,
  type AuditConfig,
  type AuditConfigInput,
} from './config/index.js'
export {
  createAuditContext,
  type AuditContext,
  type AuditContextOptions,
} from './context.js'
