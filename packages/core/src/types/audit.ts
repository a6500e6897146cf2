/**
 * Core types for task-view compliance audits
 */

/**
 * Dependency fields of an R package DESCRIPTION, in declaration order
 */
export const DEPENDENCY_KINDS = ['Depends', 'Imports', 'LinkingTo', 'Suggests', 'Enhances'] as const

export type DependencyKind = (typeof DEPENDENCY_KINDS)[number]

export interface Dependency {
  package: string
  kind: DependencyKind
}

/**
 * Metadata for one audited package, as declared in its DESCRIPTION
 */
export interface PackageRecord {
  /** Package name (unique key) */
  readonly name: string
  /** Free text, may hold several comma or whitespace separated URLs */
  readonly url: string | null
  readonly bugReports: string | null
  /** Present when the package documentation is generated with roxygen2 */
  readonly roxygenNote: string | null
  readonly vignetteBuilder: string | null
  readonly dependencies: readonly Dependency[]
}

/**
 * GitHub repository a package is developed in
 */
export interface RepositoryRef {
  readonly owner: string
  readonly repo: string
}

export const DESCRIPTOR_CHECK_IDS = [
  'has_github_url',
  'uses_roxygen',
  'has_knitr_vignette',
  'uses_testing_framework',
  'has_no_deprecated_dependency',
] as const

export const REPOSITORY_CHECK_IDS = [
  'has_rmd_readme',
  'has_md_license',
  'uses_pkgdown',
  'uses_gha',
] as const

export type DescriptorCheckId = (typeof DESCRIPTOR_CHECK_IDS)[number]
export type RepositoryCheckId = (typeof REPOSITORY_CHECK_IDS)[number]
export type CheckId = DescriptorCheckId | RepositoryCheckId

/**
 * All checks, in reporting order
 */
export const CHECK_IDS: readonly CheckId[] = [...DESCRIPTOR_CHECK_IDS, ...REPOSITORY_CHECK_IDS]

export type DescriptorCheckResult = Record<DescriptorCheckId, boolean>
export type RepositoryCheckResult = Record<RepositoryCheckId, boolean>

/**
 * Pass/fail for every check of one package. Always carries all keys.
 */
export type CheckResult = Record<CheckId, boolean>

/**
 * Evaluated checks for one package, before ranking
 */
export interface PackageCheckResult {
  package: string
  repository: RepositoryRef | null
  checks: CheckResult
}

/**
 * One ranked row of the check matrix
 */
export interface ScoreRow {
  readonly package: string
  /** 1-based position in the ranking */
  readonly rank: number
  readonly repository: RepositoryRef | null
  readonly checks: Readonly<CheckResult>
  /** Number of passed checks, derived from `checks` */
  readonly total: number
}

export interface CheckPassCount {
  check: CheckId
  passed: number
  /** passed / packageCount, 0 when no packages were scored */
  rate: number
}

export interface ScoreSummary {
  rows: ScoreRow[]
  passCounts: CheckPassCount[]
  packageCount: number
}
