import { aggregateScores, type AuditReport, type CheckResult } from '@ctv-audit/core'

export const ALL_PASS: CheckResult = {
  has_github_url: true,
  uses_roxygen: true,
  has_knitr_vignette: true,
  uses_testing_framework: true,
  has_no_deprecated_dependency: true,
  has_rmd_readme: true,
  has_md_license: true,
  uses_pkgdown: true,
  uses_gha: true,
}

export const NONE_PASS: CheckResult = {
  has_github_url: false,
  uses_roxygen: false,
  has_knitr_vignette: false,
  uses_testing_framework: false,
  has_no_deprecated_dependency: true,
  has_rmd_readme: false,
  has_md_license: false,
  uses_pkgdown: false,
  uses_gha: false,
}

/**
 * alpha 9/9, beta 8/9, gamma 1/9
 */
export function createSummary() {
  return aggregateScores([
    { package: 'gamma', repository: null, checks: NONE_PASS },
    { package: 'alpha', repository: { owner: 'foo', repo: 'alpha' }, checks: ALL_PASS },
    {
      package: 'beta',
      repository: { owner: 'foo', repo: 'beta' },
      checks: { ...ALL_PASS, uses_gha: false },
    },
  ])
}

export function createReport(overrides: Partial<AuditReport> = {}): AuditReport {
  return {
    taskView: 'Tiny',
    packages: ['alpha', 'beta', 'gamma', 'ghost'],
    summary: createSummary(),
    failures: [{ package: 'ghost', reason: 'unknown_package', message: 'Unknown package: ghost' }],
    probeStats: {
      requests: 8,
      cacheHits: 0,
      present: 6,
      absent: 2,
      failed: 0,
      rateLimited: 0,
      retries: 0,
    },
    aborted: false,
    startedAt: '2026-01-05T10:00:00.000Z',
    completedAt: '2026-01-05T10:00:04.000Z',
    ...overrides,
  }
}
