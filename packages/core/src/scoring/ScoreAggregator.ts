/**
 * Score Aggregator
 *
 * Turns per-package check results into a ranked check matrix and per-check
 * pass counts. Pure: the same results give the same summary whatever order
 * they arrive in.
 */

import {
  CHECK_IDS,
  type CheckId,
  type CheckPassCount,
  type CheckResult,
  type PackageCheckResult,
  type ScoreRow,
  type ScoreSummary,
} from '../types/audit.js'

/**
 * Number of passed checks
 */
export function scoreTotal(checks: CheckResult): number {
  return CHECK_IDS.reduce((total, id) => (checks[id] ? total + 1 : total), 0)
}

/**
 * Copy of `checks` holding exactly the known check ids
 */
function normalizeChecks(checks: CheckResult): CheckResult {
  return {
    has_github_url: checks.has_github_url === true,
    uses_roxygen: checks.uses_roxygen === true,
    has_knitr_vignette: checks.has_knitr_vignette === true,
    uses_testing_framework: checks.uses_testing_framework === true,
    has_no_deprecated_dependency: checks.has_no_deprecated_dependency === true,
    has_rmd_readme: checks.has_rmd_readme === true,
    has_md_license: checks.has_md_license === true,
    uses_pkgdown: checks.uses_pkgdown === true,
    uses_gha: checks.uses_gha === true,
  }
}

/**
 * Descending total, then package name in code-unit order
 */
export function compareRows(
  a: Pick<ScoreRow, 'package' | 'total'>,
  b: Pick<ScoreRow, 'package' | 'total'>
): number {
  if (a.total !== b.total) {
    return b.total - a.total
  }
  if (a.package < b.package) return -1
  if (a.package > b.package) return 1
  return 0
}

/**
 * Rank package results. Ranks are 1-based positions.
 */
export function rankRows(results: readonly PackageCheckResult[]): ScoreRow[] {
  const unranked = results.map((result) => {
    const checks = normalizeChecks(result.checks)
    return {
      package: result.package,
      repository: result.repository,
      checks,
      total: scoreTotal(checks),
    }
  })

  return unranked.sort(compareRows).map((row, index) =>
    Object.freeze({
      ...row,
      rank: index + 1,
      checks: Object.freeze(row.checks),
    })
  )
}

export function countPasses(rows: readonly Pick<ScoreRow, 'checks'>[]): CheckPassCount[] {
  return CHECK_IDS.map((check) => {
    const passed = rows.filter((row) => row.checks[check]).length
    return {
      check,
      passed,
      rate: rows.length > 0 ? passed / rows.length : 0,
    }
  })
}

export function aggregateScores(results: readonly PackageCheckResult[]): ScoreSummary {
  const rows = rankRows(results)
  return {
    rows,
    passCounts: countPasses(rows),
    packageCount: rows.length,
  }
}

/**
 * Flat row for tables and CSV-like rendering
 */
export type CheckMatrixRow = {
  package: string
  rank: number
  total: number
} & Record<CheckId, boolean>

export function toCheckMatrix(summary: ScoreSummary): CheckMatrixRow[] {
  return summary.rows.map((row) => ({
    package: row.package,
    rank: row.rank,
    total: row.total,
    ...row.checks,
  }))
}
