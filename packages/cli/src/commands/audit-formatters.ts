/**
 * Audit Command Formatters
 *
 * Table rendering for audit reports.
 *
 * @module @ctv-audit/cli/commands/audit-formatters
 */

import chalk from 'chalk'
import Table from 'cli-table3'
import {
  CHECK_IDS,
  toCheckMatrix,
  type AuditReport,
  type CheckDescription,
  type CheckId,
  type MetadataFailure,
  type ProbeStats,
  type ScoreSummary,
} from '@ctv-audit/core'

/**
 * Short column headers for the check matrix
 */
export const CHECK_LABELS: Record<CheckId, string> = {
  has_github_url: 'GitHub',
  uses_roxygen: 'roxygen',
  has_knitr_vignette: 'knitr',
  uses_testing_framework: 'tests',
  has_no_deprecated_dependency: 'no depr.',
  has_rmd_readme: 'Rmd',
  has_md_license: 'LICENSE',
  uses_pkgdown: 'pkgdown',
  uses_gha: 'GHA',
}

export function formatCheckMark(passed: boolean): string {
  return passed ? chalk.green('✓') : chalk.red('✗')
}

/**
 * Colour a total by how many of the nine checks pass
 */
export function formatTotal(total: number): string {
  const text = `${total}/${CHECK_IDS.length}`
  if (total >= 7) return chalk.green(text)
  if (total >= 4) return chalk.yellow(text)
  return chalk.red(text)
}

export function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`
}

/**
 * Ranked check matrix; `top` limits the number of rows shown
 */
export function formatCheckMatrix(summary: ScoreSummary, top?: number): string {
  if (summary.rows.length === 0) {
    return chalk.yellow('No packages were scored.')
  }

  const table = new Table({
    head: [
      chalk.bold('#'),
      chalk.bold('Package'),
      ...CHECK_IDS.map((id) => chalk.bold(CHECK_LABELS[id])),
      chalk.bold('Total'),
    ],
  })

  const matrix = toCheckMatrix(summary)
  const shown = top !== undefined ? matrix.slice(0, top) : matrix
  for (const row of shown) {
    table.push([
      String(row.rank),
      row.package,
      ...CHECK_IDS.map((id) => formatCheckMark(row[id])),
      formatTotal(row.total),
    ])
  }

  const lines = [table.toString()]
  if (shown.length < matrix.length) {
    lines.push(chalk.dim(`Showing ${shown.length} of ${matrix.length} packages`))
  }
  return lines.join('\n')
}

export function formatPassCounts(summary: ScoreSummary): string {
  const table = new Table({
    head: [chalk.bold('Check'), chalk.bold('Passed'), chalk.bold('Rate')],
  })

  for (const count of summary.passCounts) {
    table.push([
      count.check,
      `${count.passed}/${summary.packageCount}`,
      formatPercent(count.rate),
    ])
  }

  return table.toString()
}

export function formatFailures(failures: readonly MetadataFailure[]): string {
  if (failures.length === 0) {
    return ''
  }

  const lines = [chalk.bold.yellow(`Excluded packages (${failures.length}):`)]
  for (const failure of failures) {
    lines.push(`  ${chalk.yellow(failure.package)} ${chalk.dim(`[${failure.reason}]`)} ${failure.message}`)
  }
  return lines.join('\n')
}

/**
 * One-line probe diagnostics; failures are highlighted because they score
 * as absent
 */
export function formatProbeStats(stats: ProbeStats): string {
  const parts = [
    `${stats.requests} requests`,
    `${stats.cacheHits} cache hits`,
    `${stats.present} present`,
    `${stats.absent} absent`,
    `${stats.retries} retries`,
  ]
  const failed =
    stats.failed > 0
      ? chalk.red(`${stats.failed} failed (${stats.rateLimited} rate limited)`)
      : `${stats.failed} failed`
  return `${chalk.bold('Probes:')} ${[...parts, failed].join(', ')}`
}

export interface FormatReportOptions {
  top?: number
}

/**
 * Full human-readable report
 */
export function formatReport(report: AuditReport, options: FormatReportOptions = {}): string {
  const title = report.taskView
    ? `Task view ${report.taskView}`
    : `${report.packages.length} package(s)`

  const sections = [
    chalk.bold.blue(`\n=== ${title} ===\n`),
    formatCheckMatrix(report.summary, options.top),
    '',
    formatPassCounts(report.summary),
  ]

  const failures = formatFailures(report.failures)
  if (failures) {
    sections.push('', failures)
  }

  sections.push('', formatProbeStats(report.probeStats))

  if (report.aborted) {
    sections.push(
      chalk.yellow(
        `\nAudit interrupted: ${report.summary.packageCount} of ${report.packages.length} packages scored`
      )
    )
  }

  return sections.join('\n')
}

export function formatCheckDescriptions(checks: readonly CheckDescription[]): string {
  const table = new Table({
    head: [chalk.bold('Check'), chalk.bold('Kind'), chalk.bold('Description')],
  })
  for (const check of checks) {
    table.push([check.id, check.kind, check.description])
  }
  return table.toString()
}
