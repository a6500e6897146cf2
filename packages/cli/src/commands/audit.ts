/**
 * Audit Commands
 *
 * Usage:
 *   ctv-audit audit Spatial                 # Audit a task view
 *   ctv-audit audit Spatial --top 20        # Show the 20 best-scoring packages
 *   ctv-audit audit Spatial --json          # Machine-readable report
 *   ctv-audit packages sf terra stars       # Audit an ad-hoc package list
 *   ctv-audit checks                        # List the nine checks
 *
 * Ctrl-C stops scheduling packages; the packages already scored are printed.
 */

import { Command, InvalidArgumentError } from 'commander'
import chalk from 'chalk'
import ora from 'ora'
import {
  createAuditContext,
  describeChecks,
  isAuditError,
  loadConfig,
  toJsonReport,
  type AuditReport,
  type AuditRunOptions,
} from '@ctv-audit/core'
import { sanitizeError } from '../utils/sanitize.js'
import { formatCheckDescriptions, formatReport } from './audit-formatters.js'

/** Conventional exit status after SIGINT */
export const INTERRUPTED_EXIT_CODE = 130

export type AuditTarget =
  | { kind: 'taskView'; name: string }
  | { kind: 'packages'; names: string[] }

export interface AuditCommandOptions {
  token?: string
  concurrency?: number
  json?: boolean
  top?: number
}

/**
 * Commander argument parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  const parsed = parseInt(value, 10)
  if (parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

/**
 * Run an audit and print the report
 */
export async function runAudit(target: AuditTarget, options: AuditCommandOptions): Promise<void> {
  const spinner = ora({ isSilent: options.json === true })
  const controller = new AbortController()

  const onInterrupt = (): void => {
    spinner.text = 'Interrupted; waiting for in-flight packages...'
    controller.abort()
  }
  process.once('SIGINT', onInterrupt)

  try {
    const config = loadConfig(process.env, {
      githubToken: options.token,
      concurrency: options.concurrency,
    })
    const { auditor } = createAuditContext(config, { signal: controller.signal })

    let scored = 0
    let excluded = 0
    const progress = (): void => {
      spinner.text = `Audited ${scored + excluded} packages (${excluded} excluded)...`
    }
    const runOptions: AuditRunOptions = {
      signal: controller.signal,
      onPackage: () => {
        scored++
        progress()
      },
      onFailure: () => {
        excluded++
        progress()
      },
    }

    let report: AuditReport
    if (target.kind === 'taskView') {
      spinner.start(`Resolving task view ${target.name}...`)
      report = await auditor.audit(target.name, runOptions)
    } else {
      spinner.start(`Auditing ${target.names.length} packages...`)
      report = await auditor.auditPackages(target.names, runOptions)
    }

    if (report.aborted) {
      spinner.warn(`Interrupted after ${report.summary.packageCount} packages`)
      process.exitCode = INTERRUPTED_EXIT_CODE
    } else {
      spinner.succeed(
        `Audited ${report.summary.packageCount} packages (${report.failures.length} excluded)`
      )
    }

    if (options.json) {
      console.log(JSON.stringify(toJsonReport(report), null, 2))
    } else {
      console.log(formatReport(report, { top: options.top }))
    }
  } catch (error) {
    spinner.fail('Audit failed')

    const code = isAuditError(error) ? error.code : undefined
    if (options.json) {
      console.error(JSON.stringify({ error: sanitizeError(error), code }))
    } else {
      console.error(chalk.red(code ? `Error [${code}]:` : 'Error:'), sanitizeError(error))
    }
    process.exit(1)
  } finally {
    process.off('SIGINT', onInterrupt)
  }
}

function withAuditOptions(cmd: Command): Command {
  return cmd
    .option('-t, --token <token>', 'GitHub token (default: $GITHUB_TOKEN)')
    .option('-c, --concurrency <number>', 'Packages audited at once (default: 8)', parsePositiveInt)
    .option('-n, --top <number>', 'Show only the N best-scoring packages', parsePositiveInt)
    .option('-j, --json', 'Output the report as JSON')
}

/**
 * Create audit command
 */
export function createAuditCommand(): Command {
  const cmd = new Command('audit')
    .description('Audit every package of a CRAN Task View against the nine best-practice checks')
    .argument('<task-view>', 'Task view name, e.g. Spatial')

  return withAuditOptions(cmd).action(async (taskView: string, opts: AuditCommandOptions) => {
    await runAudit({ kind: 'taskView', name: taskView }, opts)
  })
}

/**
 * Create packages command
 */
export function createPackagesCommand(): Command {
  const cmd = new Command('packages')
    .description('Audit an explicit list of packages')
    .argument('<names...>', 'Package names')

  return withAuditOptions(cmd).action(async (names: string[], opts: AuditCommandOptions) => {
    await runAudit({ kind: 'packages', names }, opts)
  })
}

/**
 * Create checks command
 */
export function createChecksCommand(): Command {
  return new Command('checks')
    .description('List the checks and what each one looks for')
    .option('-j, --json', 'Output as JSON')
    .action((opts: { json?: boolean }) => {
      const checks = describeChecks()
      if (opts.json) {
        console.log(JSON.stringify(checks, null, 2))
      } else {
        console.log(formatCheckDescriptions(checks))
      }
    })
}

export default createAuditCommand
