/**
 * Audit command tests
 *
 * The audit engine is mocked at createAuditContext; config loading, report
 * serialisation and formatting run for real.
 */

import { describe, it, expect, vi, beforeEach, afterEach, beforeAll, afterAll } from 'vitest'
import chalk from 'chalk'
import { CommanderError, InvalidArgumentError } from 'commander'
import {
  ConfigError,
  TaskViewResolutionError,
  type AuditRunOptions,
  type PackageCheckResult,
} from '@ctv-audit/core'
import { ALL_PASS, createReport } from './fixtures.js'

// ============================================================================
// Mock Setup - Must be before imports
// ============================================================================

const mocks = vi.hoisted(() => {
  const spinner = {
    start: vi.fn().mockReturnThis(),
    stop: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    warn: vi.fn().mockReturnThis(),
    text: '',
  }
  return {
    spinner,
    ora: vi.fn(() => spinner),
    audit: vi.fn(),
    auditPackages: vi.fn(),
    createAuditContext: vi.fn(),
  }
})

vi.mock('@ctv-audit/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@ctv-audit/core')>()
  return {
    ...actual,
    createAuditContext: (...args: unknown[]) => {
      mocks.createAuditContext(...args)
      return {
        auditor: { audit: mocks.audit, auditPackages: mocks.auditPackages },
      }
    },
  }
})

vi.mock('ora', () => ({
  default: mocks.ora,
}))

import {
  INTERRUPTED_EXIT_CODE,
  createAuditCommand,
  createChecksCommand,
  createPackagesCommand,
  parsePositiveInt,
  runAudit,
} from '../src/commands/audit.js'

const mockConsoleLog = vi.fn()
const mockConsoleError = vi.fn()

const ALPHA_RESULT: PackageCheckResult = {
  package: 'alpha',
  repository: { owner: 'foo', repo: 'alpha' },
  checks: ALL_PASS,
}

describe('audit commands', () => {
  let originalLevel: typeof chalk.level
  let spies: Array<{ mockRestore(): void }> = []

  beforeAll(() => {
    originalLevel = chalk.level
    chalk.level = 0
  })

  afterAll(() => {
    chalk.level = originalLevel
  })

  beforeEach(() => {
    vi.clearAllMocks()
    mocks.spinner.text = ''
    spies = [
      vi.spyOn(console, 'log').mockImplementation(mockConsoleLog),
      vi.spyOn(console, 'error').mockImplementation(mockConsoleError),
      vi.spyOn(process, 'exit').mockImplementation((code) => {
        throw new Error(`process.exit(${String(code)})`)
      }),
    ]
  })

  afterEach(() => {
    for (const spy of spies) {
      spy.mockRestore()
    }
    process.exitCode = undefined
  })

  describe('command registration', () => {
    it('audit takes a task view and the shared options', () => {
      const cmd = createAuditCommand()

      expect(cmd.name()).toBe('audit')
      expect(cmd.registeredArguments.map((arg) => arg.name())).toEqual(['task-view'])
      expect(cmd.options.map((option) => option.short)).toEqual(['-t', '-c', '-n', '-j'])
      expect(cmd.options.map((option) => option.long)).toEqual([
        '--token',
        '--concurrency',
        '--top',
        '--json',
      ])
    })

    it('packages takes a variadic list of names', () => {
      const cmd = createPackagesCommand()

      expect(cmd.name()).toBe('packages')
      expect(cmd.registeredArguments[0]?.variadic).toBe(true)
    })

    it('checks has a json option', () => {
      const cmd = createChecksCommand()

      expect(cmd.name()).toBe('checks')
      expect(cmd.options.map((option) => option.long)).toEqual(['--json'])
    })
  })

  describe('parsePositiveInt', () => {
    it('accepts positive integers', () => {
      expect(parsePositiveInt('3')).toBe(3)
      expect(parsePositiveInt(' 12 ')).toBe(12)
    })

    it.each(['0', '-2', 'abc', '1.5', ''])('rejects %j', (value) => {
      expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError)
    })
  })

  describe('runAudit', () => {
    it('prints a JSON report for a task view', async () => {
      mocks.audit.mockResolvedValue(createReport())

      await runAudit({ kind: 'taskView', name: 'Tiny' }, { json: true })

      expect(mocks.ora).toHaveBeenCalledWith({ isSilent: true })
      expect(mocks.audit).toHaveBeenCalledWith(
        'Tiny',
        expect.objectContaining({ signal: expect.any(AbortSignal) })
      )
      expect(mocks.spinner.start).toHaveBeenCalledWith('Resolving task view Tiny...')
      expect(mocks.spinner.succeed).toHaveBeenCalledWith('Audited 3 packages (1 excluded)')

      expect(mockConsoleLog).toHaveBeenCalledTimes(1)
      const json: unknown = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]))
      expect(json).toMatchObject({
        taskView: 'Tiny',
        packageCount: 3,
        aborted: false,
        rows: [
          { package: 'alpha', rank: 1, total: 9, repository: 'foo/alpha' },
          { package: 'beta', rank: 2, total: 8, repository: 'foo/beta' },
          { package: 'gamma', rank: 3, total: 1, repository: null },
        ],
      })
      expect(process.exitCode).toBeUndefined()
    })

    it('prints tables by default', async () => {
      mocks.audit.mockResolvedValue(createReport())

      await runAudit({ kind: 'taskView', name: 'Tiny' }, { top: 1 })

      expect(mocks.ora).toHaveBeenCalledWith({ isSilent: false })
      const output = String(mockConsoleLog.mock.calls[0]?.[0])
      expect(output).toContain('=== Task view Tiny ===')
      expect(output).toContain('Showing 1 of 3 packages')
    })

    it('audits an explicit package list', async () => {
      mocks.auditPackages.mockResolvedValue(createReport({ taskView: null }))

      await runAudit({ kind: 'packages', names: ['alpha', 'beta'] }, { json: true })

      expect(mocks.spinner.start).toHaveBeenCalledWith('Auditing 2 packages...')
      expect(mocks.auditPackages).toHaveBeenCalledWith(['alpha', 'beta'], expect.any(Object))
      expect(mocks.audit).not.toHaveBeenCalled()
    })

    it('passes token and concurrency into the configuration', async () => {
      mocks.audit.mockResolvedValue(createReport())

      await runAudit({ kind: 'taskView', name: 'Tiny' }, { token: 'test-token', concurrency: 2 })

      expect(mocks.createAuditContext).toHaveBeenCalledWith(
        expect.objectContaining({ githubToken: 'test-token', concurrency: 2 }),
        expect.objectContaining({ signal: expect.any(AbortSignal) })
      )
    })

    it('reports progress on the spinner', async () => {
      mocks.audit.mockImplementation(async (_name: string, options: AuditRunOptions) => {
        options.onPackage?.(ALPHA_RESULT)
        options.onFailure?.({ package: 'ghost', reason: 'unknown_package', message: 'Unknown package: ghost' })
        return createReport()
      })

      await runAudit({ kind: 'taskView', name: 'Tiny' }, { json: true })

      expect(mocks.spinner.text).toBe('Audited 2 packages (1 excluded)...')
    })

    it('stops on SIGINT and exits with the interrupted status', async () => {
      const listenersBefore = process.listenerCount('SIGINT')
      mocks.audit.mockImplementation(async (_name: string, options: AuditRunOptions) => {
        const handler = process.listeners('SIGINT').at(-1)
        handler?.('SIGINT')
        return createReport({ aborted: options.signal?.aborted ?? false })
      })

      await runAudit({ kind: 'taskView', name: 'Tiny' }, {})

      expect(mocks.spinner.warn).toHaveBeenCalledWith('Interrupted after 3 packages')
      expect(mocks.spinner.succeed).not.toHaveBeenCalled()
      expect(process.exitCode).toBe(INTERRUPTED_EXIT_CODE)
      expect(String(mockConsoleLog.mock.calls[0]?.[0]).split('\n').at(-1)).toBe(
        'Audit interrupted: 3 of 4 packages scored'
      )
      expect(process.listenerCount('SIGINT')).toBe(listenersBefore)
    })

    it('prints the error and exits with status 1 on failure', async () => {
      mocks.audit.mockRejectedValue(
        new TaskViewResolutionError('Task view "Nope" not found', { taskView: 'Nope' })
      )

      await expect(runAudit({ kind: 'taskView', name: 'Nope' }, {})).rejects.toThrow(
        'process.exit(1)'
      )

      expect(mocks.spinner.fail).toHaveBeenCalledWith('Audit failed')
      expect(mockConsoleError).toHaveBeenCalledWith(
        'Error [TASK_VIEW_RESOLUTION_ERROR]:',
        'Task view "Nope" not found'
      )
      expect(mockConsoleLog).not.toHaveBeenCalled()
    })

    it('prints a plain error without a code', async () => {
      mocks.audit.mockRejectedValue(new Error('socket hang up'))

      await expect(runAudit({ kind: 'taskView', name: 'Tiny' }, {})).rejects.toThrow(
        'process.exit(1)'
      )

      expect(mockConsoleError).toHaveBeenCalledWith('Error:', 'socket hang up')
    })

    it('includes the error code in JSON output', async () => {
      mocks.audit.mockRejectedValue(
        new ConfigError('Invalid configuration: concurrency: Number must be greater than or equal to 1')
      )

      await expect(runAudit({ kind: 'taskView', name: 'Tiny' }, { json: true })).rejects.toThrow(
        'process.exit(1)'
      )

      expect(mockConsoleError).toHaveBeenCalledWith(
        JSON.stringify({
          error: 'Invalid configuration: concurrency: Number must be greater than or equal to 1',
          code: 'CONFIG_ERROR',
        })
      )
    })

    it('prints the error as JSON under --json', async () => {
      mocks.audit.mockRejectedValue(new Error('Bad credentials: Bearer test-token'))

      await expect(runAudit({ kind: 'taskView', name: 'Tiny' }, { json: true })).rejects.toThrow(
        'process.exit(1)'
      )

      expect(mockConsoleError).toHaveBeenCalledWith(
        JSON.stringify({ error: 'Bad credentials: Bearer [REDACTED]' })
      )
    })
  })

  describe('argument parsing', () => {
    it('runs the audit command with parsed options', async () => {
      mocks.audit.mockResolvedValue(createReport())

      await createAuditCommand().parseAsync(['node', 'audit', 'Tiny', '-c', '4', '-t', 'test-token', '-j'])

      expect(mocks.audit).toHaveBeenCalledWith('Tiny', expect.any(Object))
      expect(mocks.createAuditContext).toHaveBeenCalledWith(
        expect.objectContaining({ githubToken: 'test-token', concurrency: 4 }),
        expect.any(Object)
      )
    })

    it('rejects a non-positive concurrency', async () => {
      const cmd = createAuditCommand()
        .exitOverride()
        .configureOutput({ writeErr: () => undefined })

      await expect(cmd.parseAsync(['node', 'audit', 'Tiny', '-c', '0'])).rejects.toBeInstanceOf(
        CommanderError
      )
      expect(mocks.audit).not.toHaveBeenCalled()
    })

    it('lists the checks as JSON', async () => {
      await createChecksCommand().parseAsync(['node', 'checks', '--json'])

      const checks: unknown = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]))
      expect(Array.isArray(checks) && checks.length).toBe(9)
      expect(checks).toEqual(
        expect.arrayContaining([
          expect.objectContaining({ id: 'has_github_url', kind: 'descriptor' }),
          expect.objectContaining({ id: 'uses_gha', kind: 'repository' }),
        ])
      )
    })
  })
})
