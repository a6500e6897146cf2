/**
 * Task view resolution
 *
 * A task view is a Markdown document that references its packages with
 * knitr inline calls such as `` `r pkg("sf", priority = "core")` ``.
 */

import { ApiError, TaskViewResolutionError, getErrorMessage } from '../errors/index.js'
import { createAuditEvent, createLogger, type Logger } from '../utils/logger.js'
import { fetchWithRetry, type RetryConfig } from '../utils/retry.js'

/**
 * Resolves a task view name to its ordered package names
 */
export interface TaskViewSource {
  /**
   * @throws TaskViewResolutionError when the view cannot be found or parsed
   */
  resolve(taskView: string, signal?: AbortSignal): Promise<string[]>
}

export const DEFAULT_TASK_VIEW_URL = 'https://raw.githubusercontent.com'

const TASK_VIEW_NAME = /^[A-Za-z][A-Za-z0-9]*$/

/**
 * `pkg("name"...)`, not `bioc_pkg(` or `mypkg(`
 */
const PKG_CALL = /(?<![\w.])pkg\(\s*["']([A-Za-z][A-Za-z0-9.]*)["']/g

/**
 * Package names referenced in a task view, in first-seen order
 */
export function parseTaskViewMarkdown(markdown: string): string[] {
  const seen = new Set<string>()
  for (const match of markdown.matchAll(PKG_CALL)) {
    const name = match[1]
    if (name) {
      seen.add(name)
    }
  }
  return [...seen]
}

export function isValidTaskViewName(taskView: string): boolean {
  return TASK_VIEW_NAME.test(taskView)
}

export interface GitHubTaskViewSourceConfig {
  /** Raw content host (default: https://raw.githubusercontent.com) */
  baseUrl?: string
  /** GitHub organisation hosting one repository per task view */
  organisation?: string
  /** Branch holding the published view */
  branch?: string
  timeoutMs?: number
  retry?: RetryConfig
}

/**
 * Reads `{organisation}/{view}/{branch}/{view}.md` from the raw content host
 */
export class GitHubTaskViewSource implements TaskViewSource {
  private readonly baseUrl: string
  private readonly organisation: string
  private readonly branch: string
  private readonly timeoutMs: number
  private readonly retry: RetryConfig
  private readonly log: Logger

  constructor(config: GitHubTaskViewSourceConfig = {}, log: Logger = createLogger('TaskViewSource')) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_TASK_VIEW_URL).replace(/\/+$/, '')
    this.organisation = config.organisation ?? 'cran-task-views'
    this.branch = config.branch ?? 'main'
    this.timeoutMs = config.timeoutMs ?? 15000
    this.retry = config.retry ?? {}
    this.log = log
  }

  buildUrl(taskView: string): string {
    return `${this.baseUrl}/${this.organisation}/${taskView}/${this.branch}/${taskView}.md`
  }

  async resolve(taskView: string, signal?: AbortSignal): Promise<string[]> {
    if (!isValidTaskViewName(taskView)) {
      throw new TaskViewResolutionError(`Invalid task view name: "${taskView}"`, { taskView })
    }

    const url = this.buildUrl(taskView)
    const markdown = await this.download(taskView, url, signal)
    const packages = parseTaskViewMarkdown(markdown)

    if (packages.length === 0) {
      throw new TaskViewResolutionError(`Task view "${taskView}" lists no packages`, {
        taskView,
        context: { url },
      })
    }

    this.log.auditLog(
      createAuditEvent('taskview.resolve', 'GitHubTaskViewSource', url, 'resolve', 'success', {
        packages: packages.length,
      })
    )
    return packages
  }

  private async download(taskView: string, url: string, signal?: AbortSignal): Promise<string> {
    let response: Response
    try {
      response = await fetchWithRetry(
        url,
        { signal, timeoutMs: this.timeoutMs },
        this.retry
      )
    } catch (error) {
      throw new TaskViewResolutionError(
        `Could not download task view "${taskView}": ${getErrorMessage(error)}`,
        { taskView, cause: error, context: { url } }
      )
    }

    if (!response.ok) {
      await response.body?.cancel()
      const message =
        response.status === 404
          ? `Task view "${taskView}" not found`
          : `Task view "${taskView}" returned HTTP ${response.status}`
      throw new TaskViewResolutionError(message, {
        taskView,
        cause: new ApiError(message, { statusCode: response.status, url }),
        context: { url },
      })
    }

    return response.text()
  }
}

/**
 * In-memory task views, for tests and offline runs
 */
export class StaticTaskViewSource implements TaskViewSource {
  private readonly views: ReadonlyMap<string, readonly string[]>

  constructor(views: Record<string, readonly string[]>) {
    this.views = new Map(Object.entries(views))
  }

  async resolve(taskView: string): Promise<string[]> {
    const packages = this.views.get(taskView)
    if (!packages || packages.length === 0) {
      throw new TaskViewResolutionError(`Task view "${taskView}" not found`, { taskView })
    }
    return [...packages]
  }
}
