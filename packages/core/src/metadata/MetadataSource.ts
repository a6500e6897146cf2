/**
 * Package metadata sources
 */

import { ApiError, MetadataFetchError, getErrorMessage } from '../errors/index.js'
import { DEPENDENCY_KINDS, type Dependency, type PackageRecord } from '../types/audit.js'
import { createAuditEvent, createLogger, type Logger } from '../utils/logger.js'
import { fetchWithRetry, type RetryConfig } from '../utils/retry.js'
import { createPackageRecord } from './package-record.js'
import { CranPackageSchema, type CranPackage } from './schemas.js'

/**
 * Fetches the DESCRIPTION metadata of one package
 */
export interface MetadataSource {
  /**
   * @throws MetadataFetchError when the package cannot be retrieved
   */
  fetch(packageName: string, signal?: AbortSignal): Promise<PackageRecord>
}

export const DEFAULT_METADATA_URL = 'https://crandb.r-pkg.org'

/**
 * Dependencies in DESCRIPTION field order. The `R` version requirement in
 * Depends is not a package and is dropped.
 */
export function extractDependencies(pkg: CranPackage): Dependency[] {
  const dependencies: Dependency[] = []
  for (const kind of DEPENDENCY_KINDS) {
    for (const name of Object.keys(pkg[kind] ?? {})) {
      if (name !== 'R') {
        dependencies.push({ package: name, kind })
      }
    }
  }
  return dependencies
}

export function toPackageRecord(pkg: CranPackage): PackageRecord {
  return createPackageRecord({
    name: pkg.Package,
    url: pkg.URL,
    bugReports: pkg.BugReports,
    roxygenNote: pkg.RoxygenNote,
    vignetteBuilder: pkg.VignetteBuilder,
    dependencies: extractDependencies(pkg),
  })
}

export interface CranDbMetadataSourceConfig {
  /** Metadata service base URL (default: https://crandb.r-pkg.org) */
  baseUrl?: string
  timeoutMs?: number
  retry?: RetryConfig
}

/**
 * Reads the latest release of a package from the CRAN metadata JSON service
 *
 * @example
 * ```typescript
 * const source = new CranDbMetadataSource()
 * const record = await source.fetch('testthat')
 * record.roxygenNote // "7.3.2"
 * ```
 */
export class CranDbMetadataSource implements MetadataSource {
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly retry: RetryConfig
  private readonly log: Logger

  constructor(config: CranDbMetadataSourceConfig = {}, log: Logger = createLogger('MetadataSource')) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_METADATA_URL).replace(/\/+$/, '')
    this.timeoutMs = config.timeoutMs ?? 15000
    this.retry = config.retry ?? {}
    this.log = log
  }

  async fetch(packageName: string, signal?: AbortSignal): Promise<PackageRecord> {
    const url = `${this.baseUrl}/${encodeURIComponent(packageName)}`

    let response: Response
    try {
      response = await fetchWithRetry(
        url,
        { headers: { Accept: 'application/json' }, signal, timeoutMs: this.timeoutMs },
        this.retry
      )
    } catch (error) {
      throw new MetadataFetchError(
        `Metadata service unavailable for ${packageName}: ${getErrorMessage(error)}`,
        { packageName, reason: 'registry_unavailable', cause: error, context: { url } }
      )
    }

    if (!response.ok) {
      await response.body?.cancel()
      const unknown = response.status === 404
      const message = unknown
        ? `Unknown package: ${packageName}`
        : `Metadata service returned HTTP ${response.status} for ${packageName}`
      throw new MetadataFetchError(message, {
        packageName,
        reason: unknown ? 'unknown_package' : 'registry_unavailable',
        cause: new ApiError(message, { statusCode: response.status, url }),
        context: { url, statusCode: response.status },
      })
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new MetadataFetchError(`Malformed metadata for ${packageName}`, {
        packageName,
        reason: 'invalid_response',
        cause: error,
        context: { url },
      })
    }

    const parsed = CranPackageSchema.safeParse(body)
    if (!parsed.success) {
      throw new MetadataFetchError(`Malformed metadata for ${packageName}`, {
        packageName,
        reason: 'invalid_response',
        cause: parsed.error,
        context: { url, issues: parsed.error.issues.map((issue) => issue.message) },
      })
    }

    this.log.auditLog(
      createAuditEvent('metadata.fetch', 'CranDbMetadataSource', url, 'fetch', 'success')
    )
    return toPackageRecord(parsed.data)
  }
}

/**
 * In-memory metadata, for tests and offline runs
 */
export class StaticMetadataSource implements MetadataSource {
  private readonly records: ReadonlyMap<string, PackageRecord>

  constructor(records: readonly PackageRecord[]) {
    this.records = new Map(records.map((record) => [record.name, record]))
  }

  async fetch(packageName: string): Promise<PackageRecord> {
    const record = this.records.get(packageName)
    if (!record) {
      throw new MetadataFetchError(`Unknown package: ${packageName}`, {
        packageName,
        reason: 'unknown_package',
      })
    }
    return record
  }
}
