/**
 * Check sets and the per-package evaluation that merges them
 */

import { locateRepository } from '../locator/RepositoryLocator.js'
import type { CheckId, PackageCheckResult, PackageRecord } from '../types/audit.js'
import { DESCRIPTOR_CHECKS, evaluateDescriptorChecks } from './descriptor-checks.js'
import {
  REPOSITORY_CHECKS,
  evaluateRepositoryChecks,
  type FileProber,
} from './repository-checks.js'

export * from './constants.js'
export {
  DESCRIPTOR_CHECKS,
  evaluateDescriptorChecks,
  type DescriptorCheck,
} from './descriptor-checks.js'
export {
  REPOSITORY_CHECKS,
  evaluateRepositoryChecks,
  emptyRepositoryCheckResult,
  type RepositoryCheck,
  type FileProber,
} from './repository-checks.js'

export interface CheckDescription {
  id: CheckId
  kind: 'descriptor' | 'repository'
  description: string
}

/**
 * The full check vocabulary, in reporting order
 */
export function describeChecks(): CheckDescription[] {
  return [
    ...DESCRIPTOR_CHECKS.map((c) => ({
      id: c.id,
      kind: 'descriptor' as const,
      description: c.description,
    })),
    ...REPOSITORY_CHECKS.map((c) => ({
      id: c.id,
      kind: 'repository' as const,
      description: c.description,
    })),
  ]
}

/**
 * Evaluate all nine checks for one package
 */
export async function evaluatePackage(
  record: PackageRecord,
  prober: FileProber
): Promise<PackageCheckResult> {
  const repository = locateRepository(record)
  const descriptor = evaluateDescriptorChecks(record)
  const remote = await evaluateRepositoryChecks(repository, prober)

  return {
    package: record.name,
    repository,
    checks: { ...descriptor, ...remote },
  }
}
