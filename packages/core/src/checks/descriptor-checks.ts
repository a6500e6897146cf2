/**
 * Descriptor Check Set
 *
 * Predicates evaluated from a package's DESCRIPTION metadata alone. Each is
 * total: absent fields fail the check instead of throwing.
 */

import { hasGitHubUrl } from '../locator/RepositoryLocator.js'
import type {
  DescriptorCheckId,
  DescriptorCheckResult,
  PackageRecord,
} from '../types/audit.js'
import { DEPRECATED_PACKAGES, TESTING_PACKAGES } from './constants.js'

export interface DescriptorCheck {
  id: DescriptorCheckId
  description: string
  evaluate: (record: PackageRecord) => boolean
}

function dependsOnAny(record: PackageRecord, packages: ReadonlySet<string>): boolean {
  return record.dependencies.some((dep) => packages.has(dep.package))
}

export const DESCRIPTOR_CHECKS: readonly DescriptorCheck[] = [
  {
    id: 'has_github_url',
    description: 'URL or BugReports points to GitHub',
    evaluate: hasGitHubUrl,
  },
  {
    id: 'uses_roxygen',
    description: 'Documentation generated with roxygen2 (RoxygenNote)',
    evaluate: (record) => record.roxygenNote !== null,
  },
  {
    id: 'has_knitr_vignette',
    description: 'Vignettes built with knitr',
    evaluate: (record) => record.vignetteBuilder?.includes('knitr') ?? false,
  },
  {
    id: 'uses_testing_framework',
    description: `Depends on a testing framework (${[...TESTING_PACKAGES].join(', ')})`,
    evaluate: (record) => dependsOnAny(record, TESTING_PACKAGES),
  },
  {
    id: 'has_no_deprecated_dependency',
    description: `No deprecated dependency (${[...DEPRECATED_PACKAGES].join(', ')})`,
    evaluate: (record) => !dependsOnAny(record, DEPRECATED_PACKAGES),
  },
]

export function evaluateDescriptorChecks(record: PackageRecord): DescriptorCheckResult {
  const result: DescriptorCheckResult = {
    has_github_url: false,
    uses_roxygen: false,
    has_knitr_vignette: false,
    uses_testing_framework: false,
    has_no_deprecated_dependency: false,
  }
  for (const check of DESCRIPTOR_CHECKS) {
    result[check.id] = check.evaluate(record)
  }
  return result
}
