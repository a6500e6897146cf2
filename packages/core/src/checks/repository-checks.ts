/**
 * Repository Check Set
 *
 * Predicates answered by probing the package's GitHub repository. Packages
 * without a located repository fail all four, so every package is scored
 * against the same nine checks.
 */

import type { RemoteFileProber } from '../probe/RemoteFileProber.js'
import type {
  RepositoryCheckId,
  RepositoryCheckResult,
  RepositoryRef,
} from '../types/audit.js'
import {
  GHA_WORKFLOWS_PATH,
  LICENSE_MD_PATH,
  PKGDOWN_CONFIG_PATHS,
  README_RMD_PATH,
} from './constants.js'

/**
 * The slice of the prober the checks depend on
 */
export type FileProber = Pick<RemoteFileProber, 'exists' | 'existsAny'>

export interface RepositoryCheck {
  id: RepositoryCheckId
  description: string
  evaluate: (repo: RepositoryRef, prober: FileProber) => Promise<boolean>
}

export const REPOSITORY_CHECKS: readonly RepositoryCheck[] = [
  {
    id: 'has_rmd_readme',
    description: `README generated from ${README_RMD_PATH}`,
    evaluate: (repo, prober) => prober.exists(repo, README_RMD_PATH),
  },
  {
    id: 'has_md_license',
    description: `License text in ${LICENSE_MD_PATH}`,
    evaluate: (repo, prober) => prober.exists(repo, LICENSE_MD_PATH),
  },
  {
    id: 'uses_pkgdown',
    description: 'pkgdown site configuration',
    evaluate: (repo, prober) => prober.existsAny(repo, PKGDOWN_CONFIG_PATHS),
  },
  {
    id: 'uses_gha',
    description: 'GitHub Actions workflows',
    evaluate: (repo, prober) => prober.exists(repo, GHA_WORKFLOWS_PATH),
  },
]

export function emptyRepositoryCheckResult(): RepositoryCheckResult {
  return {
    has_rmd_readme: false,
    has_md_license: false,
    uses_pkgdown: false,
    uses_gha: false,
  }
}

/**
 * Run the four repository checks concurrently. With no repository, all are
 * false and the prober is never called.
 */
export async function evaluateRepositoryChecks(
  repo: RepositoryRef | null,
  prober: FileProber
): Promise<RepositoryCheckResult> {
  const result = emptyRepositoryCheckResult()
  if (repo === null) {
    return result
  }

  const outcomes = await Promise.all(
    REPOSITORY_CHECKS.map(async (check) => [check.id, await check.evaluate(repo, prober)] as const)
  )
  for (const [id, passed] of outcomes) {
    result[id] = passed
  }
  return result
}
