/**
 * Package sets and repository paths the checks look for
 */

/**
 * Unit testing frameworks for R packages
 */
export const TESTING_PACKAGES: ReadonlySet<string> = new Set([
  'testthat',
  'testit',
  'unitizer',
  'RUnit',
  'tinytest',
])

/**
 * Dependencies considered deprecated or superseded
 */
export const DEPRECATED_PACKAGES: ReadonlySet<string> = new Set([
  'RUnit',
  'XML',
  'RCurl',
  'plyr',
  'reshape2',
])

export const README_RMD_PATH = 'README.Rmd'
export const LICENSE_MD_PATH = 'LICENSE.md'
export const PKGDOWN_CONFIG_PATHS: readonly string[] = [
  '_pkgdown.yml',
  '_pkgdown.yaml',
  'pkgdown/pkgdown.yml',
]
export const GHA_WORKFLOWS_PATH = '.github/workflows'
