import type { Dependency, PackageRecord } from '../types/audit.js'

export interface PackageRecordInput {
  name: string
  url?: string | null
  bugReports?: string | null
  roxygenNote?: string | null
  vignetteBuilder?: string | null
  dependencies?: readonly Dependency[]
}

/**
 * Build a frozen PackageRecord; omitted fields are absent (null / empty)
 */
export function createPackageRecord(input: PackageRecordInput): PackageRecord {
  return Object.freeze({
    name: input.name,
    url: input.url ?? null,
    bugReports: input.bugReports ?? null,
    roxygenNote: input.roxygenNote ?? null,
    vignetteBuilder: input.vignetteBuilder ?? null,
    dependencies: Object.freeze((input.dependencies ?? []).map((dep) => Object.freeze({ ...dep }))),
  })
}
