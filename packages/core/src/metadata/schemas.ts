/**
 * Zod schemas for CRAN package metadata responses
 */

import { z } from 'zod'

/**
 * Dependency fields map package names to version constraints ("*" when none)
 */
const DependencyMapSchema = z.record(z.string(), z.string()).optional()

/**
 * One package document as served by the CRAN metadata JSON service. Only the
 * DESCRIPTION fields the audit reads are validated; the rest pass through.
 */
export const CranPackageSchema = z
  .object({
    Package: z.string().min(1),
    Version: z.string().optional(),
    URL: z.string().optional(),
    BugReports: z.string().optional(),
    RoxygenNote: z.string().optional(),
    VignetteBuilder: z.string().optional(),
    Depends: DependencyMapSchema,
    Imports: DependencyMapSchema,
    LinkingTo: DependencyMapSchema,
    Suggests: DependencyMapSchema,
    Enhances: DependencyMapSchema,
  })
  .passthrough()

export type CranPackage = z.infer<typeof CranPackageSchema>
