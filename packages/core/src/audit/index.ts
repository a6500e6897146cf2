export { ComplianceAuditor, DEFAULT_CONCURRENCY, type ComplianceAuditorOptions } from './ComplianceAuditor.js'
export { toJsonReport, type JsonReport } from './report.js'
export type { AuditReport, AuditRunOptions, MetadataFailure } from './types.js'
