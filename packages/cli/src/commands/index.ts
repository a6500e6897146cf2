/**
 * CLI Commands
 *
 * Export all CLI commands for registration.
 */

export { createAuditCommand, createPackagesCommand, createChecksCommand } from './audit.js'
