/**
 * Error Classes Module
 *
 * @example
 * ```typescript
 * import { MetadataFetchError, getErrorMessage } from '@ctv-audit/core'
 *
 * try {
 *   await metadata.fetch('somepkg')
 * } catch (error) {
 *   if (error instanceof MetadataFetchError) {
 *     console.warn(`${error.packageName}: ${error.reason}`)
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  AuditError,
  ApiError,
  TaskViewResolutionError,
  MetadataFetchError,
  ConfigError,
  getErrorMessage,
  isAuditError,
  type MetadataFailureReason,
} from './AuditError.js'
