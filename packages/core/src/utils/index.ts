/**
 * Utility exports
 */
export {
  createLogger,
  silentLogger,
  createAuditEvent,
  getLogAggregator,
  setLogAggregator,
  MemoryLogAggregator,
  LogLevel,
  type Logger,
  type LogEntry,
  type LogAggregator,
  type AuditEvent,
  type AuditEventType,
} from './logger.js'
export {
  withRetry,
  fetchWithRetry,
  isTransientError,
  isRetryableStatus,
  parseRetryAfter,
  parseRateLimitReset,
  calculateDelay,
  sleep,
  HttpRetryableError,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
  type FetchWithRetryOptions,
} from './retry.js'
export { asyncPool } from './async-pool.js'
export { timeoutSignal, type TimeoutSignal } from './abort.js'
