export { RemoteFileProber, isRateLimitResponse } from './RemoteFileProber.js'
export { LruProbeCache } from './ProbeCache.js'
export {
  GitHubContentsClient,
  DEFAULT_GITHUB_API_URL,
  type GitHubContentsClientConfig,
} from './GitHubContentsClient.js'
export type {
  ContentsClient,
  ContentsResponse,
  ProbeCache,
  ProbeFailureReason,
  ProbeOutcome,
  ProbeStats,
  RemoteFileProberOptions,
} from './types.js'
