/**
 * In-memory probe cache for the lifetime of one run
 */

import { LRUCache } from 'lru-cache'
import type { RepositoryRef } from '../types/audit.js'
import type { ProbeCache, ProbeOutcome } from './types.js'

/**
 * Large enough that a whole task view (hundreds of packages, a handful of
 * paths each) never evicts
 */
const DEFAULT_MAX_ENTRIES = 50_000

export class LruProbeCache implements ProbeCache {
  private readonly cache: LRUCache<string, Promise<ProbeOutcome>>

  constructor(maxEntries: number = DEFAULT_MAX_ENTRIES) {
    this.cache = new LRUCache<string, Promise<ProbeOutcome>>({
      max: maxEntries,
    })
  }

  static key(repo: RepositoryRef, path: string): string {
    return `${repo.owner}/${repo.repo}:${path}`
  }

  get(key: string): Promise<ProbeOutcome> | undefined {
    return this.cache.get(key)
  }

  set(key: string, value: Promise<ProbeOutcome>): void {
    this.cache.set(key, value)
  }

  delete(key: string): void {
    this.cache.delete(key)
  }

  get size(): number {
    return this.cache.size
  }
}
