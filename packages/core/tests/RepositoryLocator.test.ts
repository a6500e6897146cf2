import { describe, it, expect } from 'vitest'
import {
  formatRepositoryRef,
  hasGitHubUrl,
  locateRepository,
} from '../src/locator/RepositoryLocator.js'
import { bareRecord } from './fixtures/audit-fixtures.js'

describe('RepositoryLocator', () => {
  describe('locateRepository', () => {
    it('extracts owner and repo from the URL field', () => {
      const record = bareRecord('bar', { url: 'https://github.com/foo/bar' })
      expect(locateRepository(record)).toEqual({ owner: 'foo', repo: 'bar' })
    })

    it('uses the first GitHub URL of a multi-valued field', () => {
      const record = bareRecord('bar', {
        url: 'https://foo.dev/bar, https://github.com/foo/bar, https://github.com/other/fork',
      })
      expect(locateRepository(record)).toEqual({ owner: 'foo', repo: 'bar' })
    })

    it('ignores trailing path segments', () => {
      const record = bareRecord('bar', { url: 'https://github.com/foo/bar/tree/main/pkg' })
      expect(locateRepository(record)).toEqual({ owner: 'foo', repo: 'bar' })
    })

    it('falls back to BugReports when URL has no GitHub repository', () => {
      const record = bareRecord('bar', {
        url: 'https://foo.r-universe.dev',
        bugReports: 'https://github.com/foo/bar/issues',
      })
      expect(locateRepository(record)).toEqual({ owner: 'foo', repo: 'bar' })
    })

    it('prefers URL over BugReports', () => {
      const record = bareRecord('bar', {
        url: 'https://github.com/upstream/bar',
        bugReports: 'https://github.com/foo/bar/issues',
      })
      expect(locateRepository(record)).toEqual({ owner: 'upstream', repo: 'bar' })
    })

    it('requires the /issues suffix in BugReports', () => {
      const record = bareRecord('bar', { bugReports: 'https://github.com/foo/bar' })
      expect(locateRepository(record)).toBeNull()
    })

    it('returns null when neither field is present', () => {
      expect(locateRepository(bareRecord('bar'))).toBeNull()
    })

    it('returns null for empty fields', () => {
      expect(locateRepository(bareRecord('plyr', { url: '', bugReports: '' }))).toBeNull()
    })

    it('matches owner and repo as word characters only', () => {
      const record = bareRecord('bar', { url: 'https://github.com/foo/bar.js' })
      expect(locateRepository(record)).toEqual({ owner: 'foo', repo: 'bar' })
    })

    it('finds no repository for a hyphenated owner', () => {
      const record = bareRecord('sf', {
        url: 'https://github.com/r-spatial/sf',
        bugReports: 'https://github.com/r-spatial/sf/issues',
      })
      expect(locateRepository(record)).toBeNull()
      expect(hasGitHubUrl(record)).toBe(true)
    })

    it('is deterministic and idempotent', () => {
      const record = bareRecord('bar', {
        url: 'https://github.com/foo/bar',
        bugReports: 'https://github.com/foo/bar/issues',
      })
      const first = locateRepository(record)
      const second = locateRepository(record)
      expect(second).toEqual(first)
    })
  })

  describe('hasGitHubUrl', () => {
    it('is true when URL starts with the GitHub prefix', () => {
      expect(hasGitHubUrl(bareRecord('bar', { url: 'https://github.com/foo/bar' }))).toBe(true)
    })

    it('is true when BugReports starts with the GitHub prefix', () => {
      expect(
        hasGitHubUrl(bareRecord('bar', { bugReports: 'https://github.com/foo/bar/issues' }))
      ).toBe(true)
    })

    it('is false when the GitHub URL is not first in the field', () => {
      expect(
        hasGitHubUrl(bareRecord('bar', { url: 'https://foo.dev, https://github.com/foo/bar' }))
      ).toBe(false)
    })

    it('is false for absent fields', () => {
      expect(hasGitHubUrl(bareRecord('bar'))).toBe(false)
    })
  })

  it('formats a repository as owner/repo', () => {
    expect(formatRepositoryRef({ owner: 'foo', repo: 'bar' })).toBe('foo/bar')
  })
})
