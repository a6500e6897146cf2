import { describe, it, expect } from 'vitest'
import { sanitizeError } from '../src/utils/sanitize.js'

describe('sanitizeError', () => {
  it('replaces the home directory', () => {
    expect(sanitizeError(new Error('Cannot read /home/alice/.config/ctv-audit.json'), '/home/alice')).toBe(
      'Cannot read ~/.config/ctv-audit.json'
    )
  })

  it('replaces other user directories', () => {
    expect(sanitizeError(new Error('at /Users/bob/project/index.js:3'), '')).toBe(
      'at ~/project/index.js:3'
    )
    expect(sanitizeError(new Error('at C:\\Users\\bob\\project\\index.js'), '')).toBe(
      'at ~\\project\\index.js'
    )
  })

  it('redacts GitHub tokens', () => {
    expect(sanitizeError(new Error('Bad credentials for ghp_testtokentesttokentesttoken'), '')).toBe(
      'Bad credentials for [REDACTED]'
    )
  })

  it('redacts bearer credentials', () => {
    expect(sanitizeError('Authorization: Bearer test-token rejected', '')).toBe(
      'Authorization: Bearer [REDACTED] rejected'
    )
  })

  it('leaves ordinary messages untouched', () => {
    expect(sanitizeError(new Error('Task view "Spatial" not found'), '/home/alice')).toBe(
      'Task view "Spatial" not found'
    )
  })
})
