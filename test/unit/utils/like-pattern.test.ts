import { containsPattern, LIKE_ESCAPE } from '@utils/like-pattern.js'
import { describe, expect, it } from 'vitest'

describe('like-pattern', () => {
  it('should use ! as the escape character', () => {
    expect(LIKE_ESCAPE).toBe('!')
  })

  it('should wrap the term in wildcards', () => {
    expect(containsPattern('matrix')).toBe('%matrix%')
  })

  it('should escape wildcards and the escape character', () => {
    expect(containsPattern('100%_off!')).toBe('%100!%!_off!!%')
  })
})
