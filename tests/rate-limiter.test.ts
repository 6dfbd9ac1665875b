import { describe, expect, it } from 'vitest'

import { RateLimiter } from '../src/core/rate-limiter.js'

function makeLimiter(max: number, windowMs: number) {
  let now = 0
  const limiter = new RateLimiter(max, windowMs, () => now)
  return {
    limiter,
    at(ms: number) {
      now = ms
    }
  }
}

describe('RateLimiter', () => {
  it('allows requests within the limit', () => {
    const { limiter } = makeLimiter(3, 60_000)

    expect(limiter.isAllowed('alice')).toBe(true)
    expect(limiter.isAllowed('alice')).toBe(true)
    expect(limiter.isAllowed('alice')).toBe(true)
  })

  it('blocks requests exceeding the limit', () => {
    const { limiter } = makeLimiter(2, 60_000)

    expect(limiter.isAllowed('alice')).toBe(true)
    expect(limiter.isAllowed('alice')).toBe(true)
    expect(limiter.isAllowed('alice')).toBe(false)
  })

  it('tracks limits independently per key', () => {
    const { limiter } = makeLimiter(1, 60_000)

    expect(limiter.isAllowed('alice')).toBe(true)
    expect(limiter.isAllowed('bob')).toBe(true)
    expect(limiter.isAllowed('alice')).toBe(false)
    expect(limiter.isAllowed('bob')).toBe(false)
  })

  it('reports the wait until the oldest request leaves the window', () => {
    const { limiter, at } = makeLimiter(2, 60_000)

    limiter.record('alice')
    at(10_000)
    limiter.record('alice')
    at(20_000)

    expect(limiter.retryAfter('alice')).toBe(40)
    // Checking never records.
    expect(limiter.retryAfter('alice')).toBe(40)
    at(59_999)
    expect(limiter.retryAfter('alice')).toBe(1)
    at(60_000)
    expect(limiter.retryAfter('alice')).toBeNull()
  })

  it('resets after the time window elapses', () => {
    const { limiter, at } = makeLimiter(1, 100)

    expect(limiter.isAllowed('alice')).toBe(true)
    expect(limiter.isAllowed('alice')).toBe(false)

    at(150)
    expect(limiter.isAllowed('alice')).toBe(true)
  })
})
