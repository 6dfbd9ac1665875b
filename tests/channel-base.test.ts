import { describe, expect, it } from 'vitest'

import { isOwnOrBotMessage } from '../src/channels/base.js'

describe('isOwnOrBotMessage', () => {
  it('matches the bot account regardless of case', () => {
    expect(isOwnOrBotMessage({ username: 'reelbot', isBot: false }, 'ReelBot')).toBe(true)
  })

  it('matches any account flagged as a bot', () => {
    expect(isOwnOrBotMessage({ username: 'weatherbot', isBot: true }, 'ReelBot')).toBe(true)
  })

  it('lets people through', () => {
    expect(isOwnOrBotMessage({ username: 'alice', isBot: false }, 'ReelBot')).toBe(false)
  })
})
