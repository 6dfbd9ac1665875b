import { describe, expect, it } from 'vitest'

import { CooldownTracker } from '../src/commands/cooldown.js'
import { PermissionLevel, type CommandSpec } from '../src/commands/types.js'

function spec(name: string, cooldownSeconds: number): CommandSpec {
  return {
    name,
    aliases: [],
    permission: PermissionLevel.Everyone,
    cooldownSeconds,
    hidden: false,
    group: '',
    description: '',
    usage: '',
    handler: () => undefined
  }
}

function makeTracker() {
  const specs = new Map([
    ['fish', spec('fish', 30)],
    ['ping', spec('ping', 0)]
  ])
  const aliases = new Map([['cast', 'fish']])
  let now = 1_000_000
  const tracker = new CooldownTracker(
    (name) => specs.get(name) ?? specs.get(aliases.get(name) ?? ''),
    () => now
  )
  return {
    tracker,
    advance(ms: number) {
      now += ms
    }
  }
}

describe('CooldownTracker', () => {
  it('is ready before any use', () => {
    const { tracker } = makeTracker()
    expect(tracker.check('fish', 'alice')).toBeNull()
  })

  it('counts down in whole seconds, rounding up, until the cooldown elapses', () => {
    const { tracker, advance } = makeTracker()
    tracker.commit('fish', 'alice')

    expect(tracker.check('fish', 'alice')).toBe(30)
    advance(1)
    expect(tracker.check('fish', 'alice')).toBe(30)
    advance(999)
    expect(tracker.check('fish', 'alice')).toBe(29)
    advance(28_500)
    expect(tracker.check('fish', 'alice')).toBe(1)
    advance(499)
    expect(tracker.check('fish', 'alice')).toBe(1)
    advance(1)
    expect(tracker.check('fish', 'alice')).toBeNull()
  })

  it('tracks users independently and ignores username case', () => {
    const { tracker } = makeTracker()
    tracker.commit('fish', 'Alice')

    expect(tracker.check('fish', 'ALICE')).toBe(30)
    expect(tracker.check('fish', 'bob')).toBeNull()
  })

  it('shares one ledger entry between a command and its aliases', () => {
    const { tracker } = makeTracker()
    tracker.commit('cast', 'alice')

    expect(tracker.check('fish', 'alice')).toBe(30)
    expect(tracker.size('fish')).toBe(1)
  })

  it('never records commands without a cooldown or unknown commands', () => {
    const { tracker } = makeTracker()
    tracker.commit('ping', 'alice')
    tracker.commit('nope', 'alice')

    expect(tracker.check('ping', 'alice')).toBeNull()
    expect(tracker.check('nope', 'alice')).toBeNull()
    expect(tracker.size('ping')).toBe(0)
  })

  it('clears one command or everything', () => {
    const { tracker } = makeTracker()
    tracker.commit('fish', 'alice')
    tracker.clear('FISH')
    expect(tracker.check('fish', 'alice')).toBeNull()

    tracker.commit('fish', 'bob')
    tracker.clear()
    expect(tracker.size('fish')).toBe(0)
  })
})
