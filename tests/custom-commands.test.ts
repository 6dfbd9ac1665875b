import { describe, expect, it } from 'vitest'

import { PERMISSION_DENIED_REPLY } from '../src/commands/registry.js'
import { classifyResponse } from '../src/modules/custom.js'
import { makeTestBot } from './helpers.js'

describe('classifyResponse', () => {
  it('classifies by the first URL', () => {
    expect(classifyResponse('just words')).toBe('Text')
    expect(classifyResponse('look https://example.test/cat.PNG')).toBe('Image')
    expect(classifyResponse('https://i.imgur.com/abc')).toBe('Image')
    expect(classifyResponse('watch https://youtu.be/abc')).toBe('Video')
    expect(classifyResponse('read https://example.test/post')).toBe('Link')
  })
})

describe('custom commands module', () => {
  it('adds a command that answers when invoked', async () => {
    const { bot, say } = await makeTestBot()

    expect(await say('alice', '!addcmd hi Hello there, friend')).toEqual(['Command !hi added'])
    expect(await say('bob', '!HI')).toEqual(['Hello there, friend'])
    expect(bot.moduleContext.customCommands.get('hi')).toBe('Hello there, friend')
  })

  it('stores and answers a command named __proto__', async () => {
    const { bot, say } = await makeTestBot()

    expect(await say('alice', '!addcmd __proto__ hello')).toEqual(['Command !__proto__ added'])
    expect(await say('bob', '!__proto__')).toEqual(['hello'])
    expect(bot.moduleContext.customCommands.get('__proto__')).toBe('hello')
  })

  it('refuses built-in names, duplicates and oversized input', async () => {
    const { say } = await makeTestBot()
    await say('alice', '!addcmd hi Hello')

    expect(await say('alice', '!addcmd')).toEqual(['Usage: !addcmd <name> <response>'])
    expect(await say('alice', '!addcmd hi')).toEqual(['Usage: !addcmd <name> <response>'])
    expect(await say('alice', '!addcmd ping nope')).toEqual(["!ping is a built-in command and can't be overwritten"])
    expect(await say('alice', '!newcmd BAL nope')).toEqual(["!bal is a built-in command and can't be overwritten"])
    expect(await say('alice', '!createcmd !hi again')).toEqual(['Command !hi already exists'])
    expect(await say('alice', `!addcmd ${'x'.repeat(33)} hello`)).toEqual([
      'Command name too long (max 32 characters)'
    ])
    expect(await say('alice', `!addcmd long ${'y'.repeat(1501)}`)).toEqual([
      'Response too long (max 1500 characters)'
    ])
  })

  it('lets admins edit and delete commands', async () => {
    const { say } = await makeTestBot()
    await say('alice', '!addcmd hi Hello')

    expect(await say('alice', '!delcmd hi')).toEqual([PERMISSION_DENIED_REPLY])
    expect(await say('alice', '!editcmd hi Bye')).toEqual([PERMISSION_DENIED_REPLY])

    expect(await say('helper', '!editcmd !hi Goodbye')).toEqual(['Command !hi updated'])
    expect(await say('alice', '!hi')).toEqual(['Goodbye'])
    expect(await say('helper', '!editcmd nope text')).toEqual(['Command !nope not found'])

    expect(await say('helper', '!rmcmd hi')).toEqual(['Command !hi removed'])
    expect(await say('helper', '!delcmd hi')).toEqual(['Command !hi not found'])
    expect(await say('alice', '!hi')).toEqual([])
  })

  it('describes a command', async () => {
    const { say } = await makeTestBot()
    await say('alice', '!addcmd cat look https://i.imgur.com/cat.png')
    await say('alice', `!addcmd essay ${'word '.repeat(30)}end`)

    expect(await say('bob', '!cmdinfo !cat')).toEqual(['[Image] !cat -> look https://i.imgur.com/cat.png'])
    expect(await say('bob', '!cmdinfo essay')).toEqual([`[Text] !essay -> ${'word '.repeat(19)}wo...`])
    expect(await say('bob', '!cmdinfo dog')).toEqual(['!dog not found'])
  })

  it('lists commands alphabetically', async () => {
    const { say } = await makeTestBot()
    expect(await say('alice', '!customs')).toEqual(['No custom commands yet! Use !addcmd to create one.'])

    await say('alice', '!addcmd zebra stripes')
    await say('alice', '!addcmd apple red')

    expect(await say('alice', '!customlist')).toEqual(['Custom commands (2): !apple, !zebra'])
  })

  it('truncates long listings', async () => {
    const { say } = await makeTestBot()
    const names = Array.from({ length: 22 }, (_, i) => `c${String(i).padStart(2, '0')}`)
    for (const name of names) await say('alice', `!addcmd ${name} text`)

    const shown = names
      .slice(0, 20)
      .map((n) => `!${n}`)
      .join(', ')
    expect(await say('alice', '!customs')).toEqual([`Custom commands (22 total): ${shown}... (and 2 more)`])
  })

  it('splits long responses into several messages', async () => {
    const { say } = await makeTestBot({ MAX_MESSAGE_LENGTH: '20' })
    await say('alice', '!addcmd long aaaa bbbb cccc dddd eeee ffff')

    expect(await say('bob', '!long')).toEqual(['aaaa bbbb cccc dddd', 'eeee ffff'])
  })

  it('stays silent for unknown commands', async () => {
    const { bot, say } = await makeTestBot()

    expect(await say('alice', '!nothing here')).toEqual([])
    expect(bot.loop.commandsProcessed).toBe(0)
  })
})
