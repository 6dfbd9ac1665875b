import { describe, expect, it, vi } from 'vitest'

import { CommandHandler } from '../src/commands/handler.js'
import { PermissionEvaluator } from '../src/commands/permissions.js'
import { CommandRegistry } from '../src/commands/registry.js'
import { BotLoop } from '../src/core/bot-loop.js'
import { MessageBus } from '../src/core/bus.js'
import type { InboundMessage } from '../src/core/types.js'
import { makeLogger } from './helpers.js'

function setup() {
  const bus = new MessageBus()
  const logger = makeLogger()
  const registry = new CommandRegistry({ permissions: new PermissionEvaluator([]), logger })
  const commands = new CommandHandler(registry, bus, '!')
  const loop = new BotLoop(bus, commands, logger)
  const ping = vi.fn(async (ctx: { reply(text: string): Promise<void> }) => {
    await ctx.reply('Pong!')
  })
  registry.register({ name: 'ping', handler: ping })

  const post = async (content: string, senderId = 'alice') => {
    const inbound: InboundMessage = {
      channel: 'chat',
      senderId,
      senderName: senderId,
      chatId: 'public',
      content,
      timestamp: new Date(0).toISOString()
    }
    await bus.publishInbound(inbound)
    await loop.processOnce()
  }

  return { bus, logger, commands, loop, ping, post }
}

describe('BotLoop', () => {
  it('counts every message and only recognised commands', async () => {
    const { loop, post, bus } = setup()

    await post('hello')
    await post('!ping')
    await post('!nope')

    expect(loop.messagesProcessed).toBe(3)
    expect(loop.commandsProcessed).toBe(1)
    await expect(bus.consumeOutbound()).resolves.toMatchObject({ content: 'Pong!' })
  })

  it('runs listeners on every message before dispatch', async () => {
    const { loop, post, ping } = setup()
    const seen: string[] = []
    loop.addListener((message) => {
      seen.push(`${message.senderId}:${message.content}`)
      expect(ping).not.toHaveBeenCalled()
    })

    await post('!ping', 'bob')

    expect(seen).toEqual(['bob:!ping'])
    expect(ping).toHaveBeenCalledTimes(1)
  })

  it('skips dispatch when a listener stops the message', async () => {
    const { loop, post, ping } = setup()
    const later = vi.fn()
    loop.addListener(() => 'stop')
    loop.addListener(later)

    await post('!ping')

    expect(ping).not.toHaveBeenCalled()
    expect(later).not.toHaveBeenCalled()
    expect(loop.messagesProcessed).toBe(1)
    expect(loop.commandsProcessed).toBe(0)
  })

  it('runs a listener added with first ahead of the others', async () => {
    const { loop, post } = setup()
    const order: string[] = []
    loop.addListener(() => void order.push('tracker'))
    loop.addListener(() => void order.push('guard'), { first: true })

    await post('hello')
    expect(order).toEqual(['guard', 'tracker'])
  })

  it('logs a failing listener and carries on', async () => {
    const { loop, post, ping, logger } = setup()
    loop.addListener(async () => {
      throw new Error('tracker broke')
    })

    await post('!ping')

    expect(ping).toHaveBeenCalledTimes(1)
    expect(logger.warn).toHaveBeenCalledWith('bot.listener_failed', {
      senderId: 'alice',
      error: 'tracker broke'
    })
  })

  it('stops calling a removed listener', async () => {
    const { loop, post } = setup()
    const listener = vi.fn()
    loop.addListener(listener)
    loop.removeListener(listener)

    await post('hello')
    expect(listener).not.toHaveBeenCalled()
  })

  it('logs and survives a failure outside the command registry', async () => {
    const { loop, post, commands, logger } = setup()
    commands.addFallback(() => {
      throw new Error('fallback broke')
    })

    await post('!unknown')
    await post('!ping')

    expect(logger.error).toHaveBeenCalledWith(
      'bot.message_failed',
      expect.objectContaining({ senderId: 'alice', error: 'fallback broke' })
    )
    expect(loop.commandsProcessed).toBe(1)
  })

  it('ends the run loop after stop', async () => {
    const { loop, bus, logger } = setup()

    const running = loop.start()
    loop.stop()
    // The loop is parked on the bus; one more message lets it observe the flag.
    await bus.publishInbound({
      channel: 'chat',
      senderId: 'alice',
      senderName: 'alice',
      chatId: 'public',
      content: 'bye',
      timestamp: new Date(0).toISOString()
    })

    await expect(running).resolves.toBeUndefined()
    expect(logger.info).toHaveBeenCalledWith('bot.stop', { messagesProcessed: 0, commandsProcessed: 0 })
  })
})
