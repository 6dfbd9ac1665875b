import { describe, expect, it, vi } from 'vitest'

import type { ChatSocket, ChatSocketOptions } from '../src/channels/chat-server.js'
import { ChatServerChannel } from '../src/channels/chat-server.js'
import { MessageBus } from '../src/core/bus.js'
import { FakeSocket, makeConfig, makeLogger } from './helpers.js'

async function setup(env: Record<string, string> = {}) {
  const socket = new FakeSocket()
  const factory = vi.fn((_url: string, _options: ChatSocketOptions): ChatSocket => socket)
  const bus = new MessageBus()
  const logger = makeLogger()
  const config = makeConfig('/tmp/reelbot-chat', { BOT_API_KEY: 'test-secret', ...env })
  const channel = new ChatServerChannel(config, bus, logger, factory)
  await channel.start()
  return { socket, factory, bus, logger, channel }
}

describe('ChatServerChannel', () => {
  it('connects with the bot identity and reconnect delays', async () => {
    const { factory } = await setup()

    expect(factory).toHaveBeenCalledWith('http://localhost:3000', {
      auth: {
        username: 'ReelBot',
        displayName: 'ReelBot',
        avatar: '',
        isBot: true,
        apiKey: 'test-secret'
      },
      reconnectionDelayMs: 5000,
      reconnectionDelayMaxMs: 60000
    })
  })

  it('publishes chat messages to the bus', async () => {
    const { socket, bus } = await setup()

    socket.fire('message', {
      id: 'm1',
      user: { username: 'alice', displayName: 'Alice' },
      content: '!ping',
      room: 'lobby',
      timestamp: 0
    })

    await expect(bus.consumeInbound()).resolves.toEqual({
      channel: 'chat',
      senderId: 'alice',
      senderName: 'Alice',
      chatId: 'lobby',
      content: '!ping',
      timestamp: '1970-01-01T00:00:00.000Z',
      metadata: { messageId: 'm1' }
    })
  })

  it('skips its own messages, other bots and malformed payloads', async () => {
    const { socket, bus, logger } = await setup()

    socket.fire('message', { user: { username: 'reelbot' }, content: '!ping' })
    socket.fire('message', { user: { username: 'otherbot', isBot: true }, content: '!ping' })
    socket.fire('message', { content: 'no user' })
    socket.fire('message', { user: { username: 'bob' }, content: 'hello' })

    const inbound = await bus.consumeInbound()
    expect(inbound).toMatchObject({ senderId: 'bob', senderName: 'bob', chatId: 'public', content: 'hello' })
    expect(logger.warn).toHaveBeenCalledWith('channel.chat.invalid_message', expect.anything())
  })

  it('tracks the online user list and counts disconnects', async () => {
    const { socket, channel } = await setup()

    socket.fire('users', [{ username: 'Alice' }, { username: 'bob', displayName: 'Bob' }, {}, 'junk'])
    socket.fire('disconnect', 'transport close')
    socket.fire('disconnect', 'ping timeout')

    expect(channel.onlineUsers).toBe(2)
    expect(channel.reconnects).toBe(2)
  })

  it('sends truncated chat replies while connected', async () => {
    const { socket, channel } = await setup({ MAX_MESSAGE_LENGTH: '20' })
    socket.connected = true

    await channel.send({ channel: 'chat', chatId: 'public', content: ` ${'x'.repeat(30)} ` })
    await channel.send({ channel: 'cli', chatId: 'public', content: 'not for chat' })
    await channel.send({ channel: 'chat', chatId: 'public', content: '  ' })

    expect(socket.emitted).toEqual([['message', `${'x'.repeat(17)}...`]])
  })

  it('drops replies while disconnected', async () => {
    const { socket, channel, logger } = await setup()

    await channel.send({ channel: 'chat', chatId: 'public', content: 'hello' })

    expect(socket.emitted).toEqual([])
    expect(logger.warn).toHaveBeenCalledWith('channel.chat.send_dropped', { reason: 'not connected' })
  })

  it('disconnects and forgets online users on stop', async () => {
    const { socket, channel } = await setup()
    socket.connected = true
    socket.fire('users', [{ username: 'alice' }])

    await channel.stop()

    expect(channel.connected).toBe(false)
    expect(channel.onlineUsers).toBe(0)
  })
})
