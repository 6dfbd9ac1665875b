import { mkdtemp } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { vi } from 'vitest'

import { createBot, type Bot } from '../src/bot.js'
import type { ChatSocket } from '../src/channels/chat-server.js'
import { loadConfig } from '../src/config/load.js'
import type { BotConfig } from '../src/config/schema.js'
import type { OutboundMessage } from '../src/core/types.js'

export function makeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

/** In-memory stand-in for a socket.io client socket. */
export class FakeSocket implements ChatSocket {
  connected = false
  readonly emitted: unknown[][] = []
  private readonly handlers = new Map<string, (...args: unknown[]) => void>()

  on(event: string, listener: (...args: unknown[]) => void): void {
    this.handlers.set(event, listener)
  }

  emit(event: string, ...args: unknown[]): void {
    this.emitted.push([event, ...args])
  }

  disconnect(): void {
    this.connected = false
  }

  /** Simulates an event arriving from the server. */
  fire(event: string, ...args: unknown[]): void {
    const handler = this.handlers.get(event)
    if (!handler) throw new Error(`no handler for ${event}`)
    handler(...args)
  }
}

export function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'reelbot-test-'))
}

/** Defaults from the environment table, with `boss` as owner and `helper` as admin. */
export function makeConfig(dataDir: string, env: Record<string, string> = {}): BotConfig {
  return loadConfig({
    skipDotenv: true,
    env: { DATA_DIR: dataDir, ADMIN_USERS: 'boss,helper', ...env }
  })
}

export const START_TIME = Date.UTC(2026, 0, 2, 3, 4, 5)

export interface TestBot {
  bot: Bot
  config: BotConfig
  logger: ReturnType<typeof makeLogger>
  /** Advances the injected clock. */
  advance(ms: number): void
  /** Queues values for the injected random source; `0` once the queue is empty. */
  queueRandom(...values: number[]): void
  /** Posts a chat message, processes it, and returns the texts the bot sent. */
  say(username: string, content: string, displayName?: string): Promise<string[]>
  /** Like `say`, but returns the full outbound messages. */
  sayRaw(username: string, content: string, displayName?: string): Promise<OutboundMessage[]>
}

export async function makeTestBot(env: Record<string, string> = {}): Promise<TestBot> {
  const dataDir = await makeTempDir()
  const config = makeConfig(dataDir, env)
  const logger = makeLogger()
  let current = START_TIME
  const randomQueue: number[] = []

  const bot = await createBot(config, {
    logger,
    now: () => current,
    random: () => randomQueue.shift() ?? 0
  })

  const sayRaw = async (username: string, content: string, displayName = username) => {
    await bot.bus.publishInbound({
      channel: 'chat',
      senderId: username,
      senderName: displayName,
      chatId: 'public',
      content,
      timestamp: new Date(current).toISOString()
    })
    await bot.loop.processOnce()

    const sent: OutboundMessage[] = []
    while (bot.bus.pendingOutbound() > 0) {
      sent.push(await bot.bus.consumeOutbound())
    }
    return sent
  }

  return {
    bot,
    config,
    logger,
    advance(ms) {
      current += ms
    },
    queueRandom(...values) {
      randomQueue.push(...values)
    },
    sayRaw,
    async say(username, content, displayName) {
      return (await sayRaw(username, content, displayName)).map((m) => m.content)
    }
  }
}
