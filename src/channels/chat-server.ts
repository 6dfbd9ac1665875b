import { io } from 'socket.io-client'
import { z } from 'zod'

import { DEFAULT_ROOM } from '../commands/context.js'
import type { BotConfig } from '../config/schema.js'
import { MessageBus } from '../core/bus.js'
import { truncateText } from '../core/text-chunk.js'
import type { InboundMessage, Logger, OutboundMessage } from '../core/types.js'
import { isOwnOrBotMessage, type Channel, type ChannelStatus } from './base.js'

/** The slice of a socket.io client socket this channel uses. */
export interface ChatSocket {
  readonly connected: boolean
  on(event: string, listener: (...args: unknown[]) => void): void
  emit(event: string, ...args: unknown[]): void
  disconnect(): void
}

export interface ChatSocketOptions {
  auth: Record<string, unknown>
  reconnectionDelayMs: number
  reconnectionDelayMaxMs: number
}

export type ChatSocketFactory = (url: string, options: ChatSocketOptions) => ChatSocket

/** Opens a socket.io connection with unlimited reconnection attempts. */
export const connectSocket: ChatSocketFactory = (url, options) => {
  const socket = io(url, {
    auth: options.auth,
    reconnection: true,
    reconnectionAttempts: Infinity,
    reconnectionDelay: options.reconnectionDelayMs,
    reconnectionDelayMax: options.reconnectionDelayMaxMs,
    timeout: 10_000
  })
  return {
    get connected() {
      return socket.connected
    },
    on(event, listener) {
      socket.on(event, listener)
    },
    emit(event, ...args) {
      socket.emit(event, ...args)
    },
    disconnect() {
      socket.disconnect()
    }
  }
}

const chatUserSchema = z.object({
  username: z.string().default(''),
  displayName: z.string().optional(),
  provider: z.string().optional(),
  isBot: z.boolean().default(false)
})

const chatMessageSchema = z.object({
  id: z.string().default(''),
  user: chatUserSchema,
  content: z.string(),
  room: z.string().optional(),
  timestamp: z.number().optional()
})

const systemEventSchema = z.object({
  type: z.string().default(''),
  message: z.string().default('')
})

/**
 * Adapter for the chat server's Socket.IO protocol.
 *
 * Reconnection is left to socket.io-client; this class only counts
 * disconnects and keeps the online user list current.
 */
export class ChatServerChannel implements Channel, ChannelStatus {
  readonly name = 'chat' as const
  private socket: ChatSocket | null = null
  private readonly online = new Map<string, string>()
  private disconnects = 0

  constructor(
    private readonly config: BotConfig,
    private readonly bus: MessageBus,
    private readonly logger: Logger,
    private readonly createSocket: ChatSocketFactory = connectSocket
  ) {}

  get connected(): boolean {
    return this.socket?.connected ?? false
  }

  get reconnects(): number {
    return this.disconnects
  }

  get onlineUsers(): number {
    return this.online.size
  }

  async start(): Promise<void> {
    if (this.socket) return
    const { chatServer, bot } = this.config

    this.logger.info('channel.chat.connecting', { url: chatServer.url })
    const socket = this.createSocket(chatServer.url, {
      auth: {
        username: bot.username,
        displayName: bot.displayName,
        avatar: bot.avatar,
        isBot: true,
        apiKey: chatServer.apiKey
      },
      reconnectionDelayMs: chatServer.reconnectDelaySeconds * 1000,
      reconnectionDelayMaxMs: chatServer.maxReconnectDelaySeconds * 1000
    })

    socket.on('connect', () => {
      this.logger.info('channel.chat.connected', { url: chatServer.url })
    })
    socket.on('disconnect', (reason) => {
      this.disconnects += 1
      this.logger.warn('channel.chat.disconnected', {
        reason: String(reason),
        reconnects: this.disconnects
      })
    })
    socket.on('connect_error', (error) => {
      this.logger.error('channel.chat.connect_error', {
        error: error instanceof Error ? error.message : String(error)
      })
    })
    socket.on('message', (data) => {
      this.onMessage(data).catch((error: unknown) => {
        this.logger.error('channel.chat.message_error', {
          error: error instanceof Error ? error.message : String(error)
        })
      })
    })
    socket.on('history', (messages) => {
      // History is replayed on join; it is never treated as commands.
      this.logger.info('channel.chat.history', {
        count: Array.isArray(messages) ? messages.length : 0
      })
    })
    socket.on('users', (users) => this.onUsers(users))
    socket.on('system', (data) => {
      const parsed = systemEventSchema.safeParse(data)
      if (parsed.success) {
        this.logger.info('channel.chat.system', { type: parsed.data.type, message: parsed.data.message })
      }
    })
    socket.on('banned', (data) => {
      const reason =
        typeof data === 'object' && data !== null && 'reason' in data ? String(data.reason) : 'unknown'
      this.logger.error('channel.chat.banned', { reason })
    })
    socket.on('error', (data) => {
      this.logger.error('channel.chat.server_error', { error: String(data) })
    })

    this.socket = socket
  }

  async stop(): Promise<void> {
    if (!this.socket) return
    this.socket.disconnect()
    this.socket = null
    this.online.clear()
    this.logger.info('channel.chat.stop')
  }

  /** Emits a chat message, truncated to the server's maximum length. */
  async send(message: OutboundMessage): Promise<void> {
    if (message.channel !== 'chat') return
    if (!this.socket?.connected) {
      this.logger.warn('channel.chat.send_dropped', { reason: 'not connected' })
      return
    }
    const text = message.content.trim()
    if (!text) return

    this.socket.emit('message', truncateText(text, this.config.maxMessageLength))
    this.logger.debug('channel.chat.sent', { chatId: message.chatId, preview: text.slice(0, 50) })
  }

  private async onMessage(data: unknown): Promise<void> {
    const parsed = chatMessageSchema.safeParse(data)
    if (!parsed.success) {
      this.logger.warn('channel.chat.invalid_message', { error: parsed.error.message })
      return
    }

    const { user, content, id, room, timestamp } = parsed.data
    if (!user.username || isOwnOrBotMessage(user, this.config.bot.username)) return

    const inbound: InboundMessage = {
      channel: 'chat',
      senderId: user.username,
      senderName: user.displayName || user.username,
      chatId: room ?? DEFAULT_ROOM,
      content,
      timestamp: new Date(timestamp ?? Date.now()).toISOString(),
      metadata: { messageId: id }
    }
    await this.bus.publishInbound(inbound)
  }

  private onUsers(users: unknown): void {
    if (!Array.isArray(users)) return
    this.online.clear()
    for (const entry of users) {
      const parsed = chatUserSchema.safeParse(entry)
      if (!parsed.success || !parsed.data.username) continue
      this.online.set(parsed.data.username.toLowerCase(), parsed.data.displayName ?? parsed.data.username)
    }
    this.logger.debug('channel.chat.users', { online: this.online.size })
  }
}
