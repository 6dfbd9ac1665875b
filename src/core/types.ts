export type ChannelName = 'chat' | 'cli'

/**
 * Normalized inbound message emitted by a channel adapter.
 */
export interface InboundMessage {
  channel: ChannelName
  /** Account name of the author, as the server reports it. */
  senderId: string
  senderName: string
  /** Room the message was posted in. */
  chatId: string
  content: string
  timestamp: string
  metadata?: Record<string, unknown>
}

/**
 * Normalized outbound message consumed by a channel adapter.
 */
export interface OutboundMessage {
  channel: ChannelName
  chatId: string
  content: string
  metadata?: Record<string, unknown>
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Minimal structured logger interface used across modules.
 */
export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void
  info(event: string, data?: Record<string, unknown>): void
  warn(event: string, data?: Record<string, unknown>): void
  error(event: string, data?: Record<string, unknown>): void
}

/** Runtime counters reported by `!stats` and `!uptime`. */
export interface BotStats {
  uptimeSeconds: number
  connected: boolean
  reconnects: number
  messagesProcessed: number
  commandsProcessed: number
  onlineUsers: number
}
