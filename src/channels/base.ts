import type { ChannelName, OutboundMessage } from '../core/types.js'

/**
 * Common channel adapter contract.
 */
export interface Channel {
  readonly name: ChannelName
  start(): Promise<void>
  stop(): Promise<void>
  send(message: OutboundMessage): Promise<void>
}

/** Connection counters a channel can report for `!stats`. */
export interface ChannelStatus {
  connected: boolean
  reconnects: number
  onlineUsers: number
}

/**
 * True when a message author is the bot itself or another bot account.
 * Usernames compare case-insensitively.
 */
export function isOwnOrBotMessage(
  author: { username: string; isBot: boolean },
  botUsername: string
): boolean {
  return author.isBot || author.username.toLowerCase() === botUsername.toLowerCase()
}
