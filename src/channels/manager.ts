import type { BotConfig } from '../config/schema.js'
import { MessageBus } from '../core/bus.js'
import type { Logger } from '../core/types.js'
import type { Channel, ChannelStatus } from './base.js'
import { ChatServerChannel, type ChatSocketFactory } from './chat-server.js'
import { CliChannel } from './cli.js'

/**
 * Owns channel adapter lifecycle and outbound message dispatching.
 */
export class ChannelManager {
  private readonly channels: Channel[]
  private readonly chat: ChatServerChannel
  private dispatcherRunning = false

  constructor(
    config: BotConfig,
    private readonly bus: MessageBus,
    private readonly logger: Logger,
    createSocket?: ChatSocketFactory
  ) {
    this.chat = new ChatServerChannel(config, bus, logger, createSocket)
    this.channels = [this.chat, new CliChannel(config, bus, logger)]
  }

  /** Connection counters of the chat server channel. */
  get status(): ChannelStatus {
    return {
      connected: this.chat.connected,
      reconnects: this.chat.reconnects,
      onlineUsers: this.chat.onlineUsers
    }
  }

  /** Starts all adapters and launches the outbound dispatcher. */
  async startAll(): Promise<void> {
    for (const channel of this.channels) {
      await channel.start()
    }

    this.dispatcherRunning = true
    void this.dispatchOutbound()
  }

  /** Stops outbound dispatch and all channel adapters. */
  async stopAll(): Promise<void> {
    this.dispatcherRunning = false

    for (const channel of this.channels) {
      await channel.stop()
    }
  }

  private async dispatchOutbound(): Promise<void> {
    while (this.dispatcherRunning) {
      const msg = await this.bus.consumeOutbound()
      const channel = this.channels.find((ch) => ch.name === msg.channel)

      if (!channel) {
        this.logger.warn('channel.unknown', { channel: msg.channel })
        continue
      }

      try {
        await channel.send(msg)
      } catch (error) {
        this.logger.error('channel.send_failed', {
          channel: msg.channel,
          error: error instanceof Error ? error.message : String(error)
        })
      }
    }
  }
}
