import readline from 'node:readline'
import type { Readable, Writable } from 'node:stream'

import { DEFAULT_ROOM } from '../commands/context.js'
import type { BotConfig } from '../config/schema.js'
import { MessageBus } from '../core/bus.js'
import type { InboundMessage, Logger, OutboundMessage } from '../core/types.js'
import type { Channel } from './base.js'

interface CliChannelIo {
  input: Readable
  output: Writable
}

/**
 * Local terminal channel for trying commands without a chat server.
 * Every line is posted as the configured CLI user.
 */
export class CliChannel implements Channel {
  readonly name = 'cli' as const
  private rl: readline.Interface | null = null
  private readonly io: CliChannelIo

  constructor(
    private readonly config: BotConfig,
    private readonly bus: MessageBus,
    private readonly logger: Logger,
    io?: Partial<CliChannelIo>
  ) {
    this.io = {
      input: io?.input ?? process.stdin,
      output: io?.output ?? process.stdout
    }
  }

  async start(): Promise<void> {
    if (!this.config.cli.enabled) return

    this.rl = readline.createInterface({
      input: this.io.input,
      output: this.io.output,
      prompt: `${this.config.cli.username}> `
    })

    this.rl.on('line', (line) => {
      this.handleLine(line).catch((error: unknown) => {
        this.logger.error('channel.cli.line_error', {
          error: error instanceof Error ? error.message : String(error)
        })
      })
    })
    this.rl.on('close', () => {
      this.logger.info('channel.cli.closed')
    })

    this.io.output.write(`CLI channel enabled. Try ${this.config.commandPrefix}help.\n`)
    this.rl.prompt()
    this.logger.info('channel.cli.start')
  }

  async stop(): Promise<void> {
    if (!this.rl) return
    this.rl.close()
    this.rl = null
    this.logger.info('channel.cli.stop')
  }

  async send(message: OutboundMessage): Promise<void> {
    if (!this.config.cli.enabled) return
    if (message.channel !== 'cli') return
    if (!message.content.trim()) return

    this.io.output.write(`bot> ${message.content}\n`)
    this.rl?.prompt()
  }

  private async handleLine(raw: string): Promise<void> {
    const content = raw.trim()
    if (!content) {
      this.rl?.prompt()
      return
    }

    const inbound: InboundMessage = {
      channel: 'cli',
      senderId: this.config.cli.username,
      senderName: this.config.cli.username,
      chatId: DEFAULT_ROOM,
      content,
      timestamp: new Date().toISOString()
    }
    await this.bus.publishInbound(inbound)
  }
}
