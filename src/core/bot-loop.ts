import type { CommandHandler } from '../commands/handler.js'
import { MessageBus } from './bus.js'
import { describeError } from './logger.js'
import type { InboundMessage, Logger } from './types.js'

/** Returned by a message listener to end processing of the current message. */
export type ListenerVerdict = 'stop' | void

/**
 * Observer run for every inbound message before command dispatch
 * (activity tracking and the like).
 */
export type MessageListener = (
  message: InboundMessage
) => ListenerVerdict | Promise<ListenerVerdict>

/**
 * Central message-processing loop.
 *
 * Consumes inbound chat events one at a time, runs message listeners and
 * hands prefixed messages to the {@link CommandHandler}. Each message is
 * processed to completion before the next is taken off the bus.
 */
export class BotLoop {
  private running = false
  private readonly listeners: MessageListener[] = []
  private messages = 0
  private commands = 0

  constructor(
    private readonly bus: MessageBus,
    private readonly commandHandler: CommandHandler,
    private readonly logger: Logger
  ) {}

  get messagesProcessed(): number {
    return this.messages
  }

  get commandsProcessed(): number {
    return this.commands
  }

  /** `first` runs the listener ahead of those already added. */
  addListener(listener: MessageListener, options: { first?: boolean } = {}): void {
    if (options.first) this.listeners.unshift(listener)
    else this.listeners.push(listener)
  }

  removeListener(listener: MessageListener): void {
    const index = this.listeners.indexOf(listener)
    if (index >= 0) this.listeners.splice(index, 1)
  }

  /** Starts the processing loop. Resolves after {@link BotLoop.stop}. */
  async start(): Promise<void> {
    this.running = true
    this.logger.info('bot.start')

    while (this.running) {
      const inbound = await this.bus.consumeInbound()
      await this.processMessage(inbound)
    }
  }

  /**
   * Processes exactly one queued inbound message.
   *
   * Useful for deterministic tests.
   */
  async processOnce(): Promise<void> {
    const inbound = await this.bus.consumeInbound()
    await this.processMessage(inbound)
  }

  stop(): void {
    this.running = false
    this.logger.info('bot.stop', {
      messagesProcessed: this.messages,
      commandsProcessed: this.commands
    })
  }

  private async processMessage(inbound: InboundMessage): Promise<void> {
    this.messages += 1
    try {
      for (const listener of this.listeners) {
        if ((await this.runListener(listener, inbound)) === 'stop') return
      }

      if (await this.commandHandler.execute(inbound)) {
        this.commands += 1
        this.logger.info('bot.command', {
          channel: inbound.channel,
          chatId: inbound.chatId,
          senderId: inbound.senderId,
          content: inbound.content.slice(0, 100)
        })
      }
    } catch (error) {
      this.logger.error('bot.message_failed', {
        senderId: inbound.senderId,
        ...describeError(error)
      })
    }
  }

  private async runListener(
    listener: MessageListener,
    inbound: InboundMessage
  ): Promise<ListenerVerdict> {
    try {
      return await listener(inbound)
    } catch (error) {
      this.logger.warn('bot.listener_failed', {
        senderId: inbound.senderId,
        error: describeError(error).error
      })
      return undefined
    }
  }
}
