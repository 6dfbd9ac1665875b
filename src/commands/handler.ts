import { MessageBus } from '../core/bus.js'
import type { InboundMessage } from '../core/types.js'
import { createCommandContext } from './context.js'
import type { CommandRegistry } from './registry.js'
import type { CommandContext } from './types.js'

/** A command token and its argument text, prefix already removed. */
export interface ParsedCommand {
  command: string
  args: string
}

/**
 * Second-chance interpreter for prefixed messages the registry does not
 * know (e.g. the user-defined command table). Returns true when it answered.
 */
export type CommandFallback = (ctx: CommandContext) => boolean | Promise<boolean>

/**
 * Parses prefixed chat messages into invocations and dispatches them
 * through the {@link CommandRegistry}.
 */
export class CommandHandler {
  private readonly fallbacks: CommandFallback[] = []

  constructor(
    private readonly registry: CommandRegistry,
    private readonly bus: MessageBus,
    private readonly prefix: string
  ) {}

  /** Registers an interpreter tried when no registered command matches. */
  addFallback(fallback: CommandFallback): void {
    this.fallbacks.push(fallback)
  }

  removeFallback(fallback: CommandFallback): void {
    const index = this.fallbacks.indexOf(fallback)
    if (index >= 0) this.fallbacks.splice(index, 1)
  }

  /**
   * Splits `!name rest of text` into `{ command: 'name', args: 'rest of text' }`.
   * Returns `null` when the text has no prefix or no command token.
   */
  parse(content: string): ParsedCommand | null {
    const trimmed = content.trim()
    if (!this.prefix || !trimmed.startsWith(this.prefix)) return null

    const body = trimmed.slice(this.prefix.length)
    const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(body)
    if (!match?.[1]) return null

    return { command: match[1].toLowerCase(), args: (match[2] ?? '').trim() }
  }

  /** Returns `true` when the text looks like a command invocation. */
  isCommand(content: string): boolean {
    return this.parse(content) !== null
  }

  /**
   * Dispatches a prefixed message. Resolves to `false` when neither the
   * registry nor any fallback recognised it.
   */
  async execute(message: InboundMessage): Promise<boolean> {
    const parsed = this.parse(message.content)
    if (!parsed) return false

    const ctx = createCommandContext({
      user: { username: message.senderId, displayName: message.senderName },
      message: message.content,
      command: parsed.command,
      args: parsed.args,
      room: message.chatId,
      send: (room, text) =>
        this.bus.publishOutbound({ channel: message.channel, chatId: room, content: text })
    })

    if (await this.registry.handleInvocation(ctx)) return true

    for (const fallback of this.fallbacks) {
      if (await fallback(ctx)) return true
    }
    return false
  }
}
