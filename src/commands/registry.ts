import { describeError } from '../core/logger.js'
import type { Logger } from '../core/types.js'
import { CooldownTracker } from './cooldown.js'
import { PermissionEvaluator } from './permissions.js'
import {
  PermissionLevel,
  type CommandContext,
  type CommandRegistration,
  type CommandSpec,
  type ListCommandsOptions,
  type PostCommandHook,
  type PreCommandHook,
  type PreHookVerdict
} from './types.js'

export const PERMISSION_DENIED_REPLY = "You don't have permission to use this command."
export const COMMAND_FAILED_REPLY = 'Error executing command.'

export function cooldownReply(seconds: number): string {
  return `Command on cooldown. Wait ${seconds}s.`
}

export interface CommandRegistryOptions {
  permissions: PermissionEvaluator
  logger: Logger
  /** Clock for the cooldown ledger, in milliseconds. */
  now?: () => number
}

/**
 * Central registry for all bot commands.
 *
 * Owns name and alias lookup, module groups, the pre/post hook lists and
 * the per-user cooldown ledger, and drives a single invocation through
 * {@link CommandRegistry.handleInvocation}.
 */
export class CommandRegistry {
  private readonly commands = new Map<string, CommandSpec>()
  /** alias -> canonical name */
  private readonly aliases = new Map<string, string>()
  /** group -> canonical names, in registration order */
  private readonly groupMembers = new Map<string, string[]>()
  private readonly preHooks: PreCommandHook[] = []
  private readonly postHooks: PostCommandHook[] = []

  readonly permissions: PermissionEvaluator
  readonly cooldowns: CooldownTracker
  private readonly logger: Logger

  constructor(options: CommandRegistryOptions) {
    this.permissions = options.permissions
    this.logger = options.logger
    this.cooldowns = new CooldownTracker((name) => this.resolve(name), options.now)
  }

  /**
   * Registers a command, replacing any command of the same name.
   * Aliases silently move to the newest command that claims them.
   */
  register(registration: CommandRegistration): CommandSpec {
    const cooldownSeconds = registration.cooldownSeconds ?? 0
    if (!Number.isInteger(cooldownSeconds) || cooldownSeconds < 0) {
      throw new RangeError(
        `cooldownSeconds for "${registration.name}" must be a non-negative integer, got ${cooldownSeconds}`
      )
    }

    const name = registration.name.trim().toLowerCase()
    if (!name) throw new RangeError('Command name must not be empty')

    const spec: CommandSpec = Object.freeze({
      name,
      aliases: Object.freeze(
        [...new Set((registration.aliases ?? []).map((a) => a.trim().toLowerCase()))].filter(
          (a) => a && a !== name
        )
      ),
      permission: registration.permission ?? PermissionLevel.Everyone,
      cooldownSeconds,
      hidden: registration.hidden ?? false,
      group: registration.group ?? '',
      description: registration.description ?? '',
      usage: registration.usage ?? '',
      handler: registration.handler
    })

    const previous = this.commands.get(name)
    if (previous) this.detach(previous)

    this.commands.set(name, spec)
    for (const alias of spec.aliases) {
      this.aliases.set(alias, name)
    }
    if (spec.group) {
      const members = this.groupMembers.get(spec.group) ?? []
      if (!members.includes(name)) members.push(name)
      this.groupMembers.set(spec.group, members)
    }

    this.logger.debug('command.registered', {
      name,
      aliases: [...spec.aliases],
      group: spec.group || undefined,
      replaced: previous !== undefined
    })
    return spec
  }

  /** Removes a command by canonical name. Returns false when it is not registered. */
  unregister(name: string): boolean {
    const key = name.toLowerCase()
    const spec = this.commands.get(key)
    if (!spec) return false

    this.detach(spec)
    this.commands.delete(key)
    this.cooldowns.clear(key)
    this.logger.debug('command.unregistered', { name: key })
    return true
  }

  /** Removes every command of a group and returns their names. */
  unregisterGroup(group: string): string[] {
    const members = [...(this.groupMembers.get(group) ?? [])]
    return members.filter((name) => this.unregister(name))
  }

  /** Looks up a command by canonical name, then by alias (case-insensitive). */
  resolve(nameOrAlias: string): CommandSpec | undefined {
    const key = nameOrAlias.toLowerCase()
    const direct = this.commands.get(key)
    if (direct) return direct

    const canonical = this.aliases.get(key)
    return canonical === undefined ? undefined : this.commands.get(canonical)
  }

  /** Returns true when a name or alias maps to a registered command. */
  has(nameOrAlias: string): boolean {
    return this.resolve(nameOrAlias) !== undefined
  }

  /** Commands passing every filter, sorted by canonical name. */
  listCommands(options: ListCommandsOptions = {}): CommandSpec[] {
    const { group, includeHidden = false, maxLevel = PermissionLevel.Everyone } = options
    return [...this.commands.values()]
      .filter((spec) => group === undefined || spec.group === group)
      .filter((spec) => includeHidden || !spec.hidden)
      .filter((spec) => spec.permission <= maxLevel)
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  /** Names of groups that currently have members, sorted. */
  groups(): string[] {
    return [...this.groupMembers.entries()]
      .filter(([, members]) => members.length > 0)
      .map(([group]) => group)
      .sort()
  }

  size(): number {
    return this.commands.size
  }

  addPreHook(hook: PreCommandHook): void {
    this.preHooks.push(hook)
  }

  addPostHook(hook: PostCommandHook): void {
    this.postHooks.push(hook)
  }

  /**
   * Runs one parsed invocation: lookup, permission, cooldown, pre-hooks,
   * handler, cooldown commit, post-hooks.
   *
   * Returns `false` only when the command is unknown, so the caller can try
   * other interpreters. Never rejects.
   */
  async handleInvocation(ctx: CommandContext): Promise<boolean> {
    const spec = this.resolve(ctx.command)
    if (!spec) return false

    const username = ctx.user.username
    if (!this.permissions.check(username, spec.permission)) {
      this.logger.info('command.denied', { command: spec.name, user: username })
      await this.safeReply(ctx, PERMISSION_DENIED_REPLY)
      return true
    }

    const remaining = this.cooldowns.check(spec.name, username)
    if (remaining !== null) {
      this.logger.debug('command.cooldown', { command: spec.name, user: username, remaining })
      await this.safeReply(ctx, cooldownReply(remaining))
      return true
    }

    for (const hook of this.preHooks) {
      let verdict: PreHookVerdict
      try {
        verdict = await hook(ctx, spec)
      } catch (error) {
        this.logger.warn('command.hook_failed', {
          stage: 'pre',
          command: spec.name,
          error: describeError(error).error
        })
        continue
      }
      if (verdict === 'cancel') {
        this.logger.debug('command.cancelled', { command: spec.name, user: username })
        return true
      }
    }

    try {
      await spec.handler(ctx, ctx.args)
    } catch (error) {
      const { error: message, stack } = describeError(error)
      this.logger.error('command.failed', { command: spec.name, user: username, error: message })
      if (stack) this.logger.debug('command.failed.stack', { command: spec.name, stack })
      await this.safeReply(ctx, COMMAND_FAILED_REPLY)
      return true
    }

    this.cooldowns.commit(spec.name, username)

    for (const hook of this.postHooks) {
      try {
        await hook(ctx, spec)
      } catch (error) {
        this.logger.warn('command.hook_failed', {
          stage: 'post',
          command: spec.name,
          error: describeError(error).error
        })
      }
    }

    return true
  }

  /** Drops alias and group entries that still point at `spec`. */
  private detach(spec: CommandSpec): void {
    for (const alias of spec.aliases) {
      if (this.aliases.get(alias) === spec.name) this.aliases.delete(alias)
    }
    if (spec.group) {
      const members = this.groupMembers.get(spec.group)
      if (members) {
        const next = members.filter((member) => member !== spec.name)
        if (next.length > 0) this.groupMembers.set(spec.group, next)
        else this.groupMembers.delete(spec.group)
      }
    }
  }

  private async safeReply(ctx: CommandContext, text: string): Promise<void> {
    try {
      await ctx.reply(text)
    } catch (error) {
      this.logger.warn('command.reply_failed', {
        command: ctx.command,
        error: describeError(error).error
      })
    }
  }
}
