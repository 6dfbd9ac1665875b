/**
 * Ordered permission gates. Numeric order is significant: a listing filter
 * keeps a command when `spec.permission <= maxLevel`.
 */
export enum PermissionLevel {
  Everyone = 0,
  /** Has an account. Not enforced by the evaluator; handlers check balances themselves. */
  Registered = 1,
  /** Currently satisfied by the admin list only. */
  Trusted = 2,
  Admin = 3,
  /** The first configured admin. */
  Owner = 4
}

/** The chat user who typed a command. */
export interface CommandUser {
  username: string
  displayName: string
}

/**
 * Per-invocation context handed to command handlers and hooks.
 */
export interface CommandContext {
  readonly user: CommandUser
  /** Full message text, prefix included. */
  readonly message: string
  /** Everything after the command token, trimmed. */
  readonly args: string
  readonly argsList: readonly string[]
  /** Command token as typed (lowercased, not alias-resolved). */
  readonly command: string
  readonly room: string
  /** Sends text to the originating room. */
  reply(text: string): Promise<void>
  /** Sends `@displayName: text` to the originating room. */
  replyMention(text: string): Promise<void>
}

/**
 * Command implementation. Synchronous handlers are awaited like async ones.
 */
export type CommandHandlerFn = (ctx: CommandContext, args: string) => void | Promise<void>

/**
 * Registered command, as stored by the registry.
 */
export interface CommandSpec {
  /** Canonical lowercase name. */
  readonly name: string
  readonly aliases: readonly string[]
  readonly permission: PermissionLevel
  /** Seconds between successful uses per user; 0 disables the cooldown. */
  readonly cooldownSeconds: number
  /** Excluded from listings unless explicitly requested; dispatch ignores it. */
  readonly hidden: boolean
  /** Grouping tag, normally the owning module's name. */
  readonly group: string
  readonly description: string
  readonly usage: string
  readonly handler: CommandHandlerFn
}

/** Input to `CommandRegistry.register`; omitted fields take defaults. */
export interface CommandRegistration {
  name: string
  handler: CommandHandlerFn
  aliases?: string[]
  permission?: PermissionLevel
  cooldownSeconds?: number
  hidden?: boolean
  group?: string
  description?: string
  usage?: string
}

/** Returned by a pre-hook to stop the command before it runs. */
export type PreHookVerdict = 'cancel' | void

export type PreCommandHook = (
  ctx: CommandContext,
  spec: CommandSpec
) => PreHookVerdict | Promise<PreHookVerdict>

export type PostCommandHook = (ctx: CommandContext, spec: CommandSpec) => void | Promise<void>

export interface ListCommandsOptions {
  group?: string
  includeHidden?: boolean
  maxLevel?: PermissionLevel
}
