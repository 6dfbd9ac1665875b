import type { CommandSpec } from './types.js'

/** Resolves a command name or alias to its spec. */
export type CommandLookup = (nameOrAlias: string) => CommandSpec | undefined

/**
 * Per-command, per-user cooldown ledger.
 *
 * Memory only: the ledger starts empty on every process start.
 */
export class CooldownTracker {
  /** canonical command name -> lowercase username -> last successful use (ms) */
  private readonly ledger = new Map<string, Map<string, number>>()

  constructor(
    private readonly lookup: CommandLookup,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Returns the whole seconds `username` must still wait before using
   * `command` again, or `null` when the command is ready.
   */
  check(command: string, username: string): number | null {
    const spec = this.lookup(command)
    if (!spec || spec.cooldownSeconds <= 0) return null

    const lastUse = this.ledger.get(spec.name)?.get(username.toLowerCase())
    if (lastUse === undefined) return null

    const elapsedSeconds = (this.now() - lastUse) / 1000
    const remaining = spec.cooldownSeconds - elapsedSeconds
    if (remaining <= 0) return null
    return Math.ceil(remaining)
  }

  /** Starts the cooldown clock for `username` on `command`. */
  commit(command: string, username: string): void {
    const spec = this.lookup(command)
    if (!spec || spec.cooldownSeconds <= 0) return

    let users = this.ledger.get(spec.name)
    if (!users) {
      users = new Map()
      this.ledger.set(spec.name, users)
    }
    users.set(username.toLowerCase(), this.now())
  }

  /** Forgets recorded uses, for one canonical command or for all commands. */
  clear(command?: string): void {
    if (command === undefined) {
      this.ledger.clear()
      return
    }
    this.ledger.delete(command.toLowerCase())
  }

  /** Number of users with a recorded use of `command`. */
  size(command: string): number {
    return this.ledger.get(command.toLowerCase())?.size ?? 0
  }
}
