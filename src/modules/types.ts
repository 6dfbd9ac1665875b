import type { CommandHandler } from '../commands/handler.js'
import type { CommandRegistry } from '../commands/registry.js'
import type { BotConfig, ModuleName } from '../config/schema.js'
import type { BotLoop } from '../core/bot-loop.js'
import type { JsonStore } from '../core/json-store.js'
import type { BotStats, Logger } from '../core/types.js'
import type { Bank } from './bank.js'

/**
 * Everything a module may touch while it is loaded.
 */
export interface ModuleContext {
  readonly config: BotConfig
  readonly registry: CommandRegistry
  /** For fallback interpreters. */
  readonly commands: CommandHandler
  /** For message listeners. */
  readonly loop: BotLoop
  readonly logger: Logger
  readonly bank: Bank
  /** User-defined command name -> response text. */
  readonly customCommands: JsonStore<string>
  readonly stats: () => BotStats
  /** Uniform in [0, 1). */
  readonly random: () => number
  /** Milliseconds since the epoch. */
  readonly now: () => number
}

/**
 * A feature bundle. `setup` registers the module's commands with
 * `group` set to the module name so unloading can find them.
 */
export interface BotModule {
  readonly name: ModuleName
  setup(ctx: ModuleContext): void | Promise<void>
  teardown?(ctx: ModuleContext): void | Promise<void>
}

export type ModuleFactory = () => BotModule
