import { join } from 'node:path'

import { z } from 'zod'

import type { ChatSocketFactory } from './channels/chat-server.js'
import { ChannelManager } from './channels/manager.js'
import { CommandHandler, CommandRegistry, PermissionEvaluator } from './commands/index.js'
import type { BotConfig } from './config/schema.js'
import { BotLoop } from './core/bot-loop.js'
import { MessageBus } from './core/bus.js'
import { JsonStore } from './core/json-store.js'
import type { BotStats, Logger } from './core/types.js'
import { Bank } from './modules/bank.js'
import { loadModules, type ModuleLoadResult } from './modules/loader.js'
import type { ModuleContext } from './modules/types.js'

export interface BotDependencies {
  logger: Logger
  createSocket?: ChatSocketFactory
  random?: () => number
  now?: () => number
}

export interface Bot {
  readonly bus: MessageBus
  readonly registry: CommandRegistry
  readonly commands: CommandHandler
  readonly loop: BotLoop
  readonly channels: ChannelManager
  readonly bank: Bank
  readonly modules: ModuleLoadResult
  readonly moduleContext: ModuleContext
  stats(): BotStats
  /** Connects the channels and runs the loop until {@link Bot.stop}. */
  run(): Promise<void>
  stop(): Promise<void>
}

/**
 * Wires the command system, stores, modules and channels for one bot
 * instance. Nothing connects until {@link Bot.run}.
 */
export async function createBot(config: BotConfig, deps: BotDependencies): Promise<Bot> {
  const { logger } = deps
  const now = deps.now ?? Date.now
  const random = deps.random ?? Math.random
  const startedAt = now()

  const bus = new MessageBus()
  const registry = new CommandRegistry({
    permissions: new PermissionEvaluator(config.admins),
    logger,
    now
  })
  const commands = new CommandHandler(registry, bus, config.commandPrefix)
  const loop = new BotLoop(bus, commands, logger)
  const channels = new ChannelManager(config, bus, logger, deps.createSocket)

  registry.addPostHook((ctx, spec) => {
    logger.debug('command.completed', { command: spec.name, typed: ctx.command, user: ctx.user.username })
  })

  const bank = new Bank(config.dataDir, () => config.economy.startingBalance, logger)
  const customCommands = new JsonStore(join(config.dataDir, 'custom_commands.json'), z.string(), logger)
  await bank.init()
  await customCommands.init()

  const stats = (): BotStats => {
    const status = channels.status
    return {
      uptimeSeconds: Math.floor((now() - startedAt) / 1000),
      connected: status.connected,
      reconnects: status.reconnects,
      messagesProcessed: loop.messagesProcessed,
      commandsProcessed: loop.commandsProcessed,
      onlineUsers: status.onlineUsers
    }
  }

  const moduleContext: ModuleContext = {
    config,
    registry,
    commands,
    loop,
    logger,
    bank,
    customCommands,
    stats,
    random,
    now
  }
  const modules = await loadModules(config.enabledModules, moduleContext)

  logger.info('bot.ready', {
    commands: registry.size(),
    modules: modules.loaded.map((m) => m.name),
    failed: modules.failed.map((m) => m.name)
  })

  return {
    bus,
    registry,
    commands,
    loop,
    channels,
    bank,
    modules,
    moduleContext,
    stats,
    async run() {
      await channels.startAll()
      await loop.start()
    },
    async stop() {
      loop.stop()
      await channels.stopAll()
    }
  }
}
