import { PermissionLevel } from '../commands/types.js'
import type { ModuleName } from '../config/schema.js'
import { describeError } from '../core/logger.js'
import { customModule } from './custom.js'
import { economyModule } from './economy.js'
import { fishingModule } from './fishing.js'
import { gamblingModule } from './gambling.js'
import { moderationModule } from './moderation.js'
import type { BotModule, ModuleContext, ModuleFactory } from './types.js'
import { utilityModule } from './utility.js'

export const BUILTIN_MODULES: Readonly<Record<ModuleName, ModuleFactory>> = {
  economy: () => economyModule(),
  fishing: () => fishingModule(),
  gambling: () => gamblingModule(),
  custom: () => customModule(),
  utility: () => utilityModule(),
  moderation: () => moderationModule()
}

export interface ModuleLoadResult {
  loaded: BotModule[]
  failed: Array<{ name: ModuleName; error: string }>
}

/**
 * Runs each module's setup in the given order. A module whose setup
 * throws is reported in `failed`, its partial registrations are removed,
 * and loading continues with the next one.
 */
export async function loadModules(
  names: readonly ModuleName[],
  ctx: ModuleContext,
  catalog: Readonly<Record<ModuleName, ModuleFactory>> = BUILTIN_MODULES
): Promise<ModuleLoadResult> {
  const result: ModuleLoadResult = { loaded: [], failed: [] }

  for (const name of names) {
    const module = catalog[name]()
    try {
      await module.setup(ctx)
      result.loaded.push(module)
      const commands = ctx.registry.listCommands({
        group: name,
        includeHidden: true,
        maxLevel: PermissionLevel.Owner
      })
      ctx.logger.info('module.loaded', { name, commands: commands.length })
    } catch (error) {
      ctx.registry.unregisterGroup(name)
      const { error: message } = describeError(error)
      result.failed.push({ name, error: message })
      ctx.logger.error('module.load_failed', { name, error: message })
    }
  }

  return result
}

/** Runs teardown and removes every command the module registered. */
export async function unloadModule(module: BotModule, ctx: ModuleContext): Promise<string[]> {
  try {
    await module.teardown?.(ctx)
  } catch (error) {
    ctx.logger.warn('module.teardown_failed', { name: module.name, error: describeError(error).error })
  }
  const removed = ctx.registry.unregisterGroup(module.name)
  ctx.logger.info('module.unloaded', { name: module.name, commands: removed.length })
  return removed
}
