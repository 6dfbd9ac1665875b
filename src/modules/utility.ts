import { join } from 'node:path'

import { z } from 'zod'

import { PermissionLevel } from '../commands/types.js'
import { updateRuntimeOverrides } from '../config/load.js'
import type { RuntimeOverrides } from '../config/schema.js'
import type { MessageListener } from '../core/bot-loop.js'
import { JsonStore } from '../core/json-store.js'
import { bareCommandName, parseWholeNumber, randomInt, targetName } from './format.js'
import type { BotModule, ModuleContext } from './types.js'

const COMMANDS_PER_GROUP = 5

/** `93784` -> `1d 2h 3m 4s`; zero units are skipped except seconds. */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds))
  const parts: string[] = []
  const days = Math.floor(seconds / 86_400)
  const hours = Math.floor((seconds % 86_400) / 3_600)
  const minutes = Math.floor((seconds % 3_600) / 60)
  if (days > 0) parts.push(`${days}d`)
  if (hours > 0) parts.push(`${hours}h`)
  if (minutes > 0) parts.push(`${minutes}m`)
  parts.push(`${seconds % 60}s`)
  return parts.join(' ')
}

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'} ago`
}

/** Coarse relative time: `42 seconds ago`, `1 minute ago`, `3 days ago`. */
export function formatTimeAgo(elapsedMs: number): string {
  const seconds = Math.max(0, Math.floor(elapsedMs / 1000))
  if (seconds < 60) return `${seconds} seconds ago`
  if (seconds < 3_600) return plural(Math.floor(seconds / 60), 'minute')
  if (seconds < 86_400) return plural(Math.floor(seconds / 3_600), 'hour')
  return plural(Math.floor(seconds / 86_400), 'day')
}

/** `2026-01-02T03:04:05.000Z` -> `2026-01-02 03:04 UTC` */
function formatTimestamp(iso: string): string {
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`
}

/** `a or b`, then `a, b`, then `a b`. Empty options are dropped. */
export function splitChoices(text: string): string[] {
  const parts = / or /i.test(text) ? text.split(/ or /i) : text.includes(',') ? text.split(',') : text.split(/\s+/)
  return parts.map((part) => part.trim()).filter(Boolean)
}

type ConfigKey = 'fishCooldown' | 'startingBalance' | 'gambleWinRate'
const CONFIG_KEYS: readonly ConfigKey[] = ['fishCooldown', 'startingBalance', 'gambleWinRate']

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key)
}

/**
 * Help, listings, bot status, last-seen tracking and operator settings.
 */
export function utilityModule(): BotModule {
  let tracker: MessageListener | null = null

  return {
    name: 'utility',
    async setup(ctx: ModuleContext) {
      const { registry, config, logger, customCommands } = ctx
      const p = config.commandPrefix

      const lastSeen = new JsonStore(join(config.dataDir, 'last_seen.json'), z.string(), logger)
      await lastSeen.init()

      registry.register({
        name: 'help',
        aliases: ['h', '?'],
        group: 'utility',
        description: 'Get help for a command',
        usage: `${p}help [command]`,
        async handler(cmd) {
          const [raw] = cmd.argsList
          if (!raw) {
            await cmd.reply(
              `${config.bot.displayName}: use ${p}commands to see all commands, ${p}help <command> for specific help`
            )
            return
          }

          const name = bareCommandName(raw, p)
          const spec = registry.resolve(name)
          if (!spec) {
            await cmd.reply(
              customCommands.has(name) ? `${p}${name} - Custom command` : `Command ${p}${name} not found`
            )
            return
          }

          const parts = [`${p}${spec.name}`]
          if (spec.aliases.length > 0) {
            parts.push(`(aliases: ${spec.aliases.map((a) => `${p}${a}`).join(', ')})`)
          }
          if (spec.description) parts.push(`- ${spec.description}`)
          if (spec.usage) parts.push(`Usage: ${spec.usage}`)
          await cmd.reply(parts.join(' '))
        }
      })

      registry.register({
        name: 'commands',
        aliases: ['cmds'],
        group: 'utility',
        description: 'List the commands you can use',
        usage: `${p}commands`,
        async handler(cmd) {
          const maxLevel = registry.permissions.levelOf(cmd.user.username)
          const byGroup = new Map<string, string[]>()
          for (const spec of registry.listCommands({ maxLevel })) {
            const group = spec.group || 'other'
            byGroup.set(group, [...(byGroup.get(group) ?? []), spec.name])
          }

          const sections = [...byGroup.keys()].sort().map((group) => {
            const names = byGroup.get(group) ?? []
            const shown = names
              .slice(0, COMMANDS_PER_GROUP)
              .map((n) => `${p}${n}`)
              .join(', ')
            const more = names.length > COMMANDS_PER_GROUP ? `... (+${names.length - COMMANDS_PER_GROUP} more)` : ''
            return `[${group}] ${shown}${more}`
          })
          await cmd.reply(`Commands: ${sections.join(' | ')}`)
        }
      })

      registry.register({
        name: 'ping',
        group: 'utility',
        description: 'Check if the bot is responsive',
        usage: `${p}ping`,
        async handler(cmd) {
          await cmd.reply('Pong!')
        }
      })

      registry.register({
        name: 'uptime',
        group: 'utility',
        description: 'Show bot uptime',
        usage: `${p}uptime`,
        async handler(cmd) {
          await cmd.reply(`Uptime: ${formatDuration(ctx.stats().uptimeSeconds)}`)
        }
      })

      registry.register({
        name: 'stats',
        group: 'utility',
        description: 'Show bot statistics',
        usage: `${p}stats`,
        async handler(cmd) {
          const s = ctx.stats()
          await cmd.reply(
            `Stats: ${s.messagesProcessed} messages, ${s.commandsProcessed} commands, ` +
              `${s.onlineUsers} online, ${s.reconnects} reconnects, ${ctx.bank.accountCount()} accounts`
          )
        }
      })

      registry.register({
        name: 'last',
        aliases: ['seen', 'lastseen'],
        group: 'utility',
        description: 'Check when a user was last seen',
        usage: `${p}last <username>`,
        async handler(cmd) {
          const [raw] = cmd.argsList
          if (!raw) {
            await cmd.reply(`Usage: ${p}last <username>`)
            return
          }
          const target = targetName(raw)
          const seenAt = lastSeen.get(target)
          if (seenAt === undefined) {
            await cmd.reply(`${target} has never been seen`)
            return
          }
          const ago = formatTimeAgo(ctx.now() - Date.parse(seenAt))
          await cmd.reply(`${target} was last seen ${ago} (${formatTimestamp(seenAt)})`)
        }
      })

      registry.register({
        name: 'random',
        aliases: ['rand'],
        group: 'utility',
        description: 'Show a random custom command',
        usage: `${p}random`,
        async handler(cmd) {
          const entries = customCommands.entries()
          const picked = entries[Math.floor(ctx.random() * entries.length)]
          if (!picked) {
            await cmd.reply('No custom commands available!')
            return
          }
          const [name, response] = picked
          await cmd.reply(`[${p}${name}] ${response}`)
        }
      })

      registry.register({
        name: 'choose',
        aliases: ['pick'],
        group: 'utility',
        description: 'Choose between options',
        usage: `${p}choose option1 or option2`,
        async handler(cmd, args) {
          if (!args) {
            await cmd.reply(`Usage: ${p}choose option1 or option2 or option3`)
            return
          }
          const options = splitChoices(args)
          const choice = options.length >= 2 ? options[Math.floor(ctx.random() * options.length)] : undefined
          if (choice === undefined) {
            await cmd.reply('Give me at least 2 options!')
            return
          }
          await cmd.reply(`I choose: ${choice}`)
        }
      })

      registry.register({
        name: 'rate',
        group: 'utility',
        description: 'Rate something out of 10',
        usage: `${p}rate <thing>`,
        async handler(cmd, args) {
          if (!args) {
            await cmd.reply(`Usage: ${p}rate <thing>`)
            return
          }
          await cmd.reply(`I rate ${args} a ${randomInt(ctx.random, 0, 10)}/10`)
        }
      })

      registry.register({
        name: 'about',
        group: 'utility',
        description: 'About the bot',
        usage: `${p}about`,
        async handler(cmd) {
          await cmd.reply(
            `${config.bot.displayName} - chat bot | Modules: ${config.enabledModules.join(', ')} | Use ${p}help for more info`
          )
        }
      })

      registry.register({
        name: 'config',
        permission: PermissionLevel.Admin,
        hidden: true,
        group: 'utility',
        description: 'Show or change persisted settings (applied on restart)',
        usage: `${p}config [key] [value]`,
        async handler(cmd) {
          const current: Record<ConfigKey, number> = {
            fishCooldown: config.fishing.cooldownSeconds,
            startingBalance: config.economy.startingBalance,
            gambleWinRate: config.gambling.winRate
          }
          const [key, rawValue] = cmd.argsList
          if (!key) {
            await cmd.reply(
              `Config: ${CONFIG_KEYS.map((k) => `${k}=${current[k]}`).join(', ')}`
            )
            return
          }
          if (!isConfigKey(key)) {
            await cmd.reply(`Unknown config key: ${key}. Keys: ${CONFIG_KEYS.join(', ')}`)
            return
          }
          if (rawValue === undefined) {
            await cmd.reply(`${key}=${current[key]}`)
            return
          }

          const value = key === 'gambleWinRate' ? Number(rawValue) : parseWholeNumber(rawValue)
          if (
            value === null ||
            !Number.isFinite(value) ||
            value < 0 ||
            (key === 'gambleWinRate' && value > 1)
          ) {
            await cmd.reply(
              key === 'gambleWinRate'
                ? 'gambleWinRate must be between 0 and 1'
                : `${key} must be a non-negative whole number`
            )
            return
          }

          const patch: RuntimeOverrides =
            key === 'fishCooldown'
              ? { fishCooldown: value }
              : key === 'startingBalance'
                ? { startingBalance: value }
                : { gambleWinRate: value }
          updateRuntimeOverrides(config.dataDir, patch, (reason) =>
            logger.warn('config.overrides_invalid', { reason })
          )
          logger.info('config.saved', { key, value, by: cmd.user.username })
          await cmd.reply(`Saved ${key}=${value}. Restart to apply.`)
        }
      })

      const track: MessageListener = async (message) => {
        await lastSeen.set(message.senderId.toLowerCase(), new Date(ctx.now()).toISOString())
      }
      ctx.loop.addListener(track)
      tracker = track

      logger.info('utility.ready', { trackedUsers: lastSeen.size() })
    },
    teardown(ctx: ModuleContext) {
      if (tracker) ctx.loop.removeListener(tracker)
      tracker = null
    }
  }
}
