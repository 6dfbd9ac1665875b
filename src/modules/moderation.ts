import { join } from 'node:path'

import { z } from 'zod'

import { PermissionLevel } from '../commands/types.js'
import type { MessageListener } from '../core/bot-loop.js'
import { JsonStore } from '../core/json-store.js'
import { parseWholeNumber, targetName } from './format.js'
import type { BotModule, ModuleContext } from './types.js'

export const DEFAULT_MUTE_MINUTES = 10
const BANLIST_LIMIT = 20
const AUTOMOD = 'automod'
const GIBBERISH_REASON = 'Gibberish username pattern'

const banSchema = z.object({
  by: z.string(),
  reason: z.string(),
  at: z.string().datetime()
})

/** Six letters then four or five digits, e.g. `cipeyx52636`. Anonymous names are exempt. */
export function isGibberishUsername(username: string): boolean {
  const name = username.toLowerCase()
  if (name.startsWith('!anon')) return false
  return /^[a-z]{6}\d{4,5}$/.test(name)
}

/**
 * Local ban and mute lists, and a message guard that runs ahead of every
 * other listener. Messages from banned or muted users, and from names
 * matching the gibberish pattern, are dropped before command dispatch.
 * Admins are never blocked.
 */
export function moderationModule(): BotModule {
  let guard: MessageListener | null = null

  return {
    name: 'moderation',
    async setup(ctx: ModuleContext) {
      const { registry, config, logger } = ctx
      const p = config.commandPrefix

      const bans = new JsonStore(join(config.dataDir, 'bans.json'), banSchema, logger)
      // username -> ISO expiry
      const mutes = new JsonStore(join(config.dataDir, 'mutes.json'), z.string().datetime(), logger)
      await bans.init()
      await mutes.init()

      const isMuted = async (username: string): Promise<boolean> => {
        const expiry = mutes.get(username)
        if (expiry === undefined) return false
        if (ctx.now() < Date.parse(expiry)) return true
        await mutes.delete(username)
        logger.info('moderation.mute_expired', { user: username })
        return false
      }

      const ban = async (username: string, by: string, reason: string): Promise<void> => {
        await bans.set(username, { by, reason, at: new Date(ctx.now()).toISOString() })
        logger.info('moderation.banned', { user: username, by, reason })
      }

      registry.register({
        name: 'ban',
        permission: PermissionLevel.Admin,
        group: 'moderation',
        description: 'Ban a user from the chat',
        usage: `${p}ban <username> [reason]`,
        async handler(cmd) {
          const [rawTarget, ...rest] = cmd.argsList
          if (!rawTarget) {
            await cmd.reply(`Usage: ${p}ban <username> [reason]`)
            return
          }
          const target = targetName(rawTarget)
          if (registry.permissions.isAdmin(target)) {
            await cmd.reply("You can't ban an admin!")
            return
          }
          const reason = rest.join(' ') || 'No reason given'
          await ban(target, cmd.user.username.toLowerCase(), reason)
          await cmd.reply(`Banned ${target}: ${reason}`)
        }
      })

      registry.register({
        name: 'unban',
        permission: PermissionLevel.Admin,
        group: 'moderation',
        description: 'Unban a user',
        usage: `${p}unban <username>`,
        async handler(cmd) {
          const [rawTarget] = cmd.argsList
          if (!rawTarget) {
            await cmd.reply(`Usage: ${p}unban <username>`)
            return
          }
          const target = targetName(rawTarget)
          if (!(await bans.delete(target))) {
            await cmd.reply(`${target} is not banned`)
            return
          }
          logger.info('moderation.unbanned', { user: target, by: cmd.user.username })
          await cmd.reply(`Unbanned ${target}`)
        }
      })

      registry.register({
        name: 'banlist',
        permission: PermissionLevel.Admin,
        group: 'moderation',
        description: 'Show banned users',
        usage: `${p}banlist`,
        async handler(cmd) {
          const names = bans.entries().map(([name]) => name)
          if (names.length === 0) {
            await cmd.reply('No users are banned')
            return
          }
          const shown = names.slice(0, BANLIST_LIMIT).join(', ')
          await cmd.reply(
            names.length > BANLIST_LIMIT
              ? `Banned (${names.length} total): ${shown}... (showing first ${BANLIST_LIMIT})`
              : `Banned (${names.length}): ${shown}`
          )
        }
      })

      registry.register({
        name: 'mute',
        permission: PermissionLevel.Admin,
        group: 'moderation',
        description: 'Mute a user',
        usage: `${p}mute <username> [minutes]`,
        async handler(cmd) {
          const [rawTarget, rawMinutes] = cmd.argsList
          if (!rawTarget) {
            await cmd.reply(`Usage: ${p}mute <username> [minutes]`)
            return
          }
          const minutes = rawMinutes === undefined ? DEFAULT_MUTE_MINUTES : parseWholeNumber(rawMinutes)
          if (minutes === null || minutes <= 0) {
            await cmd.reply('Duration must be a positive number of minutes!')
            return
          }
          const target = targetName(rawTarget)
          if (registry.permissions.isAdmin(target)) {
            await cmd.reply("You can't mute an admin!")
            return
          }
          const expiry = new Date(ctx.now() + minutes * 60_000).toISOString()
          await mutes.set(target, expiry)
          logger.info('moderation.muted', { user: target, by: cmd.user.username, expiry })
          await cmd.reply(`Muted ${target} for ${minutes} minutes`)
        }
      })

      registry.register({
        name: 'unmute',
        permission: PermissionLevel.Admin,
        group: 'moderation',
        description: 'Unmute a user',
        usage: `${p}unmute <username>`,
        async handler(cmd) {
          const [rawTarget] = cmd.argsList
          if (!rawTarget) {
            await cmd.reply(`Usage: ${p}unmute <username>`)
            return
          }
          const target = targetName(rawTarget)
          if (!(await mutes.delete(target))) {
            await cmd.reply(`${target} is not muted`)
            return
          }
          logger.info('moderation.unmuted', { user: target, by: cmd.user.username })
          await cmd.reply(`Unmuted ${target}`)
        }
      })

      const check: MessageListener = async (message) => {
        const username = message.senderId.toLowerCase()
        if (registry.permissions.isAdmin(username)) return

        if (bans.has(username)) {
          logger.info('moderation.blocked', { user: username, reason: 'banned' })
          return 'stop'
        }
        if (await isMuted(username)) {
          logger.info('moderation.blocked', { user: username, reason: 'muted' })
          return 'stop'
        }
        if (isGibberishUsername(username)) {
          await ban(username, AUTOMOD, GIBBERISH_REASON)
          return 'stop'
        }
      }
      ctx.loop.addListener(check, { first: true })
      guard = check

      logger.info('moderation.ready', { bans: bans.size(), mutes: mutes.size() })
    },
    teardown(ctx: ModuleContext) {
      if (guard) ctx.loop.removeListener(guard)
      guard = null
    }
  }
}
