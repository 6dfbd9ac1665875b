import type { CommandFallback } from '../commands/handler.js'
import { PermissionLevel } from '../commands/types.js'
import { chunkText, truncateText } from '../core/text-chunk.js'
import { bareCommandName } from './format.js'
import type { BotModule, ModuleContext } from './types.js'

export const MAX_CUSTOM_NAME_LENGTH = 32
export const MAX_CUSTOM_RESPONSE_LENGTH = 1500
const LIST_LIMIT = 20

const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.webp', '.bmp', '.svg']
const IMAGE_HOSTS = ['i.imgur.com', 'media.giphy.com', 'tenor.com/view', 'i.redd.it', 'pbs.twimg.com']
const VIDEO_HOSTS = ['youtube.com', 'youtu.be', 'streamable.com', 'twitch.tv', 'vimeo.com']

export type ResponseKind = 'Image' | 'Video' | 'Link' | 'Text'

/** Classifies a stored response by its first URL. */
export function classifyResponse(response: string): ResponseKind {
  const url = /https?:\/\/\S+/.exec(response)?.[0]?.toLowerCase()
  if (!url) return 'Text'
  if (IMAGE_EXTENSIONS.some((ext) => url.endsWith(ext)) || IMAGE_HOSTS.some((h) => url.includes(h))) {
    return 'Image'
  }
  if (VIDEO_HOSTS.some((h) => url.includes(h))) return 'Video'
  return 'Link'
}

/** Splits `name rest of text` into its two parts; `null` when either is missing. */
function splitNameAndText(args: string): { name: string; text: string } | null {
  const match = /^(\S+)\s+([\s\S]+)$/.exec(args)
  if (!match?.[1] || !match[2]) return null
  return { name: match[1], text: match[2] }
}

/**
 * User-defined text commands. Built-in commands always take precedence:
 * the table is consulted only after the registry found no match.
 */
export function customModule(): BotModule {
  let fallback: CommandFallback | null = null

  return {
    name: 'custom',
    setup(ctx: ModuleContext) {
      const { registry, customCommands: table, config, logger } = ctx
      const p = config.commandPrefix

      registry.register({
        name: 'addcmd',
        aliases: ['newcmd', 'createcmd'],
        group: 'custom',
        description: 'Create a custom command',
        usage: `${p}addcmd <name> <response>`,
        async handler(cmd, args) {
          const parsed = splitNameAndText(args)
          if (!parsed) {
            await cmd.reply(`Usage: ${p}addcmd <name> <response>`)
            return
          }

          const name = bareCommandName(parsed.name, p)
          if (registry.has(name)) {
            await cmd.reply(`${p}${name} is a built-in command and can't be overwritten`)
            return
          }
          if (name.length > MAX_CUSTOM_NAME_LENGTH) {
            await cmd.reply(`Command name too long (max ${MAX_CUSTOM_NAME_LENGTH} characters)`)
            return
          }
          if (parsed.text.length > MAX_CUSTOM_RESPONSE_LENGTH) {
            await cmd.reply(`Response too long (max ${MAX_CUSTOM_RESPONSE_LENGTH} characters)`)
            return
          }
          if (table.has(name)) {
            await cmd.reply(`Command ${p}${name} already exists`)
            return
          }

          await table.set(name, parsed.text)
          logger.info('custom.added', { name, by: cmd.user.username })
          await cmd.reply(`Command ${p}${name} added`)
        }
      })

      registry.register({
        name: 'delcmd',
        aliases: ['rmcmd', 'removecmd'],
        permission: PermissionLevel.Admin,
        group: 'custom',
        description: 'Delete a custom command',
        usage: `${p}delcmd <name>`,
        async handler(cmd) {
          const [raw] = cmd.argsList
          if (!raw) {
            await cmd.reply(`Usage: ${p}delcmd <name>`)
            return
          }
          const name = bareCommandName(raw, p)
          if (await table.delete(name)) {
            logger.info('custom.deleted', { name, by: cmd.user.username })
            await cmd.reply(`Command ${p}${name} removed`)
          } else {
            await cmd.reply(`Command ${p}${name} not found`)
          }
        }
      })

      registry.register({
        name: 'editcmd',
        permission: PermissionLevel.Admin,
        group: 'custom',
        description: 'Edit an existing custom command',
        usage: `${p}editcmd <name> <new response>`,
        async handler(cmd, args) {
          const parsed = splitNameAndText(args)
          if (!parsed) {
            await cmd.reply(`Usage: ${p}editcmd <name> <new response>`)
            return
          }
          const name = bareCommandName(parsed.name, p)
          if (parsed.text.length > MAX_CUSTOM_RESPONSE_LENGTH) {
            await cmd.reply(`Response too long (max ${MAX_CUSTOM_RESPONSE_LENGTH} characters)`)
            return
          }
          if (!table.has(name)) {
            await cmd.reply(`Command ${p}${name} not found`)
            return
          }
          await table.set(name, parsed.text)
          await cmd.reply(`Command ${p}${name} updated`)
        }
      })

      registry.register({
        name: 'cmdinfo',
        group: 'custom',
        description: 'Show what a custom command says',
        usage: `${p}cmdinfo <name>`,
        async handler(cmd) {
          const [raw] = cmd.argsList
          if (!raw) {
            await cmd.reply(`Usage: ${p}cmdinfo <name>`)
            return
          }
          const name = bareCommandName(raw, p)
          const response = table.get(name)
          if (response === undefined) {
            await cmd.reply(`${p}${name} not found`)
            return
          }
          const kind = classifyResponse(response)
          // URLs get more room before the preview is cut.
          const preview = truncateText(response, kind === 'Text' ? 100 : 250)
          await cmd.reply(`[${kind}] ${p}${name} -> ${preview}`)
        }
      })

      registry.register({
        name: 'customs',
        aliases: ['customlist'],
        group: 'custom',
        description: 'List custom commands',
        usage: `${p}customs`,
        async handler(cmd) {
          const names = table.entries().map(([name]) => name).sort()
          if (names.length === 0) {
            await cmd.reply(`No custom commands yet! Use ${p}addcmd to create one.`)
            return
          }
          const shown = names
            .slice(0, LIST_LIMIT)
            .map((name) => `${p}${name}`)
            .join(', ')
          await cmd.reply(
            names.length > LIST_LIMIT
              ? `Custom commands (${names.length} total): ${shown}... (and ${names.length - LIST_LIMIT} more)`
              : `Custom commands (${names.length}): ${shown}`
          )
        }
      })

      const answer: CommandFallback = async (cmd) => {
        const response = table.get(cmd.command)
        if (response === undefined) return false
        for (const piece of chunkText(response, config.maxMessageLength)) {
          await cmd.reply(piece)
        }
        return true
      }
      ctx.commands.addFallback(answer)
      fallback = answer

      logger.info('custom.ready', { commands: table.size() })
    },
    teardown(ctx: ModuleContext) {
      if (fallback) ctx.commands.removeFallback(fallback)
      fallback = null
    }
  }
}
