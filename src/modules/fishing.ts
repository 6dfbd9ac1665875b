import { readFile } from 'node:fs/promises'
import { join } from 'node:path'

import { z } from 'zod'

import { JsonStore } from '../core/json-store.js'
import { RateLimiter } from '../core/rate-limiter.js'
import { formatAmount, targetName } from './format.js'
import type { BotModule, ModuleContext } from './types.js'

export const NOTHING_CAUGHT = 'Not even a nibble!'
/** Percent of casts that catch nothing. */
const NOTHING_CHANCE = 60

const fishSchema = z.object({
  name: z.string().min(1),
  /** Sentence completing "<player> ...", e.g. "caught a Carp!". */
  description: z.string().min(1),
  /** Balance change on catch; may be negative. */
  prize: z.number().int(),
  /** Relative weight among catches. */
  probability: z.number().positive()
})

export type Fish = z.infer<typeof fishSchema>

const fishTableSchema = z.array(fishSchema).min(1)

const DEFAULT_FISH_TABLE = new URL('../../assets/fish.json', import.meta.url)

export async function loadFishTable(source: string | URL = DEFAULT_FISH_TABLE): Promise<Fish[]> {
  const raw = await readFile(source, 'utf-8')
  return fishTableSchema.parse(JSON.parse(raw))
}

/**
 * One cast: `null` for nothing, otherwise a weighted pick from `table`.
 */
export function castLine(table: readonly Fish[], random: () => number): Fish | null {
  if (random() * 100 < NOTHING_CHANCE) return null

  const total = table.reduce((sum, fish) => sum + fish.probability, 0)
  const roll = random() * total
  let cumulative = 0
  for (const fish of table) {
    cumulative += fish.probability
    if (roll < cumulative) return fish
  }
  return table[table.length - 1] ?? null
}

function formatWait(seconds: number): string {
  const minutes = Math.floor(seconds / 60)
  const rest = seconds % 60
  return minutes > 0 ? `${minutes}m ${rest}s` : `${rest}s`
}

function topEntries(counts: Array<[string, number]>, limit: number): string {
  return [...counts]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([name, count]) => `${name}: ${count}`)
    .join(', ')
}

export interface FishingModuleOptions {
  /** Defaults to the bundled `assets/fish.json`. */
  table?: readonly Fish[]
}

/**
 * Fishing: paid casts against a weighted fish table, with per-user and
 * global catch statistics.
 */
export function fishingModule(options: FishingModuleOptions = {}): BotModule {
  return {
    name: 'fishing',
    async setup(ctx: ModuleContext) {
      const { registry, bank, config, logger } = ctx
      const p = config.commandPrefix
      const currency = config.economy.currencyName
      const { castCost } = config.fishing

      const table = options.table ?? (await loadFishTable())
      const userStats = new JsonStore(
        join(config.dataDir, 'fish_stats.json'),
        z.record(z.string(), z.number().int().nonnegative()),
        logger
      )
      const globalStats = new JsonStore(
        join(config.dataDir, 'fish_global.json'),
        z.number().int().nonnegative(),
        logger
      )
      await userStats.init()
      await globalStats.init()

      const casts = new RateLimiter(
        config.fishing.castLimit,
        config.fishing.castWindowSeconds * 1000,
        ctx.now
      )

      const recordCatch = async (username: string, fishName: string): Promise<void> => {
        const counts = { ...(userStats.get(username) ?? {}) }
        counts[fishName] = (counts[fishName] ?? 0) + 1
        await userStats.set(username, counts)
        await globalStats.set(fishName, (globalStats.get(fishName) ?? 0) + 1)
      }

      registry.register({
        name: 'fish',
        aliases: ['cast'],
        group: 'fishing',
        cooldownSeconds: config.fishing.cooldownSeconds,
        description: `Cast your line and try to catch a fish! Costs ${castCost} ${currency}.`,
        usage: `${p}fish`,
        async handler(cmd) {
          const username = cmd.user.username.toLowerCase()

          const wait = casts.retryAfter(username)
          if (wait !== null) {
            await cmd.reply(`You're casting too fast! Wait ${formatWait(wait)}`)
            return
          }

          const balance = await bank.ensureAccount(username)
          if (balance < castCost) {
            await cmd.reply(`You need at least ${castCost} ${currency} to fish! You have ${formatAmount(balance)}.`)
            return
          }

          const afterCost = balance - castCost
          await bank.setBalance(username, afterCost)
          casts.record(username)

          const fish = castLine(table, ctx.random)
          if (!fish) {
            await recordCatch(username, NOTHING_CAUGHT)
            await cmd.reply(`${NOTHING_CAUGHT} [-${castCost} ${currency}]`)
            return
          }

          await recordCatch(username, fish.name)
          await bank.setBalance(username, Math.max(0, afterCost + fish.prize))

          const prize = fish.prize >= 0 ? `[+${fish.prize} ${currency}]` : `[${fish.prize} ${currency}]`
          const line = `${cmd.user.displayName} ${fish.description} ${prize}`
          if (fish.prize >= 500) await cmd.reply(`*** ${line} ***`)
          else if (fish.prize >= 200) await cmd.reply(`** ${line} **`)
          else await cmd.reply(line)
        }
      })

      registry.register({
        name: 'fishstats',
        aliases: ['fs', 'fstats'],
        group: 'fishing',
        description: 'View fishing statistics',
        usage: `${p}fishstats [username|global]`,
        async handler(cmd) {
          const arg = (cmd.argsList[0] ?? '').toLowerCase()

          if (arg === 'global') {
            const counts = globalStats.entries()
            const total = counts.reduce((sum, [, n]) => sum + n, 0)
            if (total === 0) {
              await cmd.reply('No fish have been caught yet!')
              return
            }
            await cmd.reply(`Global Fish Stats (${total} total): ${topEntries(counts, 5)}`)
            return
          }

          const target = arg ? targetName(arg) : cmd.user.username.toLowerCase()
          const counts = userStats.get(target) ?? {}
          const total = Object.values(counts).reduce((sum, n) => sum + n, 0)
          if (total === 0) {
            await cmd.reply(`${target} hasn't caught any fish yet!`)
            return
          }

          const nibbles = counts[NOTHING_CAUGHT] ?? 0
          const catches = total - nibbles
          const fishOnly = Object.entries(counts).filter(([name]) => name !== NOTHING_CAUGHT)
          const rate = Math.round((catches / total) * 100)
          await cmd.reply(
            `${target}'s stats: ${catches} fish caught, ${nibbles} nibbles (${rate}% rate) | Top: ${topEntries(fishOnly, 3) || 'none'}`
          )
        }
      })

      logger.info('fishing.ready', {
        fishTypes: table.length,
        castLimit: config.fishing.castLimit,
        castWindowSeconds: config.fishing.castWindowSeconds
      })
    }
  }
}
