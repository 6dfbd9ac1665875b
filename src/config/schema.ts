import { z } from 'zod'

export const MODULE_NAMES = ['economy', 'fishing', 'gambling', 'custom', 'utility', 'moderation'] as const
export type ModuleName = (typeof MODULE_NAMES)[number]

const chatServerSchema = z.object({
  url: z.string().url(),
  apiKey: z.string(),
  reconnectDelaySeconds: z.number().int().positive(),
  maxReconnectDelaySeconds: z.number().int().positive()
})

const botIdentitySchema = z.object({
  username: z.string().min(1),
  displayName: z.string().min(1),
  avatar: z.string()
})

/**
 * Runtime configuration schema for the bot.
 */
export const configSchema = z.object({
  chatServer: chatServerSchema,
  bot: botIdentitySchema,
  // First entry is the owner.
  admins: z.array(z.string().min(1).transform((name) => name.toLowerCase())),
  commandPrefix: z.string().min(1).default('!'),
  maxMessageLength: z.number().int().min(20).default(500),
  economy: z.object({
    startingBalance: z.number().int().nonnegative(),
    currencyName: z.string().min(1)
  }),
  fishing: z.object({
    cooldownSeconds: z.number().int().nonnegative(),
    castCost: z.number().int().nonnegative().default(5),
    castLimit: z.number().int().positive().default(5),
    castWindowSeconds: z.number().int().positive().default(300)
  }),
  gambling: z.object({
    winRate: z.number().min(0).max(1)
  }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  dataDir: z.string().min(1),
  enabledModules: z.array(z.enum(MODULE_NAMES)).default([...MODULE_NAMES]),
  cli: z.object({
    enabled: z.boolean().default(false),
    username: z.string().min(1).default('local-user')
  })
})

export type BotConfig = z.infer<typeof configSchema>

/**
 * Operator overrides applied over the environment, persisted
 * in `<dataDir>/config.json`.
 */
export const runtimeOverridesSchema = z
  .object({
    fishCooldown: z.number().int().nonnegative(),
    startingBalance: z.number().int().nonnegative(),
    gambleWinRate: z.number().min(0).max(1),
    enabledModules: z.array(z.enum(MODULE_NAMES))
  })
  .partial()

export type RuntimeOverrides = z.infer<typeof runtimeOverridesSchema>
