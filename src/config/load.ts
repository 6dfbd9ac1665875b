import { config as loadEnv } from 'dotenv'
import * as fs from 'node:fs'
import * as path from 'node:path'

import {
  configSchema,
  runtimeOverridesSchema,
  type BotConfig,
  type RuntimeOverrides
} from './schema.js'

type Env = Record<string, string | undefined>

/** Parses comma-separated env values. */
function parseCsv(input: string | undefined): string[] {
  if (!input) return []
  return input
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
}

/** Numeric env value, or `fallback` when unset. Non-numeric text is left for zod to reject. */
function parseNumber(input: string | undefined, fallback: number): number {
  if (input === undefined || input.trim() === '') return fallback
  return Number(input)
}

export function runtimeConfigPath(dataDir: string): string {
  return path.join(dataDir, 'config.json')
}

/**
 * Reads `<dataDir>/config.json`. A missing file means no overrides; a
 * malformed one is reported through `onInvalid` and ignored.
 */
export function readRuntimeOverrides(
  dataDir: string,
  onInvalid: (reason: string) => void = () => undefined
): RuntimeOverrides {
  const file = runtimeConfigPath(dataDir)
  if (!fs.existsSync(file)) return {}

  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'))
  } catch (error) {
    onInvalid(error instanceof Error ? error.message : String(error))
    return {}
  }

  const result = runtimeOverridesSchema.safeParse(parsed)
  if (!result.success) {
    onInvalid(result.error.message)
    return {}
  }
  return result.data
}

export interface LoadConfigOptions {
  env?: Env
  /** Skip reading `.env`; tests pass their own environment. */
  skipDotenv?: boolean
  onInvalidOverrides?: (reason: string) => void
}

/**
 * Loads runtime configuration.
 *
 * Environment (and `.env`) first, then the overrides file in the data
 * directory. Throws a `ZodError` when the result is invalid.
 */
export function loadConfig(options: LoadConfigOptions = {}): BotConfig {
  if (!options.skipDotenv) loadEnv()
  const env = options.env ?? process.env

  const dataDir = path.resolve(env.DATA_DIR ?? path.join(process.cwd(), 'data'))
  const overrides = readRuntimeOverrides(dataDir, options.onInvalidOverrides)
  const envModules = parseCsv(env.ENABLED_MODULES)

  return configSchema.parse({
    chatServer: {
      url: env.CHAT_SERVER_URL ?? 'http://localhost:3000',
      apiKey: env.BOT_API_KEY ?? '',
      reconnectDelaySeconds: parseNumber(env.RECONNECT_DELAY, 5),
      maxReconnectDelaySeconds: parseNumber(env.MAX_RECONNECT_DELAY, 60)
    },
    bot: {
      username: env.BOT_USERNAME?.trim() || 'ReelBot',
      displayName: env.BOT_DISPLAY_NAME?.trim() || env.BOT_USERNAME?.trim() || 'ReelBot',
      avatar: env.BOT_AVATAR ?? ''
    },
    admins: parseCsv(env.ADMIN_USERS),
    commandPrefix: env.COMMAND_PREFIX || undefined,
    maxMessageLength: parseNumber(env.MAX_MESSAGE_LENGTH, 500),
    economy: {
      startingBalance: overrides.startingBalance ?? parseNumber(env.STARTING_BALANCE, 5000),
      currencyName: env.CURRENCY_NAME?.trim() || 'coins'
    },
    fishing: {
      cooldownSeconds: overrides.fishCooldown ?? parseNumber(env.FISH_COOLDOWN, 30)
    },
    gambling: {
      winRate: overrides.gambleWinRate ?? parseNumber(env.GAMBLE_WIN_RATE, 0.45)
    },
    logLevel: env.LOG_LEVEL?.toLowerCase() || undefined,
    dataDir,
    enabledModules: overrides.enabledModules ?? (envModules.length > 0 ? envModules : undefined),
    cli: {
      enabled: env.CLI_ENABLED === 'true',
      username: env.CLI_USERNAME?.trim() || undefined
    }
  })
}

/**
 * Merges `patch` into `<dataDir>/config.json` and returns what was written.
 * Values already in the file and not named in `patch` are kept.
 */
export function updateRuntimeOverrides(
  dataDir: string,
  patch: RuntimeOverrides,
  onInvalid?: (reason: string) => void
): RuntimeOverrides {
  const merged: RuntimeOverrides = { ...readRuntimeOverrides(dataDir, onInvalid), ...patch }
  fs.mkdirSync(dataDir, { recursive: true })
  const file = runtimeConfigPath(dataDir)
  const tmp = `${file}.tmp`
  fs.writeFileSync(tmp, JSON.stringify(merged, null, 2) + '\n', 'utf-8')
  fs.renameSync(tmp, file)
  return merged
}
