import type { Logger, LogLevel } from './types.js'

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

function emit(level: LogLevel, event: string, data?: Record<string, unknown>): void {
  const payload = {
    ts: new Date().toISOString(),
    level: level.toUpperCase(),
    event,
    ...(data ?? {})
  }
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(payload))
}

/** JSON-lines logger that drops events below `minLevel`. */
export function createLogger(minLevel: LogLevel = 'info'): Logger {
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel]
  return {
    debug(event, data) {
      if (enabled('debug')) emit('debug', event, data)
    },
    info(event, data) {
      if (enabled('info')) emit('info', event, data)
    },
    warn(event, data) {
      if (enabled('warn')) emit('warn', event, data)
    },
    error(event, data) {
      if (enabled('error')) emit('error', event, data)
    }
  }
}

/** Default process logger, used before configuration is loaded. */
export const logger: Logger = createLogger(
  process.env.LOG_LEVEL?.toLowerCase() === 'debug' ? 'debug' : 'info'
)

/** Flattens an unknown thrown value into loggable fields. */
export function describeError(error: unknown): { error: string; stack?: string } {
  if (error instanceof Error) {
    return error.stack ? { error: error.message, stack: error.stack } : { error: error.message }
  }
  return { error: String(error) }
}
