import { createBot } from './bot.js'
import { loadConfig } from './config/load.js'
import { createLogger, logger as bootLogger } from './core/logger.js'

/** Boots the bot and runs it until SIGINT or SIGTERM. */
async function main(): Promise<void> {
  const config = loadConfig({
    onInvalidOverrides: (reason) => bootLogger.warn('config.overrides_invalid', { reason })
  })
  const logger = createLogger(config.logLevel)

  logger.info('startup.config', {
    url: config.chatServer.url,
    username: config.bot.username,
    prefix: config.commandPrefix,
    modules: config.enabledModules,
    dataDir: config.dataDir
  })

  const bot = await createBot(config, { logger })

  const shutdown = async (signal: string): Promise<void> => {
    logger.info('shutdown.signal', { signal })
    await bot.stop()
    process.exit(0)
  }

  process.on('SIGINT', () => {
    void shutdown('SIGINT')
  })
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM')
  })

  await bot.run()
}

main().catch((error: unknown) => {
  bootLogger.error('fatal', {
    error: error instanceof Error ? error.message : String(error)
  })
  process.exitCode = 1
})
