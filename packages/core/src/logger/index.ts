import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/engine-config.js'

export type { Logger } from 'pino'

export function createLogger(config: LoggingConfig, name = 'share-seeder'): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  return pino({
    name,
    level: config.level,
    ...(usePretty
      ? { transport: { target: 'pino-pretty', options: { ignore: 'pid,hostname' } } }
      : {}),
  })
}
