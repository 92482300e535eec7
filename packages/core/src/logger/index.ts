import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/app-config.js'

export type { Logger } from 'pino'

export const LOGGER_NAME = 'blogsync'

export function createLogger(config: LoggingConfig): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  return pino({
    name: LOGGER_NAME,
    level: config.level,
    ...(usePretty
      ? { transport: { target: 'pino-pretty' } }
      : {}),
  })
}

/** A logger scoped to one component, e.g. `component: "pipeline"`. */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component })
}
