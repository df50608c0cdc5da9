import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/node-config.js'

export type { Logger } from 'pino'

/**
 * Root logger. `bindings` are attached to every line, e.g. the node id so
 * output from several nodes on one host can be told apart.
 */
export function createLogger(
  config: LoggingConfig,
  bindings: Record<string, unknown> = {},
): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  return pino({
    level: config.level,
    base: { pid: process.pid, ...bindings },
    ...(usePretty
      ? { transport: { target: 'pino-pretty' } }
      : {}),
  })
}
