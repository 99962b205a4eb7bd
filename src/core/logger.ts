/**
 * @module logger
 *
 * Pino loggers for the session layer. Engines, factories and sessions log
 * their lifecycle at `debug` through child loggers of the root logger, or of
 * whatever logger the caller passes to `createDatabase()`.
 *
 * Level comes from `LOG_LEVEL` (default `info`).
 */

import pino from 'pino'
import type { DestinationStream, Logger, LoggerOptions } from 'pino'
import type { Logger as DrizzleLogger } from 'drizzle-orm'

export type { Logger }

export const createLogger = (
  options: LoggerOptions = {},
  destination?: DestinationStream
): Logger => {
  const resolved: LoggerOptions = {
    name: 'sethub',
    level: process.env.LOG_LEVEL ?? 'info',
    ...options,
  }
  return destination ? pino(resolved, destination) : pino(resolved)
}

export const logger = createLogger()

/**
 * Adapt a pino logger to Drizzle's query logger, used when an engine is
 * created with `echo: true`.
 */
export const createQueryLogger = (log: Logger): DrizzleLogger => ({
  logQuery: (query, params) => {
    log.info({ params }, query)
  },
})
