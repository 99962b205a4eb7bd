/**
 * @module engine
 *
 * An engine binds a validated URL to its dialect's driver. It is the pooled
 * handle sessions check connections out of; creating one performs no I/O.
 */

import type { DatabaseUrl, DriverFactory, Engine, EngineParams } from './types'
import { engineParamsSchema, parseParams } from './params'
import { SessionError } from './errors'
import { DRIVERS } from './drivers'
import { logger as rootLogger, type Logger } from './logger'
import { renderUrl } from './url'

export type CreateEngineOptions = {
  logger?: Logger
  /** Replace the dialect's driver (e.g. with an in-process stand-in). */
  driver?: DriverFactory
}

/**
 * Create an engine for `url`.
 *
 * @throws ValidationError for malformed engine parameters
 * @throws ConfigError when the dialect cannot honour a parameter
 *
 * @example
 * const engine = createEngine(createUrl(settings.db.params), { poolSize: 10, echo: true })
 * // ...
 * await engine.dispose()
 */
export const createEngine = (
  url: DatabaseUrl,
  params: EngineParams = {},
  { logger = rootLogger, driver }: CreateEngineOptions = {}
): Engine => {
  const parsed = parseParams(engineParamsSchema, params)
  const options = { ...parsed, echo: parsed.echo ?? false }
  const log = logger.child({ component: 'engine', url: renderUrl(url) })

  const factory = driver ?? DRIVERS[url.dialect]
  const pool = factory({ url, options, logger: log })
  log.debug({ options }, 'engine created')

  let disposed = false

  const connect = async () => {
    if (disposed) throw new SessionError('Engine has been disposed')
    return pool.connect()
  }

  const dispose = async () => {
    if (disposed) return
    disposed = true
    await pool.dispose()
    log.debug('engine disposed')
  }

  return {
    url,
    dialect: url.dialect,
    options,
    connect,
    dispose,
    isDisposed: () => disposed,
  }
}
