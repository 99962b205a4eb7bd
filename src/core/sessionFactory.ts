/**
 * @module sessionFactory
 *
 * A session factory is a callable bound to one engine and one set of
 * session-maker parameters. Each call returns a fresh session; nothing is
 * checked out of the pool until that session begins a transaction.
 */

import type { Engine, SessionFactory, SessionParams } from './types'
import { parseParams, sessionParamsSchema } from './params'
import { ConfigError } from './errors'
import { createSession } from './session'
import { logger as rootLogger, type Logger } from './logger'

/**
 * Create a session factory bound to `engine`.
 *
 * @throws ValidationError for malformed session parameters
 * @throws ConfigError for an isolation level the dialect does not support
 *
 * @example
 * const factory = createSessionFactory(engine, { commitOnExit: false })
 * const session = factory()
 */
export const createSessionFactory = (
  engine: Engine,
  params: SessionParams = {},
  logger: Logger = rootLogger
): SessionFactory => {
  const parsed = parseParams(sessionParamsSchema, params)
  const options = Object.freeze({
    ...parsed,
    autobegin: parsed.autobegin ?? true,
    commitOnExit: parsed.commitOnExit ?? false,
  })

  if (
    engine.dialect === 'sqlite' &&
    options.isolationLevel !== undefined &&
    options.isolationLevel !== 'SERIALIZABLE'
  ) {
    throw new ConfigError(
      `sqlite only supports SERIALIZABLE isolation (got ${options.isolationLevel})`
    )
  }

  const log = logger.child({ component: 'session', dialect: engine.dialect })
  let nextId = 0

  const factory = () => createSession(engine, options, ++nextId, log)

  return Object.assign(factory, { engine, options })
}
