/**
 * @module scope
 *
 * Context-manager style session handling. A scope holds at most one session
 * at a time: `enter()` takes a new one from the factory, and `commit()`,
 * `rollback()` or `exit()` finish it, close it and clear the reference, so a
 * scope is single-use per enter/exit cycle.
 *
 * Whether a clean exit commits is an explicit option (`commitOnExit`,
 * default false). With it off, work that was not committed before exit is
 * rolled back.
 *
 * @example
 * const scope = createSessionScope(factory)
 * const session = await scope.enter()
 * try {
 *   const db = await session.connection('postgresql')
 *   await db.insert(users).values({ name: 'Alice' })
 *   await scope.commit()
 * } finally {
 *   await scope.exit()
 * }
 */

import type { ScopeOptions, Session, SessionFactory, SessionScope } from './types'
import { SessionError } from './errors'
import { logger as rootLogger, type Logger } from './logger'

export const createSessionScope = (
  factory: SessionFactory,
  { commitOnExit = factory.options.commitOnExit }: ScopeOptions = {},
  logger: Logger = rootLogger
): SessionScope => {
  let current: Session | undefined

  const detach = (action: string): Session => {
    const session = current
    if (!session) throw new SessionError(`Cannot ${action}: no session is attached to this scope`)
    current = undefined
    return session
  }

  const enter = async () => {
    if (current) throw new SessionError('Scope already has a session attached; exit it first')
    current = factory()
    return current
  }

  const commit = async () => {
    const session = detach('commit')
    try {
      await session.commit()
    } finally {
      await session.close()
    }
  }

  const rollback = async () => {
    const session = detach('rollback')
    try {
      await session.rollback()
    } finally {
      await session.close()
    }
  }

  const exit = async (failed = false) => {
    if (!current) return
    if (commitOnExit && !failed) await commit()
    else await rollback()
  }

  const run = async <T>(fn: (session: Session) => Promise<T>): Promise<T> => {
    const session = await enter()
    let result: T
    try {
      result = await fn(session)
    } catch (err) {
      // The callback's error is the one the caller sees.
      try {
        await exit(true)
      } catch (rollbackError) {
        logger.error({ err: rollbackError, session: session.id }, 'rollback failed after callback error')
      }
      throw err
    }
    await exit()
    return result
  }

  return {
    enter,
    exit,
    commit,
    rollback,
    current: () => current,
    run,
  }
}
