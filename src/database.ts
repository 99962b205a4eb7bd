/**
 * @module database
 *
 * The session factory wrapper. Given settings, it composes
 * URL → engine → session factory and offers scoped helpers on top:
 *
 * - `createSessionFactory()` — a freshly composed factory (new engine)
 * - `sessionFactory()`       — the shared factory, composed on first use
 * - `createSession()`        — one session from the shared factory
 * - `openSession(fn)`        — acquire, run, commit or roll back, always close
 * - `scope(options?)`        — a context-manager scope on the shared factory
 *
 * Every engine the wrapper builds is disposed by `dispose()`.
 */

import type {
  DriverFactory,
  Engine,
  ScopeOptions,
  Session,
  SessionFactory,
  SessionScope,
  Settings,
} from './core/types'
import { createUrl, renderUrl } from './core/url'
import { createEngine } from './core/engine'
import { createSessionFactory } from './core/sessionFactory'
import { createSessionScope } from './core/scope'
import { logger as rootLogger, type Logger } from './core/logger'

export type DatabaseOptions = {
  logger?: Logger
  /** Replace the dialect's driver (e.g. with an in-process stand-in). */
  driver?: DriverFactory
}

export type Database = {
  readonly settings: Settings
  createSessionFactory: () => SessionFactory
  sessionFactory: () => SessionFactory
  createSession: () => Session
  openSession: <T>(fn: (session: Session) => Promise<T>) => Promise<T>
  scope: (options?: ScopeOptions) => SessionScope
  dispose: () => Promise<void>
}

/**
 * Create the session factory wrapper for `settings`.
 *
 * Nothing is validated or connected until a factory is first composed, so a
 * process can build its database object at startup and fail on first use.
 *
 * @example
 * const database = createDatabase(await loadSettings())
 *
 * const user = await database.openSession(async (session) => {
 *   const db = await session.connection('postgresql')
 *   const [row] = await db.insert(users).values({ name: 'Alice' }).returning()
 *   await session.commit()
 *   return row
 * })
 *
 * await database.dispose()
 */
export const createDatabase = (
  settings: Settings,
  { logger = rootLogger, driver }: DatabaseOptions = {}
): Database => {
  const log = logger.child({ project: settings.projectName })
  const engines = new Set<Engine>()

  const composeSessionFactory = (): SessionFactory => {
    const url = createUrl(settings.db.params)
    const engine = createEngine(url, settings.engine.params, { logger: log, driver })
    engines.add(engine)
    log.debug({ url: renderUrl(url) }, 'session factory composed')
    return createSessionFactory(engine, settings.session.params, log)
  }

  let shared: SessionFactory | undefined
  const sessionFactory = (): SessionFactory => {
    if (!shared || shared.engine.isDisposed()) shared = composeSessionFactory()
    return shared
  }

  const openSession = <T>(fn: (session: Session) => Promise<T>): Promise<T> =>
    createSessionScope(sessionFactory(), {}, log).run(fn)

  const dispose = async () => {
    const pending = [...engines]
    engines.clear()
    shared = undefined
    await Promise.all(pending.map((engine) => engine.dispose()))
  }

  return {
    settings,
    createSessionFactory: composeSessionFactory,
    sessionFactory,
    createSession: () => sessionFactory()(),
    openSession,
    scope: (options) => createSessionScope(sessionFactory(), options, log),
    dispose,
  }
}
