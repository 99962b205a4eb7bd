/**
 * @module session
 *
 * A session is one unit of work against an engine. It checks a connection
 * out of the engine when its transaction begins and hands it back when the
 * transaction ends, by commit or by rollback:
 *
 *   begin → connection() … → commit() | rollback()   (repeatable)
 *   close()                                          (terminal)
 *
 * With `autobegin` (the default) the first `connection()` call begins the
 * transaction. A session is not safe for concurrent use; every caller
 * acquires its own.
 */

import type { NodePgDatabase } from 'drizzle-orm/node-postgres'
import type { MySql2Database } from 'drizzle-orm/mysql2'
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import type {
  DatabaseFor,
  Dialect,
  DialectDatabase,
  DriverConnection,
  Engine,
  Session,
  SessionOptions,
} from './types'
import { SessionError } from './errors'
import type { Logger } from './logger'

type Outcome = 'commit' | 'rollback'

/**
 * Create a session bound to `engine`. Normally called through a session
 * factory rather than directly.
 */
export const createSession = (
  engine: Engine,
  options: SessionOptions,
  id: number,
  logger: Logger
): Session => {
  const log = logger.child({ session: id })

  let handle: DriverConnection | undefined
  let opening: Promise<DriverConnection> | undefined
  let closed = false

  const assertOpen = () => {
    if (closed) throw new SessionError(`Session ${id} is closed`)
  }

  /**
   * End the transaction on `conn` and give the connection back. A failed
   * COMMIT or ROLLBACK leaves the connection in an unknown state, so it is
   * discarded instead of pooled.
   */
  const finish = async (conn: DriverConnection, outcome: Outcome) => {
    try {
      await conn[outcome]()
    } catch (err) {
      await conn.release(true)
      log.debug({ err }, `${outcome} failed; connection discarded`)
      throw err
    }
    await conn.release(false)
    log.debug(`transaction ${outcome === 'commit' ? 'committed' : 'rolled back'}`)
  }

  /**
   * Check a connection out and begin on it. A session closed while this is in
   * flight rolls the new transaction back instead of keeping it.
   */
  const establish = async (): Promise<DriverConnection> => {
    const conn = await engine.connect()
    try {
      await conn.begin(options.isolationLevel)
    } catch (err) {
      await conn.release(true)
      throw err
    }
    if (closed) {
      await finish(conn, 'rollback')
      throw new SessionError(`Session ${id} was closed while its transaction was starting`)
    }
    handle = conn
    log.debug({ isolationLevel: options.isolationLevel }, 'transaction begun')
    return conn
  }

  // Set synchronously, so overlapping callers share one checkout.
  const open = (): Promise<DriverConnection> => {
    assertOpen()
    if (handle || opening) throw new SessionError(`Session ${id} already has a transaction in progress`)

    const pending = establish().finally(() => {
      opening = undefined
    })
    opening = pending
    return pending
  }

  const active = async (): Promise<DriverConnection> => {
    assertOpen()
    if (handle) return handle
    if (opening) return opening
    if (!options.autobegin) {
      throw new SessionError(
        `Session ${id} has no transaction in progress. Call begin() first, or enable autobegin.`
      )
    }
    return open()
  }

  function connection(): Promise<DialectDatabase>
  function connection(dialect: 'postgresql'): Promise<NodePgDatabase>
  function connection(dialect: 'mysql'): Promise<MySql2Database>
  function connection(dialect: 'sqlite'): Promise<BetterSQLite3Database>
  async function connection(dialect?: Dialect): Promise<DialectDatabase | DatabaseFor<Dialect>> {
    const { database } = await active()
    if (dialect === undefined) return database
    if (database.dialect !== dialect) {
      throw new SessionError(
        `Session ${id} is bound to a ${database.dialect} engine, not ${dialect}`
      )
    }
    return database.db
  }

  const end = async (outcome: Outcome) => {
    assertOpen()
    if (opening) await opening
    const conn = handle
    if (!conn) return
    handle = undefined
    await finish(conn, outcome)
  }

  const close = async () => {
    if (closed) return
    closed = true

    const starting = opening
    if (starting) {
      try {
        await starting
      } catch (err) {
        // Already rejected to the caller waiting on connection() / begin().
        log.debug({ err }, 'transaction start failed while closing')
      }
    }

    const conn = handle
    handle = undefined
    if (conn) await finish(conn, 'rollback')
    log.debug('session closed')
  }

  return {
    id,
    engine,
    connection,
    begin: async () => {
      await open()
    },
    commit: () => end('commit'),
    rollback: () => end('rollback'),
    close,
    inTransaction: () => handle !== undefined,
    isClosed: () => closed,
  }
}
