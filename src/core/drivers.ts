/**
 * @module drivers
 *
 * One driver per dialect. A driver owns the pool (or, for SQLite, the single
 * connection) and hands out checked-out connections wrapped in a Drizzle
 * database. Transactions are plain BEGIN / COMMIT / ROLLBACK on the checked-out
 * connection, so a session keeps one connection for the whole unit of work.
 *
 * Pools are created without connecting; the first `connect()` is the first
 * network call, and connection failures surface from the driver there.
 */

import pg from 'pg'
import mysql from 'mysql2/promise'
import Database from 'better-sqlite3'
import { drizzle as drizzlePg } from 'drizzle-orm/node-postgres'
import { drizzle as drizzleMysql } from 'drizzle-orm/mysql2'
import { drizzle as drizzleSqlite } from 'drizzle-orm/better-sqlite3'
import type { Logger as DrizzleLogger } from 'drizzle-orm'
import type { Dialect, DriverContext, DriverFactory } from './types'
import { ConfigError, SessionError } from './errors'
import { createQueryLogger } from './logger'
import { toConnectionString } from './url'

/** Drizzle's `logger` option: statements go to pino only when echo is on. */
const queryLoggerFor = ({ options, logger }: DriverContext): DrizzleLogger | false =>
  options.echo ? createQueryLogger(logger) : false

// ------------------------------------------------------------- PostgreSQL --

const postgresDriver: DriverFactory = (context) => {
  const { url, options, logger } = context
  const pool = new pg.Pool({
    connectionString: toConnectionString(url),
    ...(options.poolSize !== undefined && { max: options.poolSize }),
    ...(options.idleTimeout !== undefined && { idleTimeoutMillis: options.idleTimeout }),
    ...(options.connectTimeout !== undefined && { connectionTimeoutMillis: options.connectTimeout }),
  })

  // Without a listener, an idle client losing its socket crashes the process.
  pool.on('error', (err) => {
    logger.error({ err }, 'idle postgresql client error')
  })

  const queryLogger = queryLoggerFor(context)

  return {
    connect: async () => {
      const client = await pool.connect()
      return {
        database: { dialect: 'postgresql', db: drizzlePg(client, { logger: queryLogger }) },
        begin: async (isolationLevel) => {
          await client.query(isolationLevel ? `BEGIN ISOLATION LEVEL ${isolationLevel}` : 'BEGIN')
        },
        commit: async () => {
          await client.query('COMMIT')
        },
        rollback: async () => {
          await client.query('ROLLBACK')
        },
        release: async (failed) => {
          client.release(failed)
        },
      }
    },
    dispose: () => pool.end(),
  }
}

// ------------------------------------------------------------------ MySQL --

const mysqlDriver: DriverFactory = (context) => {
  const { url, options } = context
  const pool = mysql.createPool({
    uri: toConnectionString(url),
    ...(options.poolSize !== undefined && { connectionLimit: options.poolSize }),
    ...(options.idleTimeout !== undefined && { idleTimeout: options.idleTimeout }),
    ...(options.connectTimeout !== undefined && { connectTimeout: options.connectTimeout }),
  })

  const queryLogger = queryLoggerFor(context)

  return {
    connect: async () => {
      const conn = await pool.getConnection()
      return {
        database: { dialect: 'mysql', db: drizzleMysql(conn, { logger: queryLogger }) },
        begin: async (isolationLevel) => {
          // Applies to the next transaction on this connection only.
          if (isolationLevel) await conn.query(`SET TRANSACTION ISOLATION LEVEL ${isolationLevel}`)
          await conn.beginTransaction()
        },
        commit: () => conn.commit(),
        rollback: () => conn.rollback(),
        release: async (failed) => {
          if (failed) conn.destroy()
          else conn.release()
        },
      }
    },
    dispose: () => pool.end(),
  }
}

// ----------------------------------------------------------------- SQLite --

/**
 * better-sqlite3 is a single synchronous connection, so the "pool" is that
 * connection plus a FIFO of sessions waiting for it. Only one session holds
 * it at a time, which keeps BEGIN/COMMIT pairs from interleaving.
 */
const sqliteDriver: DriverFactory = (context) => {
  const { url, options, logger } = context

  if (options.poolSize !== undefined && options.poolSize !== 1) {
    throw new ConfigError(`sqlite runs on a single connection; poolSize must be 1 (got ${options.poolSize})`)
  }
  if (options.idleTimeout !== undefined) {
    throw new ConfigError('idleTimeout is not supported for sqlite')
  }

  const filename = url.database ?? ':memory:'
  const queryLogger = queryLoggerFor(context)

  let client: Database.Database | undefined
  const open = (): Database.Database => {
    if (!client) {
      client = new Database(filename, {
        ...(options.connectTimeout !== undefined && { timeout: options.connectTimeout }),
      })
      logger.debug({ filename }, 'sqlite database opened')
    }
    return client
  }

  let held = false
  let disposed = false
  const waiting: Array<{ resolve: () => void; reject: (err: Error) => void }> = []

  const lock = () => new Promise<void>((resolve, reject) => {
    if (held) {
      waiting.push({ resolve, reject })
      return
    }
    held = true
    resolve()
  })

  const unlock = () => {
    const next = waiting.shift()
    if (next) next.resolve()
    else held = false
  }

  return {
    connect: async () => {
      if (disposed) throw new SessionError('Engine has been disposed')
      await lock()

      // Handed the lock after dispose() ran; pass it on without opening.
      if (disposed) {
        unlock()
        throw new SessionError('Engine has been disposed')
      }

      let sqlite: Database.Database
      try {
        sqlite = open()
      } catch (err) {
        unlock()
        throw err
      }

      return {
        database: { dialect: 'sqlite', db: drizzleSqlite(sqlite, { logger: queryLogger }) },
        begin: async (isolationLevel) => {
          if (isolationLevel && isolationLevel !== 'SERIALIZABLE') {
            throw new ConfigError(`sqlite only supports SERIALIZABLE isolation (got ${isolationLevel})`)
          }
          sqlite.exec('BEGIN')
        },
        commit: async () => {
          sqlite.exec('COMMIT')
        },
        rollback: async () => {
          if (sqlite.inTransaction) sqlite.exec('ROLLBACK')
        },
        release: async (failed) => {
          try {
            if (failed && sqlite.inTransaction) sqlite.exec('ROLLBACK')
          } finally {
            unlock()
          }
        },
      }
    },
    dispose: async () => {
      disposed = true
      for (const waiter of waiting.splice(0)) {
        waiter.reject(new SessionError('Engine has been disposed'))
      }
      client?.close()
      client = undefined
    },
  }
}

// --------------------------------------------------------------- Registry --

export const DRIVERS: Readonly<Record<Dialect, DriverFactory>> = {
  postgresql: postgresDriver,
  mysql: mysqlDriver,
  sqlite: sqliteDriver,
}
