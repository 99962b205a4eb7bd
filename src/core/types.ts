/**
 * Sethub — Core Type Definitions
 *
 * Shared types for settings, connection URLs, engines, drivers, sessions and
 * scopes. Parameter mapping types are inferred from the zod schemas in
 * `params.ts` and re-exported here.
 */

import type { NodePgDatabase } from 'drizzle-orm/node-postgres'
import type { MySql2Database } from 'drizzle-orm/mysql2'
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import type { Logger } from 'pino'
import type { EngineParams, IsolationLevel, SessionParams, UrlParams } from './params'

export type { EngineParams, IsolationLevel, SessionParams, UrlParams }

// ---------------------------------------------------------------- Dialect --

export type Dialect = 'postgresql' | 'mysql' | 'sqlite'

/** The Drizzle database type each dialect's driver hands out. */
export type DatabaseFor<D extends Dialect> = {
  postgresql: NodePgDatabase
  mysql: MySql2Database
  sqlite: BetterSQLite3Database
}[D]

/** A Drizzle database tagged with its dialect, narrowable on `dialect`. */
export type DialectDatabase = {
  [D in Dialect]: { dialect: D; db: DatabaseFor<D> }
}[Dialect]

// ------------------------------------------------------------- Validation --

export type FieldError = {
  field: string
  message: string
}

// ---------------------------------------------------------------- Settings --

export type Paths = {
  /** Project root every other path is resolved against. */
  main: string
  app: string
  media: string
  static: string
  templates: string
}

export type FolderNames = {
  app?: string
  media?: string
  static?: string
  templates?: string
}

/** What a config file or caller supplies to `createSettings()`. */
export type SettingsInput = {
  projectName?: string
  /** Project root, relative to the anchor. Default: the anchor itself. */
  root?: string
  folders?: FolderNames
  db: UrlParams
  engine?: EngineParams
  session?: SessionParams
}

export type Settings = {
  readonly projectName: string
  readonly paths: Readonly<Paths>
  readonly db: { readonly params: Readonly<UrlParams> }
  readonly engine: { readonly params: Readonly<EngineParams> }
  readonly session: { readonly params: Readonly<SessionParams> }
}

// --------------------------------------------------------------------- URL --

/**
 * A validated connection URL. The fields mirror the input parameters;
 * `dialect` and `driver` are derived from `drivername`.
 */
export type DatabaseUrl = {
  readonly drivername: string
  readonly dialect: Dialect
  readonly driver: string
  readonly username?: string
  readonly password?: string
  readonly host?: string
  readonly port?: number
  readonly database?: string
  readonly query: Readonly<Record<string, string>>
}

// ----------------------------------------------------------------- Drivers --

/** Engine parameters with defaults applied. */
export type EngineOptions = EngineParams & { echo: boolean }

/**
 * One checked-out physical connection. `release(true)` discards the
 * connection instead of returning it to the pool.
 */
export type DriverConnection = {
  database: DialectDatabase
  begin: (isolationLevel?: IsolationLevel) => Promise<void>
  commit: () => Promise<void>
  rollback: () => Promise<void>
  release: (failed: boolean) => Promise<void>
}

export type Driver = {
  connect: () => Promise<DriverConnection>
  dispose: () => Promise<void>
}

export type DriverContext = {
  url: DatabaseUrl
  options: EngineOptions
  logger: Logger
}

export type DriverFactory = (context: DriverContext) => Driver

// ------------------------------------------------------------------ Engine --

export type Engine = {
  readonly url: DatabaseUrl
  readonly dialect: Dialect
  readonly options: EngineOptions
  connect: () => Promise<DriverConnection>
  dispose: () => Promise<void>
  isDisposed: () => boolean
}

// ----------------------------------------------------------------- Session --

/** Session-maker parameters with defaults applied. */
export type SessionOptions = SessionParams & {
  autobegin: boolean
  commitOnExit: boolean
}

/**
 * `connection()` returns the tagged database; `connection(dialect)` returns
 * the Drizzle database for that dialect, failing if the engine differs.
 */
export type ConnectionFn = {
  (): Promise<DialectDatabase>
  (dialect: 'postgresql'): Promise<NodePgDatabase>
  (dialect: 'mysql'): Promise<MySql2Database>
  (dialect: 'sqlite'): Promise<BetterSQLite3Database>
}

export type Session = {
  readonly id: number
  readonly engine: Engine
  connection: ConnectionFn
  begin: () => Promise<void>
  commit: () => Promise<void>
  rollback: () => Promise<void>
  close: () => Promise<void>
  inTransaction: () => boolean
  isClosed: () => boolean
}

export type SessionFactory = (() => Session) & {
  readonly engine: Engine
  readonly options: SessionOptions
}

// ------------------------------------------------------------------- Scope --

export type ScopeOptions = {
  /** Commit on a clean exit. Default: the factory's `commitOnExit`. */
  commitOnExit?: boolean
}

export type SessionScope = {
  enter: () => Promise<Session>
  exit: (failed?: boolean) => Promise<void>
  commit: () => Promise<void>
  rollback: () => Promise<void>
  current: () => Session | undefined
  run: <T>(fn: (session: Session) => Promise<T>) => Promise<T>
}
