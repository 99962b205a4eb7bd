/**
 * Sethub — Main Entry Point
 *
 * Re-exports the public API. The default export bundles `createDatabase` and
 * the settings loaders as the primary entry points; named exports provide
 * the individual builders for consumers who compose their own.
 *
 * @example
 * import sethub from 'sethub'
 * const database = sethub.createDatabase(await sethub.loadSettings())
 *
 * @example
 * import { createUrl, createEngine, createSessionFactory } from 'sethub'
 */

// ------------------------------------------------ Composition (default) --

import { createDatabase } from './database'
import { createSettings, loadSettings, settingsFromEnv } from './core'

const sethub = { createDatabase, createSettings, loadSettings, settingsFromEnv }

export default sethub
export { sethub, createDatabase, createSettings, loadSettings, settingsFromEnv }

export type { Database, DatabaseOptions } from './database'

// -------------------------------------------------------- Core Utilities --

export {
  resolveConfigPath,
  createUrl,
  renderUrl,
  parseUrl,
  createEngine,
  createSession,
  createSessionFactory,
  createSessionScope,
  createLogger,
  logger,
  ISOLATION_LEVELS,
  DEFAULT_DRIVERS,
  DEFAULT_FOLDERS,
  ValidationError,
  ConfigError,
  SessionError,
} from './core'

export { defineConfig } from './config'

// --------------------------------------------------------------- Types --

export type {
  // Settings
  Settings,
  SettingsInput,
  Paths,
  FolderNames,

  // Parameter mappings
  UrlParams,
  EngineParams,
  SessionParams,
  IsolationLevel,

  // URL & engine
  Dialect,
  DatabaseUrl,
  RenderOptions,
  Engine,
  EngineOptions,
  CreateEngineOptions,
  Driver,
  DriverConnection,
  DriverContext,
  DriverFactory,

  // Sessions
  DatabaseFor,
  DialectDatabase,
  ConnectionFn,
  Session,
  SessionOptions,
  SessionFactory,
  ScopeOptions,
  SessionScope,

  // Errors & logging
  FieldError,
  Logger,
} from './core'
