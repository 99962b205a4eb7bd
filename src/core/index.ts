export { createSettings, DEFAULT_FOLDERS, DEFAULT_PROJECT_NAME } from './settings'
export { loadSettings, resolveConfigPath, settingsFromEnv } from './configLoader'
export { createUrl, renderUrl, parseUrl, toConnectionString, DEFAULT_DRIVERS } from './url'
export { createEngine } from './engine'
export { DRIVERS } from './drivers'
export { createSession } from './session'
export { createSessionFactory } from './sessionFactory'
export { createSessionScope } from './scope'
export { ValidationError, ConfigError, SessionError } from './errors'
export { createLogger, createQueryLogger, logger } from './logger'
export {
  ISOLATION_LEVELS,
  urlParamsSchema,
  engineParamsSchema,
  sessionParamsSchema,
  parseParams,
} from './params'

export type { CreateEngineOptions } from './engine'
export type { RenderOptions } from './url'
export type { Logger } from './logger'

export type {
  Dialect,
  DatabaseFor,
  DialectDatabase,
  FieldError,
  Paths,
  FolderNames,
  SettingsInput,
  Settings,
  UrlParams,
  EngineParams,
  SessionParams,
  IsolationLevel,
  DatabaseUrl,
  EngineOptions,
  DriverConnection,
  Driver,
  DriverContext,
  DriverFactory,
  Engine,
  SessionOptions,
  ConnectionFn,
  Session,
  SessionFactory,
  ScopeOptions,
  SessionScope,
} from './types'
