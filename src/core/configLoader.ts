/**
 * @module configLoader
 *
 * Loads settings from the project's config file or from the environment.
 *
 * Config file resolution order:
 * 1. `SETHUB_CONFIG` env var (explicit path)
 * 2. `sethub.config.{ts,js,mjs}` in cwd
 *
 * Paths in a config file are anchored at the file's own directory, so
 * `root: '..'` means "the directory above the config file".
 */

import { dirname, resolve } from 'node:path'
import { existsSync } from 'node:fs'
import { z } from 'zod'
import type { Settings, SettingsInput } from './types'
import { ConfigError } from './errors'
import {
  ISOLATION_LEVELS,
  engineParamsSchema,
  parseParams,
  sessionParamsSchema,
  urlParamsSchema,
} from './params'
import { createSettings } from './settings'
import { parseUrl } from './url'

// ------------------------------------------------------------- Schemas --

const settingsInputSchema = z.object({
  projectName: z.string().min(1).optional(),
  root: z.string().optional(),
  folders: z.object({
    app: z.string().optional(),
    media: z.string().optional(),
    static: z.string().optional(),
    templates: z.string().optional(),
  }).strict().optional(),
  db: urlParamsSchema,
  engine: engineParamsSchema.optional(),
  session: sessionParamsSchema.optional(),
}).strict()

// ---------------------------------------------------- Path Resolution --

const CONFIG_FILENAME = 'sethub.config'
const CONFIG_EXTENSIONS = ['.ts', '.js', '.mjs']

/**
 * Resolve the config file path. Returns an absolute path; when nothing is
 * found, `sethub.config.ts` in cwd (which then fails to load with a clear
 * error).
 */
export const resolveConfigPath = (): string => {
  const envPath = process.env.SETHUB_CONFIG
  if (envPath) return resolve(process.cwd(), envPath)

  for (const ext of CONFIG_EXTENSIONS) {
    const candidate = resolve(process.cwd(), `${CONFIG_FILENAME}${ext}`)
    if (existsSync(candidate)) return candidate
  }

  return resolve(process.cwd(), `${CONFIG_FILENAME}.ts`)
}

// ------------------------------------------------------ File Loader --

/**
 * Load settings from a config file whose default export is a
 * `defineConfig()` object.
 *
 * @param configPath - Optional explicit path (overrides auto-resolution)
 * @throws ConfigError when the file cannot be imported or its export is invalid
 */
export const loadSettings = async (configPath?: string): Promise<Settings> => {
  const abs = configPath
    ? resolve(process.cwd(), configPath)
    : resolveConfigPath()

  let mod: unknown
  try {
    mod = await import(abs)
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err)
    const hint = abs.endsWith('.ts')
      ? '\nHint: Loading .ts config files requires tsx. Install it: npm install -D tsx'
      : ''
    throw new ConfigError(`Failed to load config from '${abs}': ${msg}${hint}`)
  }

  const exported = mod !== null && typeof mod === 'object' && 'default' in mod
    ? mod.default
    : mod

  const result = settingsInputSchema.safeParse(exported)
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid config in '${abs}': ${problems}`)
  }

  return createSettings(result.data, dirname(abs))
}

// ------------------------------------------------------- Env Loader --

type Env = Record<string, string | undefined>

const flag = z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1')
const integer = z.string().regex(/^\d+$/, 'Expected a whole number').transform(Number)

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  DB_DRIVER: z.string().optional(),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_HOST: z.string().optional(),
  DB_PORT: integer.optional(),
  DB_NAME: z.string().optional(),
  DB_ECHO: flag.optional(),
  DB_POOL_SIZE: integer.optional(),
  DB_IDLE_TIMEOUT: integer.optional(),
  DB_CONNECT_TIMEOUT: integer.optional(),
  DB_AUTOBEGIN: flag.optional(),
  DB_ISOLATION_LEVEL: z.enum(ISOLATION_LEVELS).optional(),
  DB_COMMIT_ON_EXIT: flag.optional(),
  PROJECT_NAME: z.string().optional(),
  PROJECT_ROOT: z.string().optional(),
})

/**
 * Build settings from environment variables. `DATABASE_URL` wins over the
 * individual `DB_*` connection variables.
 *
 * @throws ValidationError for malformed values
 */
export const settingsFromEnv = (
  env: Env = process.env,
  anchor: string | URL = process.cwd()
): Settings => {
  const vars = parseParams(envSchema, env, 'env')

  const db = vars.DATABASE_URL
    ? parseUrl(vars.DATABASE_URL)
    : {
        drivername: vars.DB_DRIVER ?? '',
        username: vars.DB_USER,
        password: vars.DB_PASSWORD,
        host: vars.DB_HOST,
        port: vars.DB_PORT,
        database: vars.DB_NAME,
      }

  const input: SettingsInput = {
    projectName: vars.PROJECT_NAME,
    root: vars.PROJECT_ROOT,
    db,
    engine: {
      echo: vars.DB_ECHO,
      poolSize: vars.DB_POOL_SIZE,
      idleTimeout: vars.DB_IDLE_TIMEOUT,
      connectTimeout: vars.DB_CONNECT_TIMEOUT,
    },
    session: {
      autobegin: vars.DB_AUTOBEGIN,
      isolationLevel: vars.DB_ISOLATION_LEVEL,
      commitOnExit: vars.DB_COMMIT_ON_EXIT,
    },
  }

  return createSettings(input, anchor)
}
