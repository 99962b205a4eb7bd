/**
 * Sethub — Configuration
 *
 * Provides `defineConfig()` for sethub.config.ts files. The config is read by
 * `loadSettings()` and turned into a frozen settings object; paths in it are
 * resolved against the config file's directory.
 *
 * @example
 * // sethub.config.ts
 * import { defineConfig } from 'sethub/config'
 *
 * export default defineConfig({
 *   projectName: 'Sethub',
 *   root: '..',
 *   db: {
 *     drivername: 'postgresql',
 *     username: 'app',
 *     password: process.env.DB_PASSWORD,
 *     host: 'localhost',
 *     port: 5432,
 *     database: 'app',
 *   },
 *   engine: { poolSize: 10 },
 *   session: { commitOnExit: false },
 * })
 */

import type { SettingsInput } from './core/types'

/**
 * Identity function that gives config files type-checking and
 * autocompletion.
 */
export const defineConfig = (config: SettingsInput): SettingsInput => config
