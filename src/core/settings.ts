/**
 * @module settings
 *
 * The settings holder: project name, filesystem paths resolved once against
 * an anchor, and the three parameter mappings the database layer consumes.
 * The result is deeply frozen. Pass it to `createDatabase()` rather than
 * importing a process-wide instance.
 */

import { resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import type { Settings, SettingsInput } from './types'

export const DEFAULT_PROJECT_NAME = 'Sethub'

export const DEFAULT_FOLDERS = {
  app: 'app',
  media: 'media',
  static: 'frontend/static',
  templates: 'frontend/templates',
} as const

const toDirectory = (anchor: string | URL): string =>
  anchor instanceof URL || anchor.startsWith('file:')
    ? fileURLToPath(anchor)
    : anchor

const deepFreeze = <T extends object>(value: T): Readonly<T> => {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object') deepFreeze(child)
  }
  return Object.freeze(value)
}

/**
 * Build settings from `input`. Paths are resolved against `anchor` (a
 * directory path or a `file:` URL), then `input.root`.
 *
 * Parameter mappings are copied as given; they are validated only when the
 * database layer builds a URL, engine or session factory from them.
 *
 * @throws TypeError when `anchor` is a URL that is not a `file:` URL
 *
 * @example
 * const settings = createSettings(
 *   { db: { drivername: 'sqlite', database: 'app.db' } },
 *   new URL('..', import.meta.url),
 * )
 * settings.paths.media // '<project>/media'
 */
export const createSettings = (
  input: SettingsInput,
  anchor: string | URL = process.cwd()
): Settings => {
  const main = resolve(toDirectory(anchor), input.root ?? '.')
  const folders = { ...DEFAULT_FOLDERS, ...input.folders }

  return deepFreeze({
    projectName: input.projectName ?? DEFAULT_PROJECT_NAME,
    paths: {
      main,
      app: resolve(main, folders.app),
      media: resolve(main, folders.media),
      static: resolve(main, folders.static),
      templates: resolve(main, folders.templates),
    },
    db: { params: { ...input.db, ...(input.db.query && { query: { ...input.db.query } }) } },
    engine: { params: { ...input.engine } },
    session: { params: { ...input.session } },
  })
}
