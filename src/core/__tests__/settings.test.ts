import { describe, it, expect } from 'vitest'
import { createSettings, DEFAULT_PROJECT_NAME } from '../settings'
import type { SettingsInput } from '../types'

const input: SettingsInput = { db: { drivername: 'sqlite', database: 'app.db' } }

describe('createSettings', () => {
  it('resolves every path under the anchor', () => {
    const settings = createSettings(input, '/srv/sethub')

    expect(settings.paths).toEqual({
      main: '/srv/sethub',
      app: '/srv/sethub/app',
      media: '/srv/sethub/media',
      static: '/srv/sethub/frontend/static',
      templates: '/srv/sethub/frontend/templates',
    })
  })

  it('defaults the project name', () => {
    expect(createSettings(input, '/srv/sethub').projectName).toBe(DEFAULT_PROJECT_NAME)
    expect(createSettings({ ...input, projectName: 'Billing' }, '/srv').projectName).toBe('Billing')
  })

  it('resolves root relative to the anchor', () => {
    const settings = createSettings({ ...input, root: '..' }, '/srv/sethub/config')
    expect(settings.paths.main).toBe('/srv/sethub')
    expect(settings.paths.media).toBe('/srv/sethub/media')
  })

  it('keeps an absolute root as given', () => {
    const settings = createSettings({ ...input, root: '/opt/app' }, '/srv/sethub')
    expect(settings.paths.main).toBe('/opt/app')
  })

  it('lets folder names be overridden one at a time', () => {
    const settings = createSettings({ ...input, folders: { static: 'public' } }, '/srv/sethub')
    expect(settings.paths.static).toBe('/srv/sethub/public')
    expect(settings.paths.templates).toBe('/srv/sethub/frontend/templates')
  })

  it('accepts a file URL as the anchor', () => {
    expect(createSettings(input, new URL('file:///srv/sethub/')).paths.main).toBe('/srv/sethub')
    expect(createSettings(input, 'file:///srv/sethub').paths.main).toBe('/srv/sethub')
  })

  it('rejects a URL anchor that is not a file URL', () => {
    expect(() => createSettings(input, new URL('https://example.com/app/'))).toThrow(TypeError)
  })

  it('copies the parameter mappings as given', () => {
    const settings = createSettings(
      {
        db: { drivername: 'postgresql', host: 'localhost', username: 'app', query: { sslmode: 'require' } },
        engine: { poolSize: 5 },
        session: { autobegin: false },
      },
      '/srv/sethub'
    )

    expect(settings.db.params).toEqual({
      drivername: 'postgresql',
      host: 'localhost',
      username: 'app',
      query: { sslmode: 'require' },
    })
    expect(settings.engine.params).toEqual({ poolSize: 5 })
    expect(settings.session.params).toEqual({ autobegin: false })
  })

  it('defaults engine and session parameters to empty mappings', () => {
    const settings = createSettings(input, '/srv/sethub')
    expect(settings.engine.params).toEqual({})
    expect(settings.session.params).toEqual({})
  })

  it('does not validate parameters up front', () => {
    expect(() => createSettings({ db: { drivername: '' } }, '/srv/sethub')).not.toThrow()
  })

  it('is deeply frozen', () => {
    const settings = createSettings({ ...input, db: { ...input.db, query: { mode: 'ro' } } }, '/srv')

    expect(Object.isFrozen(settings)).toBe(true)
    expect(Object.isFrozen(settings.paths)).toBe(true)
    expect(Object.isFrozen(settings.db.params)).toBe(true)
    expect(Object.isFrozen(settings.db.params.query)).toBe(true)
    expect(Object.isFrozen(settings.engine.params)).toBe(true)
  })

  it('is isolated from later changes to the input', () => {
    const query: Record<string, string> = { mode: 'ro' }
    const source: SettingsInput = { db: { drivername: 'sqlite', query }, engine: { echo: false } }
    const settings = createSettings(source, '/srv')

    query.mode = 'rw'
    source.engine = { echo: true }

    expect(settings.db.params.query).toEqual({ mode: 'ro' })
    expect(settings.engine.params).toEqual({ echo: false })
    expect(Object.isFrozen(query)).toBe(false)
  })
})
