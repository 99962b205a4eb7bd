import { describe, it, expect } from 'vitest'
import { createEngine } from '../engine'
import { createSessionFactory } from '../sessionFactory'
import { createSessionScope } from '../scope'
import { createUrl } from '../url'
import { SessionError } from '../errors'
import { createLogger } from '../logger'
import type { ScopeOptions, SessionParams } from '../types'
import { createFakeDriver } from './fixtures/fakeDriver'

const setup = (params: SessionParams = {}, options?: ScopeOptions) => {
  const fake = createFakeDriver()
  const engine = createEngine(createUrl({ drivername: 'sqlite' }), {}, { driver: fake.factory })
  const factory = createSessionFactory(engine, params)
  return { ...fake, scope: createSessionScope(factory, options) }
}

describe('enter', () => {
  it('attaches a fresh session', async () => {
    const { scope } = setup()
    expect(scope.current()).toBeUndefined()

    const session = await scope.enter()
    expect(scope.current()).toBe(session)
    expect(session.isClosed()).toBe(false)
  })

  it('refuses a second enter before exit', async () => {
    const { scope } = setup()
    await scope.enter()
    await expect(scope.enter()).rejects.toThrow('Scope already has a session attached; exit it first')
  })
})

describe('commit', () => {
  it('commits, closes and detaches the session', async () => {
    const { scope, events } = setup()
    const session = await scope.enter()
    await session.connection()

    await scope.commit()

    expect(events).toEqual(['connect:1', 'begin:1', 'commit:1', 'release:1'])
    expect(session.isClosed()).toBe(true)
    expect(scope.current()).toBeUndefined()
  })

  it('leaves nothing to roll back afterwards', async () => {
    const { scope } = setup()
    await scope.enter()
    await scope.commit()

    await expect(scope.rollback()).rejects.toThrow(SessionError)
    await expect(scope.rollback()).rejects.toThrow(
      'Cannot rollback: no session is attached to this scope'
    )
  })

  it('fails with no session attached', async () => {
    const { scope } = setup()
    await expect(scope.commit()).rejects.toThrow(
      'Cannot commit: no session is attached to this scope'
    )
  })
})

describe('rollback', () => {
  it('rolls back, closes and detaches the session', async () => {
    const { scope, events } = setup()
    const session = await scope.enter()
    await session.connection()

    await scope.rollback()

    expect(events).toEqual(['connect:1', 'begin:1', 'rollback:1', 'release:1'])
    expect(session.isClosed()).toBe(true)
    expect(scope.current()).toBeUndefined()
  })
})

describe('exit', () => {
  it('rolls back uncommitted work by default', async () => {
    const { scope, events } = setup()
    const session = await scope.enter()
    await session.connection()

    await scope.exit()

    expect(events).toEqual(['connect:1', 'begin:1', 'rollback:1', 'release:1'])
    expect(scope.current()).toBeUndefined()
  })

  it('commits on a clean exit when commitOnExit is set', async () => {
    const { scope, events } = setup({}, { commitOnExit: true })
    const session = await scope.enter()
    await session.connection()

    await scope.exit()

    expect(events).toEqual(['connect:1', 'begin:1', 'commit:1', 'release:1'])
  })

  it('takes commitOnExit from the factory when the scope does not set it', async () => {
    const { scope, events } = setup({ commitOnExit: true })
    const session = await scope.enter()
    await session.connection()

    await scope.exit()

    expect(events).toContain('commit:1')
  })

  it('rolls back a failed exit even when commitOnExit is set', async () => {
    const { scope, events } = setup({}, { commitOnExit: true })
    const session = await scope.enter()
    await session.connection()

    await scope.exit(true)

    expect(events).toEqual(['connect:1', 'begin:1', 'rollback:1', 'release:1'])
  })

  it('does nothing after an explicit commit', async () => {
    const { scope, events } = setup()
    await scope.enter()
    await scope.commit()
    await scope.exit()

    expect(events).toEqual([])
  })

  it('allows the scope to be entered again', async () => {
    const { scope } = setup()
    const first = await scope.enter()
    await scope.exit()

    const second = await scope.enter()
    expect(second).not.toBe(first)
    expect(second.id).toBe(2)
  })
})

describe('run', () => {
  it('returns the callback result and rolls back uncommitted work', async () => {
    const { scope, events } = setup()

    const result = await scope.run(async (session) => {
      await session.connection()
      return 'done'
    })

    expect(result).toBe('done')
    expect(events).toEqual(['connect:1', 'begin:1', 'rollback:1', 'release:1'])
    expect(scope.current()).toBeUndefined()
  })

  it('keeps work the callback committed', async () => {
    const { scope, events } = setup()

    await scope.run(async (session) => {
      await session.connection()
      await session.commit()
    })

    expect(events).toEqual(['connect:1', 'begin:1', 'commit:1', 'release:1'])
  })

  it('keeps the callback error when the rollback also fails', async () => {
    const fake = createFakeDriver({ failOn: { rollback: new Error('connection lost') } })
    const engine = createEngine(createUrl({ drivername: 'sqlite' }), {}, { driver: fake.factory })
    const lines: string[] = []
    const logger = createLogger({ level: 'error' }, { write: (line: string) => { lines.push(line) } })
    const scope = createSessionScope(createSessionFactory(engine), {}, logger)
    const failure = new Error('boom')

    await expect(
      scope.run(async (session) => {
        await session.connection()
        throw failure
      })
    ).rejects.toBe(failure)

    expect(fake.events).toEqual(['connect:1', 'begin:1', 'rollback:1', 'discard:1'])
    expect(scope.current()).toBeUndefined()

    const entries: Array<{ msg: string; session: number; err: { message: string } }> =
      lines.map((line) => JSON.parse(line))
    expect(entries).toHaveLength(1)
    expect(entries[0]?.msg).toBe('rollback failed after callback error')
    expect(entries[0]?.session).toBe(1)
    expect(entries[0]?.err.message).toBe('connection lost')
  })

  it('rolls back and rethrows when the callback throws', async () => {
    const { scope, events } = setup({}, { commitOnExit: true })
    const failure = new Error('boom')
    let captured: boolean | undefined

    await expect(
      scope.run(async (session) => {
        await session.connection()
        captured = session.isClosed()
        throw failure
      })
    ).rejects.toBe(failure)

    expect(captured).toBe(false)
    expect(events).toEqual(['connect:1', 'begin:1', 'rollback:1', 'release:1'])
    expect(scope.current()).toBeUndefined()
  })
})
