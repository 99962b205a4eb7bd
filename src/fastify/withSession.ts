/**
 * Sethub — Fastify request sessions
 *
 * Gives every request its own session scope. The scope is entered when the
 * request arrives and exited just before the response is sent, so the outcome
 * of the unit of work is settled before the client sees a status code.
 *
 * On exit the scope commits only when `commitOnExit` is on, no handler error
 * was raised, and the status code is below 400. Otherwise it rolls back.
 * Handlers that want control can call `request.dbScope.commit()` themselves;
 * the exit hook then has nothing left to do.
 *
 * @example
 * import Fastify from 'fastify'
 * import { withSession, getSession } from 'sethub/fastify'
 *
 * const app = Fastify()
 * withSession(app, database, { commitOnExit: true })
 *
 * app.post('/notes', async (request) => {
 *   const db = await getSession(request).connection('postgresql')
 *   return db.insert(notes).values(request.body).returning()
 * })
 */

import type { FastifyInstance, FastifyRequest } from 'fastify'
import type { Database } from '../database'
import type { Session, SessionScope } from '../core/types'
import { SessionError } from '../core/errors'

declare module 'fastify' {
  interface FastifyRequest {
    dbScope: SessionScope | null
  }
}

export type WithSessionOptions = {
  /** Commit clean requests on exit. Default: the settings' `commitOnExit`. */
  commitOnExit?: boolean
  /** Dispose the database when the Fastify instance closes. Default: true. */
  disposeOnClose?: boolean
}

/**
 * Register the session hooks on `app`. Call before registering routes; the
 * hooks are added to `app` itself, not to an encapsulated child context.
 */
export const withSession = (
  app: FastifyInstance,
  database: Database,
  { commitOnExit, disposeOnClose = true }: WithSessionOptions = {}
): void => {
  const failed = new WeakSet<FastifyRequest>()

  app.decorateRequest('dbScope', null)

  app.addHook('onRequest', async (request) => {
    const scope = database.scope({ commitOnExit })
    await scope.enter()
    request.dbScope = scope
  })

  app.addHook('onError', async (request) => {
    failed.add(request)
  })

  app.addHook('onSend', async (request, reply, payload) => {
    const scope = request.dbScope
    if (scope?.current()) {
      await scope.exit(failed.has(request) || reply.statusCode >= 400)
    }
    return payload
  })

  // Hijacked replies skip onSend; never leave their sessions attached.
  app.addHook('onResponse', async (request) => {
    const scope = request.dbScope
    if (scope?.current()) await scope.exit(true)
  })

  if (disposeOnClose) {
    app.addHook('onClose', async () => {
      await database.dispose()
    })
  }
}

/**
 * The session attached to `request`.
 *
 * @throws SessionError when withSession() is not registered or the request's
 *         session has already been committed or rolled back
 */
export const getSession = (request: FastifyRequest): Session => {
  const session = request.dbScope?.current()
  if (!session) throw new SessionError('No session is attached to this request')
  return session
}
