/**
 * Notes example — request-scoped sessions in a Fastify app
 *
 * Demonstrates:
 *  - loadSettings() reading the sethub.config.ts beside this file
 *  - createDatabase() composing URL → engine → session factory
 *  - openSession() for setup work, committed explicitly
 *  - withSession(): one scope per request, committed only when the request succeeds
 *  - Self-testing: exercises the routes with fastify.inject() and prints results
 *
 * This example uses in-memory SQLite for zero-setup convenience.
 *
 * Run: npm run example
 */

import { fileURLToPath } from 'node:url'
import Fastify from 'fastify'
import { sql } from 'drizzle-orm'
import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core'
import { createDatabase, createUrl, loadSettings, renderUrl } from 'sethub'
import { withSession, getSession } from 'sethub/fastify'

const notesTable = sqliteTable('notes', {
  id: integer('id').primaryKey(),
  body: text('body').notNull(),
})

// --- Setup: settings + database + schema ---

const settings = await loadSettings(fileURLToPath(new URL('./sethub.config.ts', import.meta.url)))
const database = createDatabase(settings)

await database.openSession(async (session) => {
  const db = await session.connection('sqlite')
  db.run(sql`CREATE TABLE notes (id INTEGER PRIMARY KEY, body TEXT NOT NULL)`)
  await session.commit()
})

// --- Fastify app with one session per request ---

const fastify = Fastify({ logger: false })
withSession(fastify, database)

fastify.get('/notes', async (request) => {
  const db = await getSession(request).connection('sqlite')
  return db.select().from(notesTable).all()
})

fastify.post<{ Body: { body?: string } }>('/notes', async (request, reply) => {
  const db = await getSession(request).connection('sqlite')
  const [note] = db.insert(notesTable).values({ body: request.body.body ?? '' }).returning().all()

  // The insert already ran; a 4xx status rolls it back on the way out.
  if (!request.body.body) return reply.code(400).send({ error: 'body is required' })
  return reply.code(201).send(note)
})

await fastify.ready()

// --- Self-test ---

const created = await fastify.inject({ method: 'POST', url: '/notes', payload: { body: 'Buy milk' } })
const rejected = await fastify.inject({ method: 'POST', url: '/notes', payload: {} })
const listed = await fastify.inject({ method: 'GET', url: '/notes' })

console.log('=== Settings ===')
console.log('Project:', settings.projectName)
console.log('Paths:', settings.paths)
console.log('URL:', renderUrl(createUrl(settings.db.params)))

console.log('\n=== Create ===')
console.log('Status:', created.statusCode, created.json())

console.log('\n=== Rejected (rolled back) ===')
console.log('Status:', rejected.statusCode, rejected.json())

console.log('\n=== List ===')
console.log(listed.json())

// --- Teardown (withSession disposes the database on close) ---

await fastify.close()
console.log('\nDone!')
