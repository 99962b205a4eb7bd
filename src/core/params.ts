/**
 * @module params
 *
 * Zod schemas for the three parameter mappings carried by settings:
 * connection (URL) parameters, engine parameters, and session-maker
 * parameters. The schemas declare no defaults or transforms, so a mapping
 * that passes validation comes out exactly as it went in; defaults are
 * applied by the builders that consume each mapping.
 */

import { z } from 'zod'
import { ValidationError } from './errors'
import type { FieldError } from './types'

// ------------------------------------------------------ Isolation Levels --

export const ISOLATION_LEVELS = [
  'READ UNCOMMITTED',
  'READ COMMITTED',
  'REPEATABLE READ',
  'SERIALIZABLE',
] as const

// ---------------------------------------------------------------- Schemas --

const nonEmpty = z.string().min(1)
const millis = z.number().int().nonnegative()

export const urlParamsSchema = z.object({
  drivername: nonEmpty,
  username: nonEmpty.optional(),
  password: z.string().optional(),
  host: nonEmpty.optional(),
  port: z.number().int().min(1).max(65535).optional(),
  database: nonEmpty.optional(),
  query: z.record(z.string()).optional(),
}).strict()

export const engineParamsSchema = z.object({
  echo: z.boolean().optional(),
  poolSize: z.number().int().positive().optional(),
  idleTimeout: millis.optional(),
  connectTimeout: millis.optional(),
}).strict()

export const sessionParamsSchema = z.object({
  autobegin: z.boolean().optional(),
  isolationLevel: z.enum(ISOLATION_LEVELS).optional(),
  commitOnExit: z.boolean().optional(),
}).strict()

export type UrlParams = z.infer<typeof urlParamsSchema>
export type EngineParams = z.infer<typeof engineParamsSchema>
export type SessionParams = z.infer<typeof sessionParamsSchema>
export type IsolationLevel = (typeof ISOLATION_LEVELS)[number]

// ---------------------------------------------------------------- Parsing --

/**
 * Convert zod issues into field errors. Root-level issues (unknown keys)
 * are reported against `prefix` itself, or `(root)` when there is none.
 */
export const toFieldErrors = (error: z.ZodError, prefix?: string): FieldError[] =>
  error.issues.map((issue) => {
    const path = [prefix, ...issue.path.map(String)].filter(Boolean).join('.')
    return { field: path || '(root)', message: issue.message }
  })

/**
 * Validate `input` against `schema`, throwing a ValidationError that lists
 * every problem.
 */
export const parseParams = <S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  prefix?: string
): z.output<S> => {
  const result = schema.safeParse(input)
  if (!result.success) throw new ValidationError(toFieldErrors(result.error, prefix))
  return result.data
}
