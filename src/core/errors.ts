/**
 * Sethub — Error Types
 *
 * Custom error classes for configuration problems, invalid parameter
 * mappings, and session lifecycle misuse. Errors raised by the drivers
 * themselves (connection refused, constraint violations) are never wrapped:
 * they reach the caller as the driver threw them.
 */

import type { FieldError } from './types'

/**
 * Thrown when a parameter mapping fails validation. Contains every field
 * error found, so a bad config file is fixed in one pass.
 *
 * @example
 * try {
 *   createUrl({ drivername: 'postgresql' })
 * } catch (err) {
 *   if (err instanceof ValidationError) {
 *     console.log(err.errors)
 *     // [
 *     //   { field: 'host', message: 'host is required for postgresql' },
 *     //   { field: 'username', message: 'username is required for postgresql' },
 *     // ]
 *   }
 * }
 */
export class ValidationError extends Error {
  readonly errors: FieldError[]

  constructor(errors: FieldError[]) {
    const count = errors.length
    const first = errors[0]
    const summary = count === 1 && first
      ? first.message
      : `${count} validation error(s)`

    super(`Validation failed: ${summary}`)
    this.name = 'ValidationError'
    this.errors = errors
  }
}

/**
 * Thrown when configuration is unusable (config file missing or broken,
 * an option the selected dialect cannot honour).
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when a session or scope is used out of order (closed session,
 * nested begin, commit with nothing attached, disposed engine).
 */
export class SessionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SessionError'
  }
}
