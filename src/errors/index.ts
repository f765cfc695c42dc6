/**
 * errors — The two failure taxonomies.
 *
 * Every error carries a literal `kind`, so callers can narrow with a switch
 * instead of an instanceof chain:
 *
 *   try { await getInstruments('alice') }
 *   catch (err) {
 *     if (isDeepskyError(err) && err.kind === 'transport') retryLater()
 *     else throw err
 *   }
 *
 * Computation errors are thrown synchronously before any arithmetic runs.
 * Client errors are never retried internally.
 */

import type { EquipmentResource } from '../types.js'

export type DeepskyErrorKind =
  | 'invalid-parameter'
  | 'unknown-instrument-type'
  | 'authentication'
  | 'server'
  | 'http-status'
  | 'malformed-response'
  | 'transport'

export abstract class DeepskyError extends Error {
  abstract readonly kind: DeepskyErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

// ─── Computation ─────────────────────────────────────────────────────────────

/** A required input was non-finite, non-positive, out of range or ambiguous. */
export class InvalidParameterError extends DeepskyError {
  readonly kind = 'invalid-parameter'

  constructor(public readonly parameter: string, message: string) {
    super(message)
  }
}

/** Lookup miss in the instrument type enumeration. */
export class UnknownInstrumentTypeError extends DeepskyError {
  readonly kind = 'unknown-instrument-type'

  constructor(public readonly value: string | number) {
    super(`Unknown instrument type: ${typeof value === 'string' ? `'${value}'` : value}`)
  }
}

export type ComputationError = InvalidParameterError | UnknownInstrumentTypeError

// ─── Client ──────────────────────────────────────────────────────────────────

/** The service answered 401 or 403 for this user. */
export class AuthenticationError extends DeepskyError {
  readonly kind = 'authentication'

  constructor(
    public readonly username: string,
    public readonly resource: EquipmentResource,
    public readonly status: number,
  ) {
    super(`Authentication failed for user '${username}' (status ${status})`)
  }
}

/** The service answered with a 5xx status. */
export class ServerError extends DeepskyError {
  readonly kind = 'server'

  constructor(public readonly resource: EquipmentResource, public readonly status: number) {
    super(`Internal server error (status ${status}) while fetching ${resource}`)
  }
}

/** Any other non-2xx status (404, 429, ...). */
export class HttpStatusError extends DeepskyError {
  readonly kind = 'http-status'

  constructor(
    public readonly resource: EquipmentResource,
    public readonly status: number,
    statusText: string,
  ) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''} while fetching ${resource}`)
  }
}

/** The body was not JSON, or not a flat ID → attributes object. */
export class MalformedResponseError extends DeepskyError {
  readonly kind = 'malformed-response'

  constructor(public readonly resource: EquipmentResource, detail: string, options?: { cause?: unknown }) {
    super(`Malformed data for ${resource}: ${detail}`, options)
  }
}

/** The service could not be reached at all. */
export class TransportError extends DeepskyError {
  readonly kind = 'transport'

  constructor(
    public readonly resource: EquipmentResource,
    public readonly reason: 'network' | 'timeout',
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(
      reason === 'timeout'
        ? `Request to ${url} timed out`
        : `Failed to connect to ${url}`,
      options,
    )
  }
}

export type ClientError =
  | AuthenticationError
  | ServerError
  | HttpStatusError
  | MalformedResponseError
  | TransportError

/** Narrow an unknown catch value to one of this library's errors. */
export function isDeepskyError(value: unknown): value is ComputationError | ClientError {
  return value instanceof DeepskyError
}
