/**
 * api — DeepskyLog equipment client.
 *
 * One GET per call to {baseUrl}/api/{resource}/{username}. The service answers
 * with a JSON object keyed by item ID:
 *
 *   { "12": { "id": 12, "name": "8in Dobsonian", "diameter": 203, "fd": 6, ... } }
 *
 * which is returned as a Map keyed by the integer ID. Only the container is
 * checked: every key must be a canonical integer ID and every value a JSON
 * object. The attributes inside are passed through as received.
 *
 * No retries, no pagination, no caching. Each call resolves its options and
 * creates its own AbortController, so nothing carries over between users.
 *
 * Failures:
 *   401 / 403          → AuthenticationError
 *   5xx                → ServerError
 *   other non-2xx      → HttpStatusError
 *   bad JSON / shape   → MalformedResponseError
 *   unreachable / slow → TransportError
 */

import { z } from 'zod'
import type {
  ClientOptions,
  EquipmentResource,
  EquipmentByResource,
  EquipmentMap,
  InstrumentRecord,
  EyepieceRecord,
  LensRecord,
  FilterRecord,
} from '../types.js'
import {
  InvalidParameterError,
  AuthenticationError,
  ServerError,
  HttpStatusError,
  MalformedResponseError,
  TransportError,
} from '../errors/index.js'
import { createLogger } from '../logging/index.js'
import { requirePositive } from '../math/index.js'

const log = createLogger('api')

// ─── Configuration ────────────────────────────────────────────────────────────

export const DEFAULT_BASE_URL = 'https://test.deepskylog.org'
export const DEFAULT_TIMEOUT_MS = 10_000

export interface ResolvedClientOptions {
  baseUrl: string
  timeoutMs: number
  fetch: typeof fetch
}

/**
 * Fill in client defaults: explicit option, then $DEEPSKYLOG_BASE_URL,
 * then the public DeepskyLog test server.
 */
export function resolveClientOptions(options?: ClientOptions): ResolvedClientOptions {
  const baseUrl = (options?.baseUrl || process.env['DEEPSKYLOG_BASE_URL'] || DEFAULT_BASE_URL)
    .replace(/\/+$/, '')
  const timeoutMs = requirePositive(options?.timeoutMs ?? DEFAULT_TIMEOUT_MS, 'timeoutMs')
  return { baseUrl, timeoutMs, fetch: options?.fetch ?? globalThis.fetch }
}

// ─── Response schemas ─────────────────────────────────────────────────────────

/** Canonical non-negative integer: no sign, no leading zeros */
const ID_KEY = /^(0|[1-9]\d*)$/

/** Any JSON object; its attributes are not inspected */
const attributes = z.object({}).passthrough()

const RECORD_SCHEMAS: {
  [R in EquipmentResource]: z.ZodType<EquipmentByResource[R], z.ZodTypeDef, unknown>
} = {
  instrument: attributes,
  eyepieces: attributes,
  lenses: attributes,
  filters: attributes,
}

function isEquipmentResource(value: string): value is EquipmentResource {
  return Object.prototype.hasOwnProperty.call(RECORD_SCHEMAS, value)
}

/** First zod issue as "path: message" */
function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0]
  if (!issue) return 'unexpected structure'
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
  return `${path}: ${issue.message}`
}

// ─── Request ──────────────────────────────────────────────────────────────────

/**
 * Fetch one equipment category for a user.
 *
 * @param resource - 'instrument' | 'eyepieces' | 'lenses' | 'filters'
 * @param username - DeepskyLog username; the server decides whether it exists
 * @param options - Base URL, timeout and fetch overrides
 * @returns Records keyed by integer ID; an empty Map when the user has none
 */
export async function getEquipment<R extends EquipmentResource>(
  resource: R,
  username: string,
  options?: ClientOptions,
): Promise<EquipmentMap<EquipmentByResource[R]>> {
  if (!isEquipmentResource(resource)) {
    throw new InvalidParameterError('resource', `Unknown equipment resource: ${String(resource)}`)
  }
  if (typeof username !== 'string' || username.trim() === '') {
    throw new InvalidParameterError('username', 'username must be a non-empty string')
  }

  const { baseUrl, timeoutMs, fetch: fetchImpl } = resolveClientOptions(options)
  const url = `${baseUrl}/api/${resource}/${encodeURIComponent(username)}`

  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)

  let response: Response
  let text: string
  try {
    log.debug(`GET ${url}`)
    response = await fetchImpl(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: controller.signal,
    })
    text = await response.text()
  } catch (err) {
    const reason = controller.signal.aborted ? 'timeout' : 'network'
    log.warn(`${resource} request failed (${reason})`, { url })
    throw new TransportError(resource, reason, url, { cause: err })
  } finally {
    clearTimeout(timeout)
  }

  if (response.status === 401 || response.status === 403) {
    log.warn(`${resource} request rejected`, { username, status: response.status })
    throw new AuthenticationError(username, resource, response.status)
  }
  if (response.status >= 500) {
    log.warn(`${resource} request hit a server fault`, { status: response.status })
    throw new ServerError(resource, response.status)
  }
  if (!response.ok) {
    throw new HttpStatusError(resource, response.status, response.statusText)
  }

  return parseEquipment(resource, text)
}

/**
 * Parse a response body into an equipment Map.
 * Exported for callers that fetch the JSON themselves.
 */
export function parseEquipment<R extends EquipmentResource>(
  resource: R,
  body: string,
): EquipmentMap<EquipmentByResource[R]> {
  let json: unknown
  try {
    json = JSON.parse(body)
  } catch (err) {
    throw new MalformedResponseError(resource, 'body is not valid JSON', { cause: err })
  }

  const schema = z.record(
    z.string().regex(ID_KEY, 'keys must be integer IDs'),
    RECORD_SCHEMAS[resource],
  )
  const result = schema.safeParse(json)
  if (!result.success) {
    throw new MalformedResponseError(resource, describeIssue(result.error), { cause: result.error })
  }

  const entries: [number, EquipmentByResource[R]][] = []
  for (const [key, record] of Object.entries(result.data)) {
    const id = Number(key)
    if (!Number.isSafeInteger(id)) {
      throw new MalformedResponseError(resource, `${key}: ID is too large to represent exactly`)
    }
    entries.push([id, record])
  }
  entries.sort((a, b) => a[0] - b[0])

  const items: EquipmentMap<EquipmentByResource[R]> = new Map(entries)
  log.debug(`parsed ${items.size} ${resource} record(s)`)
  return items
}

// ─── Per-category operations ──────────────────────────────────────────────────

/** All instruments (telescopes, binoculars, ...) defined by a user. */
export function getInstruments(username: string, options?: ClientOptions): Promise<EquipmentMap<InstrumentRecord>> {
  return getEquipment('instrument', username, options)
}

/** All eyepieces defined by a user. */
export function getEyepieces(username: string, options?: ClientOptions): Promise<EquipmentMap<EyepieceRecord>> {
  return getEquipment('eyepieces', username, options)
}

/** All lenses (Barlows, reducers) defined by a user. */
export function getLenses(username: string, options?: ClientOptions): Promise<EquipmentMap<LensRecord>> {
  return getEquipment('lenses', username, options)
}

/** All filters defined by a user. */
export function getFilters(username: string, options?: ClientOptions): Promise<EquipmentMap<FilterRecord>> {
  return getEquipment('filters', username, options)
}
