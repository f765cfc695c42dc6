import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest'
import {
  DEFAULT_BASE_URL,
  getEquipment,
  getEyepieces,
  getFilters,
  getInstruments,
  getLenses,
  parseEquipment,
  resolveClientOptions,
} from '../index.js'
import {
  AuthenticationError,
  HttpStatusError,
  InvalidParameterError,
  MalformedResponseError,
  ServerError,
  TransportError,
  isDeepskyError,
} from '../../errors/index.js'
import { configureLogging } from '../../logging/index.js'

const BASE_URL = 'https://dsl.example.test'

function stubFetch(status: number, body: string) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(body, { status }))
}

function requestedUrl(fetchStub: ReturnType<typeof stubFetch>): unknown {
  return fetchStub.mock.calls[0]?.[0]
}

beforeAll(() => {
  configureLogging({ level: 'silent' })
})

afterAll(() => {
  configureLogging()
})

afterEach(() => {
  vi.unstubAllEnvs()
})

describe('getInstruments', () => {
  it('returns the instruments keyed by integer ID', async () => {
    const fetchStub = stubFetch(
      200,
      JSON.stringify({ '1': { id: 1, name: '8in Dobsonian', diameter: 203, fd: 6, fixedMagnification: null } }),
    )

    const instruments = await getInstruments('alice', { baseUrl: BASE_URL, fetch: fetchStub })

    expect(requestedUrl(fetchStub)).toBe(`${BASE_URL}/api/instrument/alice`)
    expect([...instruments.keys()]).toEqual([1])
    expect(instruments.get(1)).toEqual({ id: 1, name: '8in Dobsonian', diameter: 203, fd: 6, fixedMagnification: null })
  })

  it('returns an empty map for a user without equipment', async () => {
    const instruments = await getInstruments('alice', { baseUrl: BASE_URL, fetch: stubFetch(200, '{}') })
    expect(instruments.size).toBe(0)
  })

  it.each([401, 403])('fails with AuthenticationError on %d', async status => {
    const err = await getInstruments('alice', { baseUrl: BASE_URL, fetch: stubFetch(status, '') }).catch(
      (e: unknown) => e,
    )

    expect(err).toBeInstanceOf(AuthenticationError)
    expect(err).toMatchObject({ kind: 'authentication', username: 'alice', resource: 'instrument', status })
    expect(String(err)).toContain("Authentication failed for user 'alice'")
  })

  it.each([500, 502, 503])('fails with ServerError on %d', async status => {
    const err = await getInstruments('alice', { baseUrl: BASE_URL, fetch: stubFetch(status, 'oops') }).catch(
      (e: unknown) => e,
    )

    expect(err).toBeInstanceOf(ServerError)
    expect(err).toMatchObject({ kind: 'server', status })
  })

  it('fails with HttpStatusError on other client errors', async () => {
    const err = await getInstruments('alice', { baseUrl: BASE_URL, fetch: stubFetch(404, '') }).catch(
      (e: unknown) => e,
    )

    expect(err).toBeInstanceOf(HttpStatusError)
    expect(err).toMatchObject({ kind: 'http-status', status: 404 })
  })

  it('fails with MalformedResponseError when the body is not JSON', async () => {
    const err = await getInstruments('alice', { baseUrl: BASE_URL, fetch: stubFetch(200, '<html>') }).catch(
      (e: unknown) => e,
    )

    expect(err).toBeInstanceOf(MalformedResponseError)
    expect(err).toMatchObject({ kind: 'malformed-response', resource: 'instrument' })
    expect(String(err)).toContain('Malformed data for instrument')
  })

  it('treats an empty body as malformed, not as an empty inventory', async () => {
    await expect(
      getInstruments('alice', { baseUrl: BASE_URL, fetch: stubFetch(200, '') }),
    ).rejects.toBeInstanceOf(MalformedResponseError)
  })
})

describe('response validation', () => {
  it.each([
    ['an array', '[]'],
    ['null', 'null'],
    ['a number', '42'],
    ['a non-integer key', '{"abc": {"name": "x"}}'],
    ['a non-object value', '{"1": 5}'],
    ['an array as a record', '{"1": [203, 6]}'],
    ['a null record', '{"1": null}'],
    ['a signed key', '{"-1": {"name": "x"}}'],
    ['a zero-padded key', '{"01": {"name": "x"}}'],
  ])('rejects %s', (_label, body) => {
    expect(() => parseEquipment('instrument', body)).toThrow(MalformedResponseError)
  })

  it('reports where the shape is wrong', () => {
    expect(() => parseEquipment('lenses', '{"3": "Barlow"}')).toThrow(
      'Malformed data for lenses: 3: Expected object, received string',
    )
  })

  it('keeps attributes it does not know about', () => {
    const eyepieces = parseEquipment(
      'eyepieces',
      '{"7": {"id": 7, "name": "Nagler 13mm", "focal_length_mm": 13, "eyepieceactive": true, "apparentFOV": 82}}',
    )
    expect(eyepieces.get(7)?.['apparentFOV']).toBe(82)
  })

  it('passes attributes through without checking their types', () => {
    const instruments = parseEquipment(
      'instrument',
      '{"1": {"id": "1", "name": null, "diameter": "203", "fd": 6}}',
    )
    expect(instruments.get(1)).toEqual({ id: '1', name: null, diameter: '203', fd: 6 })
  })

  it('rejects a zero-padded ID that would collide with another record', () => {
    expect(() => parseEquipment('filters', '{"1": {"name": "UHC"}, "01": {"name": "OIII"}}')).toThrow(
      'Malformed data for filters: 01: keys must be integer IDs',
    )
  })

  it('rejects IDs beyond the exact integer range', () => {
    expect(() => parseEquipment('filters', '{"9007199254740993": {"name": "UHC"}}')).toThrow(
      'Malformed data for filters: 9007199254740993: ID is too large to represent exactly',
    )
  })

  it('accepts ID 0', () => {
    expect([...parseEquipment('filters', '{"0": {"name": "UHC"}}').keys()]).toEqual([0])
  })

  it('orders records by ID', () => {
    const filters = parseEquipment('filters', '{"10": {"name": "OIII"}, "2": {"name": "UHC"}}')
    expect([...filters.keys()]).toEqual([2, 10])
  })
})

describe('transport failures', () => {
  it('reports an unreachable server as a network TransportError', async () => {
    const cause = new TypeError('fetch failed')
    const fetchStub = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw cause
    })

    const err = await getEyepieces('alice', { baseUrl: BASE_URL, fetch: fetchStub }).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(TransportError)
    expect(err).toMatchObject({ kind: 'transport', reason: 'network', cause })
  })

  it('reports a slow server as a timeout TransportError', async () => {
    const hanging = vi.fn(
      (_input: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')))
        }),
    )

    const err = await getEyepieces('alice', { baseUrl: BASE_URL, fetch: hanging, timeoutMs: 5 }).catch(
      (e: unknown) => e,
    )

    expect(err).toBeInstanceOf(TransportError)
    expect(err).toMatchObject({ reason: 'timeout', url: `${BASE_URL}/api/eyepieces/alice` })
  })

  it('keeps transport and server failures apart', async () => {
    const down = await getLenses('alice', {
      baseUrl: BASE_URL,
      fetch: vi.fn(async (): Promise<Response> => {
        throw new TypeError('fetch failed')
      }),
    }).catch((e: unknown) => e)
    const broken = await getLenses('alice', { baseUrl: BASE_URL, fetch: stubFetch(500, '') }).catch(
      (e: unknown) => e,
    )

    expect(isDeepskyError(down) && down.kind).toBe('transport')
    expect(isDeepskyError(broken) && broken.kind).toBe('server')
  })
})

describe('requests', () => {
  it.each([
    ['instrument', getInstruments],
    ['eyepieces', getEyepieces],
    ['lenses', getLenses],
    ['filters', getFilters],
  ] as const)('fetches /api/%s/<username>', async (resource, operation) => {
    const fetchStub = stubFetch(200, '{}')
    await operation('alice', { baseUrl: BASE_URL, fetch: fetchStub })
    expect(requestedUrl(fetchStub)).toBe(`${BASE_URL}/api/${resource}/alice`)
  })

  it('sends a GET asking for JSON', async () => {
    const fetchStub = stubFetch(200, '{}')
    await getFilters('alice', { baseUrl: BASE_URL, fetch: fetchStub })
    const init = fetchStub.mock.calls[0]?.[1]
    expect(init?.method).toBe('GET')
    expect(init?.headers).toEqual({ Accept: 'application/json' })
  })

  it('escapes the username in the path', async () => {
    const fetchStub = stubFetch(200, '{}')
    await getEyepieces('jan de vries', { baseUrl: BASE_URL, fetch: fetchStub })
    expect(requestedUrl(fetchStub)).toBe(`${BASE_URL}/api/eyepieces/jan%20de%20vries`)
  })

  it('rejects a blank username without calling the server', async () => {
    const fetchStub = stubFetch(200, '{}')
    await expect(getInstruments('  ', { baseUrl: BASE_URL, fetch: fetchStub })).rejects.toBeInstanceOf(
      InvalidParameterError,
    )
    expect(fetchStub).not.toHaveBeenCalled()
  })

  it('rejects unknown resources', async () => {
    const resource: 'instrument' = JSON.parse('"telescopes"')
    await expect(getEquipment(resource, 'alice', { baseUrl: BASE_URL, fetch: stubFetch(200, '{}') })).rejects.toThrow(
      'Unknown equipment resource: telescopes',
    )
  })
})

describe('resolveClientOptions', () => {
  it('falls back to the public test server', () => {
    vi.stubEnv('DEEPSKYLOG_BASE_URL', '')
    expect(resolveClientOptions().baseUrl).toBe(DEFAULT_BASE_URL)
    expect(resolveClientOptions().timeoutMs).toBe(10_000)
  })

  it('reads the base URL from the environment', () => {
    vi.stubEnv('DEEPSKYLOG_BASE_URL', 'https://staging.example.test/')
    expect(resolveClientOptions().baseUrl).toBe('https://staging.example.test')
  })

  it('prefers an explicit base URL and strips trailing slashes', () => {
    vi.stubEnv('DEEPSKYLOG_BASE_URL', 'https://staging.example.test')
    expect(resolveClientOptions({ baseUrl: `${BASE_URL}//` }).baseUrl).toBe(BASE_URL)
  })

  it('rejects a non-positive timeout', () => {
    expect(() => resolveClientOptions({ timeoutMs: 0 })).toThrow(InvalidParameterError)
  })
})
