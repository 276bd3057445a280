import { ConnectionError, createConsoleLogger, createGateway, ExecutionError, NotFoundError } from '@polystore/gateway'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { createObjectAdapter, objectStoreEndpoint } from '../src/index.js'

// ── Mock @aws-sdk/client-s3 ────────────────────────────────────

interface SentCommand {
  readonly name: string
  readonly input: Record<string, unknown>
}

const mockSend = vi.fn()
const mockDestroy = vi.fn()

vi.mock('@aws-sdk/client-s3', () => {
  const command = (name: string) =>
    class {
      readonly name = name
      constructor(readonly input: Record<string, unknown>) {}
    }
  return {
    S3Client: vi.fn(function MockS3Client() {
      return { send: mockSend, destroy: mockDestroy }
    }),
    CreateBucketCommand: command('CreateBucket'),
    DeleteObjectCommand: command('DeleteObject'),
    GetObjectCommand: command('GetObject'),
    HeadBucketCommand: command('HeadBucket'),
    HeadObjectCommand: command('HeadObject'),
    ListObjectsV2Command: command('ListObjectsV2'),
    PutObjectCommand: command('PutObject'),
  }
})

type Handler = (input: Record<string, unknown>) => unknown

function respond(handlers: Record<string, Handler>): void {
  mockSend.mockImplementation(async (command: SentCommand) => {
    const handler = handlers[command.name]
    if (handler === undefined) throw new Error(`Unexpected ${command.name}`)
    return handler(command.input)
  })
}

function s3Error(name: string, message = name): Error {
  const err = new Error(message)
  err.name = name
  return err
}

function sentNames(): string[] {
  return mockSend.mock.calls.map((call) => {
    const command: SentCommand = call[0]
    return command.name
  })
}

/** In-memory bucket behind the mocked client, keyed by object key. */
function bucketStandIn(): Map<string, Uint8Array> {
  const objects = new Map<string, Uint8Array>()
  const stored = (input: Record<string, unknown>): Uint8Array => {
    const body = typeof input.Key === 'string' ? objects.get(input.Key) : undefined
    if (body === undefined) throw s3Error('NoSuchKey', 'The specified key does not exist.')
    return body
  }
  respond({
    HeadBucket: () => ({}),
    PutObject: (input) => {
      if (typeof input.Key !== 'string' || !(input.Body instanceof Uint8Array)) throw s3Error('InvalidRequest')
      objects.set(input.Key, Uint8Array.from(input.Body))
      return { ETag: '"stored"' }
    },
    GetObject: (input) => {
      const body = stored(input)
      return { Body: { transformToByteArray: async () => Uint8Array.from(body) } }
    },
    HeadObject: (input) => {
      try {
        return { ContentLength: stored(input).byteLength }
      } catch {
        throw s3Error('NotFound')
      }
    },
    DeleteObject: (input) => {
      if (typeof input.Key === 'string') objects.delete(input.Key)
      return {}
    },
    ListObjectsV2: (input) => {
      const prefix = typeof input.Prefix === 'string' ? input.Prefix : ''
      const keys = [...objects.keys()].filter((key) => key.startsWith(prefix))
      return { Contents: keys.map((Key) => ({ Key })), IsTruncated: false }
    },
  })
  return objects
}

const config = {
  endPoint: 'localhost',
  accessKey: 'test-access',
  secretKey: 'test-secret',
  bucket: 'uploads',
}

const context = { signal: new AbortController().signal }

// ── Tests ──────────────────────────────────────────────────────

describe('adapter-object', () => {
  afterEach(() => {
    vi.clearAllMocks()
  })

  it('builds the endpoint from host, port and TLS setting', () => {
    expect(objectStoreEndpoint(config)).toBe('http://localhost:9000')
    expect(objectStoreEndpoint({ ...config, useSSL: true })).toBe('https://localhost:443')
    expect(objectStoreEndpoint({ ...config, port: 9100 })).toBe('http://localhost:9100')
  })

  describe('connect', () => {
    it('creates the bucket when it is missing', async () => {
      respond({
        HeadBucket: () => {
          throw s3Error('NotFound')
        },
        CreateBucket: () => ({}),
      })
      await createObjectAdapter(config).connect()
      expect(sentNames()).toEqual(['HeadBucket', 'CreateBucket'])
    })

    it('leaves an existing bucket alone', async () => {
      respond({ HeadBucket: () => ({}) })
      await createObjectAdapter(config).connect()
      expect(sentNames()).toEqual(['HeadBucket'])
    })

    it('reports an unreachable server as ConnectionError', async () => {
      const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9000'), { code: 'ECONNREFUSED' })
      respond({
        HeadBucket: () => {
          throw refused
        },
      })

      const err = await createObjectAdapter(config)
        .connect()
        .catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ConnectionError)
      expect(err).toMatchObject({
        code: 'CONNECTION_FAILED',
        message: 'Object store unreachable at http://localhost:9000',
        cause: refused,
      })
    })
  })

  describe('execute', () => {
    it('put returns the key and size', async () => {
      respond({ PutObject: () => ({ ETag: '"abc"' }) })
      const bytes = new Uint8Array([1, 2, 3])

      const result = await createObjectAdapter(config).execute(
        { paradigm: 'object', kind: 'put', key: 'a.txt', bytes },
        context,
      )

      expect(result).toEqual({ key: 'a.txt', size: 3 })
      expect(mockSend).toHaveBeenCalledWith(
        { name: 'PutObject', input: { Bucket: 'uploads', Key: 'a.txt', Body: bytes, ContentLength: 3 } },
        { abortSignal: context.signal },
      )
    })

    it('get returns the stored bytes', async () => {
      respond({ GetObject: () => ({ Body: { transformToByteArray: async () => new Uint8Array([104, 105]) } }) })
      const result = await createObjectAdapter(config).execute({ paradigm: 'object', kind: 'get', key: 'a.txt' }, context)
      expect(result).toEqual(new Uint8Array([104, 105]))
    })

    it('get of a missing key is NotFound', async () => {
      respond({
        GetObject: () => {
          throw s3Error('NoSuchKey', 'The specified key does not exist.')
        },
      })
      const err = await createObjectAdapter(config)
        .execute({ paradigm: 'object', kind: 'get', key: 'a.txt' }, context)
        .catch((e: unknown) => e)

      expect(err).toBeInstanceOf(NotFoundError)
      expect(err).toMatchObject({
        message: 'Object not found: a.txt',
        details: { paradigm: 'object', resource: 'object', id: 'a.txt' },
      })
    })

    it('list follows continuation tokens', async () => {
      respond({
        ListObjectsV2: (input) =>
          input.ContinuationToken === undefined
            ? { Contents: [{ Key: 'docs/b.txt' }, { Key: 'docs/a.txt' }], IsTruncated: true, NextContinuationToken: 't1' }
            : { Contents: [{ Key: 'docs/c.txt' }], IsTruncated: false },
      })

      const result = await createObjectAdapter(config).execute(
        { paradigm: 'object', kind: 'list', prefix: 'docs/' },
        context,
      )

      expect(result).toEqual(['docs/a.txt', 'docs/b.txt', 'docs/c.txt'])
      expect(mockSend).toHaveBeenCalledTimes(2)
      expect(mockSend.mock.calls[1]?.[0]).toEqual({
        name: 'ListObjectsV2',
        input: { Bucket: 'uploads', Prefix: 'docs/', ContinuationToken: 't1' },
      })
    })

    it('delete of a missing key is NotFound and deletes nothing', async () => {
      respond({
        HeadObject: () => {
          throw s3Error('NotFound')
        },
      })
      await expect(
        createObjectAdapter(config).execute({ paradigm: 'object', kind: 'delete', key: 'gone.txt' }, context),
      ).rejects.toBeInstanceOf(NotFoundError)
      expect(sentNames()).toEqual(['HeadObject'])
    })

    it('delete of an existing key acknowledges', async () => {
      respond({ HeadObject: () => ({ ContentLength: 3 }), DeleteObject: () => ({}) })
      const result = await createObjectAdapter(config).execute(
        { paradigm: 'object', kind: 'delete', key: 'a.txt' },
        context,
      )
      expect(result).toBeUndefined()
      expect(sentNames()).toEqual(['HeadObject', 'DeleteObject'])
    })

    it('stat reports size, modification time and etag', async () => {
      respond({
        HeadObject: () => ({ ContentLength: 42, LastModified: new Date('2024-05-01T10:00:00Z'), ETag: '"9f2c"' }),
      })
      const result = await createObjectAdapter(config).execute({ paradigm: 'object', kind: 'stat', key: 'a.txt' }, context)
      expect(result).toEqual({ key: 'a.txt', size: 42, lastModified: '2024-05-01T10:00:00.000Z', etag: '9f2c' })
    })

    it('wraps other backend failures with their cause', async () => {
      const internal = s3Error('InternalError', 'We encountered an internal error')
      respond({
        PutObject: () => {
          throw internal
        },
      })
      const err = await createObjectAdapter(config)
        .execute({ paradigm: 'object', kind: 'put', key: 'a.txt', bytes: new Uint8Array([1]) }, context)
        .catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ExecutionError)
      expect(err).toMatchObject({ code: 'QUERY_FAILED', cause: internal })
    })
  })

  describe('against an in-memory bucket', () => {
    it('returns exactly the bytes it stored', async () => {
      bucketStandIn()
      const adapter = createObjectAdapter(config)
      await adapter.connect()
      const bytes = new Uint8Array([0, 255, 10, 13, 37])

      await adapter.execute({ paradigm: 'object', kind: 'put', key: 'docs/blob.bin', bytes }, context)
      const read = await adapter.execute({ paradigm: 'object', kind: 'get', key: 'docs/blob.bin' }, context)
      const keys = await adapter.execute({ paradigm: 'object', kind: 'list', prefix: 'docs/' }, context)

      expect(read).toEqual(bytes)
      expect(keys).toEqual(['docs/blob.bin'])
    })

    it('overwrites on put and forgets on delete', async () => {
      const objects = bucketStandIn()
      const adapter = createObjectAdapter(config)
      const put = (bytes: Uint8Array) =>
        adapter.execute({ paradigm: 'object', kind: 'put', key: 'a.txt', bytes }, context)

      await put(new Uint8Array([1]))
      await put(new Uint8Array([2, 3]))
      expect(await adapter.execute({ paradigm: 'object', kind: 'get', key: 'a.txt' }, context)).toEqual(
        new Uint8Array([2, 3]),
      )

      await adapter.execute({ paradigm: 'object', kind: 'delete', key: 'a.txt' }, context)
      expect(objects.size).toBe(0)
      await expect(
        adapter.execute({ paradigm: 'object', kind: 'get', key: 'a.txt' }, context),
      ).rejects.toBeInstanceOf(NotFoundError)
    })

    it('answers put and a missing get through the gateway envelope', async () => {
      bucketStandIn()
      const gateway = await createGateway({
        adapters: { object: () => createObjectAdapter(config) },
        logger: createConsoleLogger('silent'),
      })
      const report = new TextEncoder().encode('%PDF-1.7 quarterly report')

      const stored = await gateway.route({
        paradigm: 'object',
        kind: 'put',
        parameters: { key: 'report.pdf', bytes: report },
      })
      const missing = await gateway.route({ paradigm: 'object', kind: 'get', parameters: { key: 'missing.pdf' } })
      const fetched = await gateway.route({ paradigm: 'object', kind: 'get', parameters: { key: 'report.pdf' } })
      await gateway.shutdown()

      expect(stored).toMatchObject({ ok: true, data: { key: 'report.pdf', size: report.byteLength }, error: null })
      expect(missing).toMatchObject({
        ok: false,
        data: null,
        error: { category: 'NotFound', message: 'Object not found: missing.pdf', retryable: false },
      })
      expect(fetched).toMatchObject({ ok: true, data: report })
      expect(mockDestroy).toHaveBeenCalledTimes(1)
    })
  })

  it('disconnect releases the client', async () => {
    await createObjectAdapter(config).disconnect()
    expect(mockDestroy).toHaveBeenCalledTimes(1)
  })
})
