import type { AdapterFactories, ExecutionContext, Paradigm } from '@polystore/gateway'
import { createConsoleLogger } from '@polystore/gateway'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { createAdapterFactories } from '../src/adapters.js'
import { loadGatewayConfig } from '../src/config.js'
import type { PolystoreServer } from '../src/server.js'
import { createServer } from '../src/server.js'

// ── Fakes ──────────────────────────────────────────────────────

type ExecuteFn = (command: { readonly kind: string }, context: ExecutionContext) => Promise<unknown>

function fakeAdapter<P extends Paradigm>(paradigm: P, execute: ExecuteFn) {
  return {
    paradigm,
    concurrency: 'concurrent' as const,
    connect: vi.fn(async () => {}),
    disconnect: vi.fn(async () => {}),
    healthCheck: vi.fn(async () => {}),
    execute: vi.fn<ExecuteFn>(execute),
  }
}

const silent = createConsoleLogger('silent')
let server: PolystoreServer | undefined

async function start(adapters: AdapterFactories): Promise<PolystoreServer> {
  server = await createServer({ port: 0, host: '127.0.0.1', gatewayOptions: { adapters, logger: silent } })
  await server.start()
  return server
}

async function post(path: string, body: unknown): Promise<{ status: number; body: unknown }> {
  const res = await fetch(`${server?.url}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  })
  return { status: res.status, body: await res.json() }
}

async function get(path: string): Promise<{ status: number; body: unknown }> {
  const res = await fetch(`${server?.url}${path}`)
  return { status: res.status, body: await res.json() }
}

async function del(path: string): Promise<{ status: number; body: unknown }> {
  const res = await fetch(`${server?.url}${path}`, { method: 'DELETE' })
  return { status: res.status, body: await res.json() }
}

afterEach(async () => {
  await server?.stop()
  server = undefined
})

// ── /route ─────────────────────────────────────────────────────

describe('POST /route', () => {
  it('decodes base64 bytes for an object put', async () => {
    const object = fakeAdapter('object', async () => ({ key: 'a.txt', size: 2 }))
    await start({ object: () => object })

    const res = await post('/route', { paradigm: 'object', kind: 'put', parameters: { key: 'a.txt', bytes: 'aGk=' } })

    expect(res.status).toBe(200)
    expect(res.body).toMatchObject({ ok: true, data: { key: 'a.txt', size: 2 }, error: null })
    expect(object.execute.mock.calls[0]?.[0]).toEqual({
      paradigm: 'object',
      kind: 'put',
      key: 'a.txt',
      bytes: new Uint8Array([104, 105]),
    })
  })

  it('returns object bodies as base64', async () => {
    await start({ object: () => fakeAdapter('object', async () => new Uint8Array([104, 105])) })

    const res = await post('/route', { paradigm: 'object', kind: 'get', parameters: { key: 'a.txt' } })

    expect(res.body).toMatchObject({ ok: true, data: { key: 'a.txt', base64: 'aGk=', size: 2 } })
  })

  it('answers invalid operations with a failure envelope', async () => {
    await start({ object: () => fakeAdapter('object', async () => null) })

    const res = await post('/route', { paradigm: 'object', kind: 'rename', parameters: {} })

    expect(res.status).toBe(200)
    expect(res.body).toMatchObject({ ok: false, data: null, error: { category: 'InvalidInput', retryable: false } })
  })

  it('rejects malformed JSON with 400', async () => {
    await start({})

    const res = await post('/route', '{"paradigm": ')

    expect(res.status).toBe(400)
    expect(res.body).toMatchObject({
      code: 'VALIDATION_FAILED',
      message: 'Validation failed: Request body must be valid JSON',
    })
  })

  it('reports unconfigured stores as BackendUnavailable', async () => {
    await start(createAdapterFactories(loadGatewayConfig({})))

    const res = await post('/route', { paradigm: 'object', kind: 'list' })

    expect(res.body).toMatchObject({
      ok: false,
      error: {
        category: 'BackendUnavailable',
        retryable: true,
        message: 'The object store is not configured; set MINIO_ENDPOINT, MINIO_ACCESS_KEY, MINIO_SECRET_KEY, MINIO_BUCKET_NAME',
      },
    })
  })
})

// ── /health and /benchmarks ────────────────────────────────────

describe('GET /health and /benchmarks', () => {
  it('connects registered stores and reports them ready', async () => {
    await start({ object: () => fakeAdapter('object', async () => []) })

    const res = await get('/health')

    expect(res.status).toBe(200)
    expect(res.body).toMatchObject({ healthy: true, adapters: { object: { paradigm: 'object', state: 'ready' } } })
  })

  it('summarises routed calls', async () => {
    await start({ object: () => fakeAdapter('object', async () => ['a.txt']) })
    await post('/route', { paradigm: 'object', kind: 'list' })

    const res = await get('/benchmarks')

    expect(res.body).toMatchObject({ summary: { 'object.list': { count: 1, failures: 0 } } })
  })

  it('narrows benchmarks to one paradigm', async () => {
    await start({
      object: () => fakeAdapter('object', async () => ['a.txt']),
      graph: () => fakeAdapter('graph', async () => undefined),
    })
    await post('/route', { paradigm: 'object', kind: 'list' })
    await post('/route', { paradigm: 'graph', kind: 'clear' })

    const res = await get('/benchmarks?paradigm=graph')

    expect(res.status).toBe(200)
    expect(res.body).toMatchObject({ summary: { 'graph.clear': { count: 1 } }, recent: [{ paradigm: 'graph' }] })
    expect(res.body).not.toHaveProperty(['summary', 'object.list'])
  })

  it('rejects an unknown benchmark paradigm with 400', async () => {
    await start({})

    const res = await get('/benchmarks?paradigm=document')

    expect(res.status).toBe(400)
    expect(res.body).toMatchObject({
      code: 'VALIDATION_FAILED',
      message: "Validation failed: Unknown paradigm 'document'",
    })
  })

  it('clears benchmarks on DELETE', async () => {
    await start({ object: () => fakeAdapter('object', async () => ['a.txt']) })
    await post('/route', { paradigm: 'object', kind: 'list' })

    const cleared = await del('/benchmarks')
    const after = await get('/benchmarks')

    expect(cleared).toEqual({ status: 200, body: { reset: true } })
    expect(after.body).toEqual({ summary: {}, recent: [] })
  })

  it('answers unknown paths with 404', async () => {
    await start({})

    const res = await get('/nope')

    expect(res).toEqual({ status: 404, body: { code: 'NOT_FOUND', message: 'GET /nope not found' } })
  })
})

// ── E-commerce scenario ────────────────────────────────────────

describe('e-commerce scenario', () => {
  const product = {
    productId: 'prod_001',
    name: 'Wireless Headphones',
    description: 'Noise cancelling headphones',
    category: 'Audio',
    price: 199.99,
    embedding: [0.1, 0.2, 0.3],
  }

  it('stores the image and indexes the description', async () => {
    const object = fakeAdapter('object', async () => ({ key: 'products/prod_001.jpg', size: 2 }))
    const vector = fakeAdapter('vector', async () => ({ acknowledged: true }))
    await start({ object: () => object, vector: () => vector })

    const res = await post('/scenarios/ecommerce/products', { ...product, image: 'aGk=' })

    expect(res.body).toMatchObject({
      ok: true,
      productId: 'prod_001',
      image: { ok: true, data: { key: 'products/prod_001.jpg', size: 2 } },
      description: { ok: true },
    })
    expect(vector.execute.mock.calls[0]?.[0]).toEqual({
      paradigm: 'vector',
      kind: 'index',
      id: 'prod_001',
      embedding: [0.1, 0.2, 0.3],
      metadata: { name: 'Wireless Headphones', category: 'Audio', price: 199.99 },
      text: 'Wireless Headphones. Noise cancelling headphones',
    })
  })

  it('skips the object store without an image', async () => {
    const object = fakeAdapter('object', async () => null)
    await start({ object: () => object, vector: () => fakeAdapter('vector', async () => ({ acknowledged: true })) })

    const res = await post('/scenarios/ecommerce/products', product)

    expect(res.body).toMatchObject({ ok: true, image: null })
    expect(object.execute).not.toHaveBeenCalled()
  })

  it('rejects a product without a price', async () => {
    await start({})

    const res = await post('/scenarios/ecommerce/products', { ...product, price: undefined })

    expect(res.status).toBe(400)
    expect(res.body).toMatchObject({ message: "Validation failed: Parameter 'price' must be a non-negative number" })
  })

  it('ranks similar products', async () => {
    const vector = fakeAdapter('vector', async () => [
      { id: 'prod_001', score: 0.91234, metadata: { name: 'Wireless Headphones', category: 'Audio', price: 199.99 } },
      { id: 'prod_009', score: 0.5, metadata: {} },
    ])
    await start({ vector: () => vector })

    const res = await post('/scenarios/ecommerce/similar', { embedding: [0.1, 0.2, 0.3], topK: 2 })

    expect(res.body).toMatchObject({
      ok: true,
      data: {
        products: [
          { rank: 1, productId: 'prod_001', name: 'Wireless Headphones', category: 'Audio', price: 199.99, similarityScore: 0.912 },
          { rank: 2, productId: 'prod_009', name: 'Unknown', category: 'Unknown', price: 0, similarityScore: 0.5 },
        ],
      },
    })
    expect(vector.execute.mock.calls[0]?.[0]).toEqual({
      paradigm: 'vector',
      kind: 'query',
      input: { embedding: [0.1, 0.2, 0.3] },
      topK: 2,
      filter: undefined,
    })
  })

  it('creates and seeds the sales table', async () => {
    const columnar = fakeAdapter('columnar', async () => undefined)
    await start({ columnar: () => columnar })

    const res = await post('/scenarios/ecommerce/initialize', {})

    expect(res.body).toMatchObject({ ok: true, table: { ok: true }, seed: { ok: true } })
    const [createTable, bulkInsert] = columnar.execute.mock.calls.map((call) => call[0])
    expect(createTable).toMatchObject({
      kind: 'createTable',
      schema: { table: 'sales', orderBy: ['order_date', 'order_id'] },
      ifNotExists: true,
    })
    expect(bulkInsert).toMatchObject({ kind: 'bulkInsert', table: 'sales' })
    expect(bulkInsert).toHaveProperty(['rows', 'length'], 8)
    expect(bulkInsert).toHaveProperty(['rows', 0], {
      order_id: 1,
      product_name: 'Laptop',
      category: 'Electronics',
      quantity: 2,
      price: 1200,
      order_date: '2024-01-15',
      region: 'North',
    })
  })

  it('records a sale as one row', async () => {
    const columnar = fakeAdapter('columnar', async () => undefined)
    await start({ columnar: () => columnar })

    const res = await post('/scenarios/ecommerce/sales', {
      orderId: 9,
      productName: 'Wireless Headphones',
      category: 'Electronics',
      quantity: 2,
      price: 199.99,
      region: 'North',
      orderDate: '2024-02-01',
    })

    expect(res.body).toMatchObject({ ok: true, paradigm: 'columnar', kind: 'bulkInsert' })
    expect(columnar.execute.mock.calls[0]?.[0]).toEqual({
      paradigm: 'columnar',
      kind: 'bulkInsert',
      table: 'sales',
      rows: [
        {
          order_id: 9,
          product_name: 'Wireless Headphones',
          category: 'Electronics',
          quantity: 2,
          price: 199.99,
          order_date: '2024-02-01',
          region: 'North',
        },
      ],
    })
  })

  it('rejects a sale with a fractional quantity', async () => {
    await start({})

    const res = await post('/scenarios/ecommerce/sales', {
      orderId: 9,
      productName: 'Desk',
      category: 'Furniture',
      quantity: 1.5,
      price: 450,
      region: 'East',
    })

    expect(res.status).toBe(400)
    expect(res.body).toMatchObject({ message: "Validation failed: Parameter 'quantity' must be a non-negative integer" })
  })

  it('runs the three sales analytics queries', async () => {
    const columnar = fakeAdapter('columnar', async () => ({ columns: [], values: [], rowCount: 0, trusted: true }))
    await start({ columnar: () => columnar })

    const res = await get('/scenarios/ecommerce/analytics')

    expect(res.status).toBe(200)
    const commands = columnar.execute.mock.calls.map((call) => call[0])
    expect(commands).toHaveLength(3)
    for (const named of ['total-by-category', 'total-by-region', 'top-products']) {
      expect(commands).toContainEqual({ paradigm: 'columnar', kind: 'query', input: { named, params: {} } })
    }
    expect(res.body).toMatchObject({ byCategory: { ok: true }, byRegion: { ok: true }, topProducts: { ok: true } })
  })
})
