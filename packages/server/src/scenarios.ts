import { SALES_SCHEMA } from '@polystore/adapter-columnar'
import type { VectorMatch } from '@polystore/adapter-vector'
import type { Gateway, ResultEnvelope, ValidationErrorEntry } from '@polystore/gateway'
import { decodeBytes, isBase64, isMetadataValue, isPlainRecord, ValidationError } from '@polystore/gateway'

// E-commerce walkthrough: product images go to the object store, descriptions
// to the vector store, sales analytics come from the columnar store.

// ── Types ──────────────────────────────────────────────────────

export interface ProductInput {
  readonly productId: string
  readonly name: string
  readonly description: string
  readonly category: string
  readonly price: number
  readonly embedding: unknown
  readonly image?: Uint8Array | undefined
}

export interface AddProductResult {
  readonly ok: boolean
  readonly productId: string
  readonly image: ResultEnvelope | null
  readonly description: ResultEnvelope
}

export interface SimilarProduct {
  readonly rank: number
  readonly productId: string
  readonly name: string
  readonly category: string
  readonly price: number
  readonly similarityScore: number
}

export interface SaleInput {
  readonly orderId: number
  readonly productName: string
  readonly category: string
  readonly quantity: number
  readonly price: number
  readonly region: string
  /** `YYYY-MM-DD`; the current UTC date when absent. */
  readonly orderDate?: string | undefined
}

export interface InitializeResult {
  readonly ok: boolean
  readonly table: ResultEnvelope
  /** Null when the table could not be created. */
  readonly seed: ResultEnvelope | null
}

export interface SalesAnalytics {
  readonly byCategory: ResultEnvelope
  readonly byRegion: ResultEnvelope
  readonly topProducts: ResultEnvelope
}

// ── Body parsing ───────────────────────────────────────────────

function invalid(kind: string, entries: ValidationErrorEntry[]): ValidationError {
  return new ValidationError('scenario', kind, entries)
}

function requireString(body: Record<string, unknown>, name: string, entries: ValidationErrorEntry[]): string {
  const value = body[name]
  if (typeof value === 'string' && value.length > 0) return value
  entries.push({
    code: value === undefined ? 'MISSING_PARAMETER' : 'INVALID_PARAMETER',
    message: value === undefined ? `Missing required parameter '${name}'` : `Parameter '${name}' must be a non-empty string`,
    details: { parameter: name, expected: 'string' },
  })
  return ''
}

function requireNumber(
  body: Record<string, unknown>,
  name: string,
  entries: ValidationErrorEntry[],
  integer: boolean,
): number {
  const value = body[name]
  if (typeof value === 'number' && value >= 0 && (integer ? Number.isSafeInteger(value) : Number.isFinite(value))) {
    return value
  }
  const expected = integer ? 'non-negative integer' : 'non-negative number'
  entries.push({
    code: value === undefined ? 'MISSING_PARAMETER' : 'INVALID_PARAMETER',
    message: `Parameter '${name}' must be a ${expected}`,
    details: { parameter: name, expected },
  })
  return 0
}

export function parseProduct(body: unknown): ProductInput {
  if (!isPlainRecord(body)) {
    throw invalid('products', [
      { code: 'INVALID_PARAMETER', message: 'Request body must be an object', details: { expected: 'object' } },
    ])
  }
  const entries: ValidationErrorEntry[] = []
  const productId = requireString(body, 'productId', entries)
  const name = requireString(body, 'name', entries)
  const description = requireString(body, 'description', entries)
  const category = requireString(body, 'category', entries)

  const price = body.price
  if (typeof price !== 'number' || !Number.isFinite(price) || price < 0) {
    entries.push({
      code: price === undefined ? 'MISSING_PARAMETER' : 'INVALID_PARAMETER',
      message: `Parameter 'price' must be a non-negative number`,
      details: { parameter: 'price', expected: 'number' },
    })
  }

  let image: Uint8Array | undefined
  if (body.image !== undefined) {
    if (typeof body.image === 'string' && isBase64(body.image)) {
      image = decodeBytes(body.image)
    } else {
      entries.push({
        code: 'INVALID_PARAMETER',
        message: `Parameter 'image' must be a base64 string`,
        details: { parameter: 'image', expected: 'base64' },
      })
    }
  }

  if (entries.length > 0 || typeof price !== 'number') throw invalid('products', entries)
  return { productId, name, description, category, price, embedding: body.embedding, image }
}

export function parseSimilarQuery(body: unknown): Record<string, unknown> {
  if (!isPlainRecord(body)) {
    throw invalid('similar', [
      { code: 'INVALID_PARAMETER', message: 'Request body must be an object', details: { expected: 'object' } },
    ])
  }
  const parameters: Record<string, unknown> = { topK: body.topK ?? 3 }
  if (body.embedding !== undefined) parameters.embedding = body.embedding
  if (body.text !== undefined) parameters.text = body.text
  if (body.category !== undefined) parameters.filter = { category: body.category }
  return parameters
}

export function parseSale(body: unknown): SaleInput {
  if (!isPlainRecord(body)) {
    throw invalid('sales', [
      { code: 'INVALID_PARAMETER', message: 'Request body must be an object', details: { expected: 'object' } },
    ])
  }
  const entries: ValidationErrorEntry[] = []
  const sale: SaleInput = {
    orderId: requireNumber(body, 'orderId', entries, true),
    productName: requireString(body, 'productName', entries),
    category: requireString(body, 'category', entries),
    quantity: requireNumber(body, 'quantity', entries, true),
    price: requireNumber(body, 'price', entries, false),
    region: requireString(body, 'region', entries),
    orderDate: typeof body.orderDate === 'string' ? body.orderDate : undefined,
  }
  if (body.orderDate !== undefined && typeof body.orderDate !== 'string') {
    entries.push({
      code: 'INVALID_PARAMETER',
      message: `Parameter 'orderDate' must be a YYYY-MM-DD string`,
      details: { parameter: 'orderDate', expected: 'date' },
    })
  }
  if (entries.length > 0) throw invalid('sales', entries)
  return sale
}

// ── Sample data ────────────────────────────────────────────────

// product, category, quantity, price, order date, region
const SAMPLE_ORDERS: readonly (readonly [string, string, number, number, string, string])[] = [
  ['Laptop', 'Electronics', 2, 1200, '2024-01-15', 'North'],
  ['Mouse', 'Electronics', 5, 25, '2024-01-16', 'South'],
  ['Desk', 'Furniture', 1, 450, '2024-01-17', 'East'],
  ['Chair', 'Furniture', 4, 150, '2024-01-18', 'West'],
  ['Monitor', 'Electronics', 3, 300, '2024-01-19', 'North'],
  ['Keyboard', 'Electronics', 10, 75, '2024-01-20', 'South'],
  ['Bookshelf', 'Furniture', 2, 200, '2024-01-21', 'East'],
  ['Laptop', 'Electronics', 1, 1200, '2024-01-22', 'West'],
]

/** Sales rows in `SALES_SCHEMA` column names, numbered from order 1. */
export const SAMPLE_SALES: readonly Readonly<Record<string, unknown>>[] = SAMPLE_ORDERS.map(
  ([productName, category, quantity, price, orderDate, region], i) => ({
    order_id: i + 1,
    product_name: productName,
    category,
    quantity,
    price,
    order_date: orderDate,
    region,
  }),
)

function utcToday(): string {
  return new Date().toISOString().slice(0, 10)
}

// ── Results ────────────────────────────────────────────────────

function isVectorMatch(value: unknown): value is VectorMatch {
  return (
    isPlainRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.score === 'number' &&
    isPlainRecord(value.metadata) &&
    Object.values(value.metadata).every((entry) => isMetadataValue(entry))
  )
}

export function toSimilarProducts(matches: readonly VectorMatch[]): SimilarProduct[] {
  return matches.map((match, i) => {
    const { name, category, price } = match.metadata
    return {
      rank: i + 1,
      productId: match.id,
      name: typeof name === 'string' ? name : 'Unknown',
      category: typeof category === 'string' ? category : 'Unknown',
      price: typeof price === 'number' ? price : 0,
      similarityScore: Math.round(match.score * 1000) / 1000,
    }
  })
}

// ── Scenario ───────────────────────────────────────────────────

export interface EcommerceScenario {
  /** Creates the sales table when missing and seeds it with the sample orders. */
  initialize(): Promise<InitializeResult>
  recordSale(input: SaleInput): Promise<ResultEnvelope>
  addProduct(input: ProductInput): Promise<AddProductResult>
  findSimilar(parameters: Readonly<Record<string, unknown>>): Promise<ResultEnvelope<{ products: SimilarProduct[] }>>
  analytics(): Promise<SalesAnalytics>
}

export function createEcommerceScenario(gateway: Gateway, today: () => string = utcToday): EcommerceScenario {
  const insertSales = (rows: readonly Readonly<Record<string, unknown>>[]) =>
    gateway.route({ paradigm: 'columnar', kind: 'bulkInsert', parameters: { table: SALES_SCHEMA.table, rows } })

  return {
    async initialize() {
      const table = await gateway.route({
        paradigm: 'columnar',
        kind: 'createTable',
        parameters: {
          table: SALES_SCHEMA.table,
          columns: SALES_SCHEMA.columns,
          orderBy: SALES_SCHEMA.orderBy,
          ifNotExists: true,
        },
      })
      if (!table.ok) return { ok: false, table, seed: null }
      const seed = await insertSales(SAMPLE_SALES)
      return { ok: seed.ok, table, seed }
    },

    recordSale(input) {
      return insertSales([
        {
          order_id: input.orderId,
          product_name: input.productName,
          category: input.category,
          quantity: input.quantity,
          price: input.price,
          order_date: input.orderDate ?? today(),
          region: input.region,
        },
      ])
    },

    async addProduct(input) {
      const image =
        input.image === undefined
          ? null
          : await gateway.route({
              paradigm: 'object',
              kind: 'put',
              parameters: { key: `products/${input.productId}.jpg`, bytes: input.image },
            })
      const description = await gateway.route({
        paradigm: 'vector',
        kind: 'index',
        parameters: {
          id: input.productId,
          embedding: input.embedding,
          text: `${input.name}. ${input.description}`,
          metadata: { name: input.name, category: input.category, price: input.price },
        },
      })
      return { ok: (image === null || image.ok) && description.ok, productId: input.productId, image, description }
    },

    async findSimilar(parameters) {
      const envelope = await gateway.route({ paradigm: 'vector', kind: 'query', parameters })
      if (!envelope.ok) return envelope
      const matches = Array.isArray(envelope.data) ? envelope.data.filter(isVectorMatch) : []
      return { ...envelope, data: { products: toSimilarProducts(matches) } }
    },

    async analytics() {
      const named = (name: string) =>
        gateway.route({ paradigm: 'columnar', kind: 'query', parameters: { named: name, params: {} } })
      const [byCategory, byRegion, topProducts] = await Promise.all([
        named('total-by-category'),
        named('total-by-region'),
        named('top-products'),
      ])
      return { byCategory, byRegion, topProducts }
    },
  }
}
