import { createServer as createHttpServer, type IncomingMessage, type ServerResponse } from 'node:http'
import type {
  CreateGatewayOptions,
  Gateway,
  GatewayLogger,
  GatewayRequest,
  Paradigm,
  ResultEnvelope,
} from '@polystore/gateway'
import {
  ConfigError,
  ConnectionError,
  createConsoleLogger,
  createGateway,
  decodeBytes,
  encodeBytes,
  GatewayError,
  isBase64,
  isParadigm,
  isPlainRecord,
  PARADIGMS,
  serializeError,
  ValidationError,
} from '@polystore/gateway'
import { createEcommerceScenario, parseProduct, parseSale, parseSimilarQuery } from './scenarios.js'

// ── Types ──────────────────────────────────────────────────────

export interface ServerConfig {
  readonly port?: number | undefined
  readonly host?: string | undefined
  readonly gatewayOptions: CreateGatewayOptions
}

export interface PolystoreServer {
  readonly gateway: Gateway
  url: string
  start(): Promise<void>
  stop(): Promise<void>
}

class HttpError extends Error {
  readonly status: number
  readonly code: string
  constructor(status: number, code: string, message: string) {
    super(message)
    this.name = 'HttpError'
    this.status = status
    this.code = code
  }
}

// ── Error mapping ──────────────────────────────────────────────

function errorToStatus(err: unknown): number {
  if (err instanceof HttpError) return err.status
  if (err instanceof ValidationError || err instanceof ConfigError) return 400
  if (err instanceof ConnectionError) return 503
  return 500
}

function errorToBody(err: unknown): object {
  if (err instanceof HttpError) return { code: err.code, message: err.message }
  if (err instanceof GatewayError) return err.toJSON()
  const msg = err instanceof Error ? err.message : String(err)
  return { code: 'INTERNAL_ERROR', message: msg }
}

function invalidBody(message: string): ValidationError {
  return new ValidationError('unknown', 'unknown', [
    { code: 'INVALID_PARAMETER', message, details: { expected: 'object' } },
  ])
}

/** Reads the optional `paradigm` filter of a benchmarks query. */
export function benchmarkFilter(search: URLSearchParams): Paradigm | undefined {
  const paradigm = search.get('paradigm')
  if (paradigm === null || paradigm === '') return undefined
  if (isParadigm(paradigm)) return paradigm
  throw new ValidationError('benchmarks', 'filter', [
    {
      code: 'UNKNOWN_PARADIGM',
      message: `Unknown paradigm '${paradigm}'`,
      details: { parameter: 'paradigm', expected: PARADIGMS.join(' | '), actual: paradigm },
    },
  ])
}

// ── Helpers ────────────────────────────────────────────────────

function readBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    req.on('data', (chunk: Buffer) => chunks.push(chunk))
    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString('utf-8')
      try {
        resolve(raw.length > 0 ? JSON.parse(raw) : undefined)
      } catch {
        reject(invalidBody('Request body must be valid JSON'))
      }
    })
    req.on('error', reject)
  })
}

function respond(res: ServerResponse, status: number, body: unknown): void {
  const json = JSON.stringify(body)
  res.writeHead(status, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(json) })
  res.end(json)
}

/** Builds a gateway request from a JSON body; `bytes` of an object put arrive as base64. */
export function toGatewayRequest(body: unknown): GatewayRequest {
  if (!isPlainRecord(body)) throw invalidBody('Request body must be an object')
  const { paradigm, kind, parameters, debug, timeoutMs } = body
  if (parameters !== undefined && !isPlainRecord(parameters)) throw invalidBody('parameters must be an object')

  let decoded = parameters
  if (
    paradigm === 'object' &&
    kind === 'put' &&
    decoded !== undefined &&
    typeof decoded.bytes === 'string' &&
    isBase64(decoded.bytes)
  ) {
    decoded = { ...decoded, bytes: decodeBytes(decoded.bytes) }
  }

  return {
    paradigm: typeof paradigm === 'string' ? paradigm : String(paradigm),
    kind: typeof kind === 'string' ? kind : String(kind),
    parameters: decoded,
    debug: typeof debug === 'boolean' ? debug : undefined,
    timeoutMs: typeof timeoutMs === 'number' ? timeoutMs : undefined,
  }
}

/** Object bodies leave as `{key, base64, size}` so they survive JSON. */
export function toWireEnvelope(request: GatewayRequest, envelope: ResultEnvelope): ResultEnvelope {
  if (!envelope.ok || !(envelope.data instanceof Uint8Array)) return envelope
  const key = request.parameters?.key
  return {
    ...envelope,
    data: { key: typeof key === 'string' ? key : '', base64: encodeBytes(envelope.data), size: envelope.data.byteLength },
  }
}

// ── Server factory ─────────────────────────────────────────────

export async function createServer(config: ServerConfig): Promise<PolystoreServer> {
  const port = config.port ?? 3000
  const host = config.host ?? '0.0.0.0'
  const logger: GatewayLogger = config.gatewayOptions.logger ?? createConsoleLogger()

  const gateway = await createGateway({ ...config.gatewayOptions, logger })
  const ecommerce = createEcommerceScenario(gateway)

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET'
    const { pathname: url, searchParams } = new URL(req.url ?? '/', 'http://localhost')

    try {
      if (method === 'GET' && url === '/health') {
        respond(res, 200, await gateway.healthCheck())
      } else if (method === 'GET' && url === '/benchmarks') {
        respond(res, 200, gateway.benchmarks(benchmarkFilter(searchParams)))
      } else if (method === 'DELETE' && url === '/benchmarks') {
        gateway.resetBenchmarks()
        respond(res, 200, { reset: true })
      } else if (method === 'POST' && url === '/route') {
        const request = toGatewayRequest(await readBody(req))
        respond(res, 200, toWireEnvelope(request, await gateway.route(request)))
      } else if (method === 'POST' && url === '/scenarios/ecommerce/initialize') {
        respond(res, 200, await ecommerce.initialize())
      } else if (method === 'POST' && url === '/scenarios/ecommerce/sales') {
        respond(res, 200, await ecommerce.recordSale(parseSale(await readBody(req))))
      } else if (method === 'POST' && url === '/scenarios/ecommerce/products') {
        respond(res, 200, await ecommerce.addProduct(parseProduct(await readBody(req))))
      } else if (method === 'POST' && url === '/scenarios/ecommerce/similar') {
        respond(res, 200, await ecommerce.findSimilar(parseSimilarQuery(await readBody(req))))
      } else if (method === 'GET' && url === '/scenarios/ecommerce/analytics') {
        respond(res, 200, await ecommerce.analytics())
      } else {
        throw new HttpError(404, 'NOT_FOUND', `${method} ${url} not found`)
      }
    } catch (err) {
      const status = errorToStatus(err)
      if (status >= 500) logger.error('Request failed', { method, url, error: serializeError(err) })
      respond(res, status, errorToBody(err))
    }
  }

  const server = createHttpServer((req: IncomingMessage, res: ServerResponse) => {
    handleRequest(req, res).catch((err: unknown) => {
      logger.error('Unhandled request failure', { error: serializeError(err) })
      if (!res.headersSent) {
        respond(res, 500, { code: 'INTERNAL_ERROR', message: err instanceof Error ? err.message : String(err) })
      }
    })
  })

  const displayHost = host === '0.0.0.0' ? 'localhost' : host

  const result: PolystoreServer = {
    gateway,
    url: `http://${displayHost}:${port}`,
    start() {
      return new Promise<void>((resolve, reject) => {
        server.on('error', reject)
        server.listen(port, host, () => {
          const addr = server.address()
          if (addr && typeof addr === 'object') {
            result.url = `http://${displayHost}:${addr.port}`
          }
          resolve()
        })
      })
    },
    async stop() {
      const report = await gateway.shutdown()
      logger.info('Gateway shut down', { report })
      return new Promise<void>((resolve, reject) => {
        server.close((err: Error | undefined) => (err ? reject(err) : resolve()))
      })
    },
  }

  return result
}
