import type { BenchmarkReport, GatewayRequest, HealthCheckResult, Paradigm, ResultEnvelope } from '@polystore/validation'
import { ConnectionError, encodeBytes, GatewayError, isPlainRecord } from '@polystore/validation'

import { deserializeError } from './errors.js'
import { isBenchmarkReport, isHealthCheckResult, isResetAck, isResultEnvelope } from './guards.js'

// ── Types ──────────────────────────────────────────────────────

export interface PolystoreClientConfig {
  readonly baseUrl: string
  readonly headers?: Record<string, string> | undefined
  readonly fetch?: typeof globalThis.fetch | undefined
  readonly timeout?: number | undefined
}

export interface PolystoreClient {
  /** Resolves with the envelope whatever its outcome; rejects only on transport failures. */
  route(request: GatewayRequest): Promise<ResultEnvelope>
  health(): Promise<HealthCheckResult>
  benchmarks(paradigm?: Paradigm): Promise<BenchmarkReport>
  resetBenchmarks(): Promise<void>
}

/** Replaces byte values with base64 strings so the request survives JSON encoding. */
export function encodeRequest(request: GatewayRequest): GatewayRequest {
  if (request.parameters === undefined) return request
  const parameters: Record<string, unknown> = {}
  for (const [name, value] of Object.entries(request.parameters)) {
    parameters[name] = value instanceof Uint8Array ? encodeBytes(value) : value
  }
  return { ...request, parameters }
}

// ── Factory ────────────────────────────────────────────────────

export function createPolystoreClient(config: PolystoreClientConfig): PolystoreClient {
  const { baseUrl, timeout = 30_000 } = config
  const customHeaders = config.headers ?? {}
  const fetchFn = config.fetch ?? globalThis.fetch

  async function send<T>(
    path: string,
    init: { method: 'GET' | 'POST' | 'DELETE'; body?: string },
    accept: (body: unknown) => body is T,
  ): Promise<T> {
    const controller = new AbortController()
    const timer = timeout > 0 ? setTimeout(() => controller.abort(), timeout) : undefined

    try {
      const res = await fetchFn(`${baseUrl}${path}`, {
        method: init.method,
        headers: init.body === undefined ? customHeaders : { 'Content-Type': 'application/json', ...customHeaders },
        body: init.body,
        signal: controller.signal,
      })

      const body: unknown = await res.json()

      if (!res.ok) {
        throw deserializeError(isPlainRecord(body) ? body : {})
      }
      if (!accept(body)) {
        throw new GatewayError('INVALID_RESPONSE', `Unexpected response body from ${path}`)
      }
      return body
    } catch (err) {
      if (err instanceof GatewayError) throw err
      if (err instanceof Error && err.name === 'AbortError') {
        throw new ConnectionError('REQUEST_TIMEOUT', `Request timed out after ${timeout}ms`, {
          url: baseUrl,
          timeoutMs: timeout,
        })
      }
      const cause = err instanceof Error ? err : new Error(String(err))
      throw new ConnectionError('NETWORK_ERROR', cause.message, { url: baseUrl }, cause)
    } finally {
      if (timer !== undefined) clearTimeout(timer)
    }
  }

  return {
    async route(request) {
      return send('/route', { method: 'POST', body: JSON.stringify(encodeRequest(request)) }, isResultEnvelope)
    },

    async health() {
      return send('/health', { method: 'GET' }, isHealthCheckResult)
    },

    async benchmarks(paradigm) {
      const query = paradigm === undefined ? '' : `?paradigm=${encodeURIComponent(paradigm)}`
      return send(`/benchmarks${query}`, { method: 'GET' }, isBenchmarkReport)
    },

    async resetBenchmarks() {
      await send('/benchmarks', { method: 'DELETE' }, isResetAck)
    },
  }
}
