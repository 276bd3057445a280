import type {
  ErrorCategory,
  ErrorInfo,
  FailureEnvelope,
  Paradigm,
  ResultEnvelope,
  SuccessEnvelope,
} from '@polystore/validation'
import { ACK, GatewayError, isParadigm, serializeError } from '@polystore/validation'
import type { GatewayLogger } from '../debug/logger.js'
import type { ErrorMappingTable } from './mappings.js'
import { DEFAULT_ERROR_TABLES, extractSignals, matchRule, NETWORK_ERROR_TABLE } from './mappings.js'

// ── Types ──────────────────────────────────────────────────────

export type AdapterOutcome = { ok: true; value: unknown } | { ok: false; error: unknown }

export interface NormalizerOptions {
  readonly logger: GatewayLogger
  /** Per-paradigm overrides, consulted before the default tables. */
  readonly tables?: Readonly<Partial<Record<Paradigm, ErrorMappingTable>>> | undefined
  readonly maxMessageLength?: number | undefined
}

const DEFAULT_MAX_MESSAGE_LENGTH = 200

// Gateway error codes have a fixed category; QUERY_FAILED is resolved through the tables.
const CODE_CATEGORIES: Readonly<Record<string, { category: ErrorCategory; retryable: boolean }>> = {
  VALIDATION_FAILED: { category: 'InvalidInput', retryable: false },
  NOT_FOUND: { category: 'NotFound', retryable: false },
  CONFLICT: { category: 'Conflict', retryable: false },
  CONFIG_INVALID: { category: 'BackendUnavailable', retryable: false },
  CONNECTION_FAILED: { category: 'BackendUnavailable', retryable: true },
  NOT_CONFIGURED: { category: 'BackendUnavailable', retryable: true },
  ADAPTER_DEGRADED: { category: 'BackendUnavailable', retryable: true },
  ADAPTER_CLOSED: { category: 'BackendUnavailable', retryable: true },
  NETWORK_ERROR: { category: 'BackendUnavailable', retryable: true },
  REQUEST_TIMEOUT: { category: 'Timeout', retryable: true },
  OPERATION_TIMEOUT: { category: 'Timeout', retryable: true },
  OPERATION_CANCELLED: { category: 'Timeout', retryable: true },
}

// ── Sanitizing ─────────────────────────────────────────────────

/**
 * Strips credentials and control characters from backend text and caps its length.
 */
export function sanitizeMessage(message: string, maxLength: number = DEFAULT_MAX_MESSAGE_LENGTH): string {
  const cleaned = message
    .replace(/([a-z][a-z0-9+.-]*:\/\/)[^\s/@]+@/gi, '$1***@')
    .replace(/\b(password|passwd|secret|token|access[_-]?key|secret[_-]?key)=\S+/gi, '$1=***')
    .replace(/[\u0000-\u001f\u007f]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
  if (cleaned.length <= maxLength) return cleaned
  return `${cleaned.slice(0, maxLength - 1)}…`
}

// ── Normalizer ─────────────────────────────────────────────────

export class ResponseNormalizer {
  private readonly logger: GatewayLogger
  private readonly tables: Readonly<Partial<Record<Paradigm, ErrorMappingTable>>>
  private readonly maxMessageLength: number

  constructor(options: NormalizerOptions) {
    this.logger = options.logger
    this.tables = options.tables ?? {}
    this.maxMessageLength = options.maxMessageLength ?? DEFAULT_MAX_MESSAGE_LENGTH
  }

  normalize(paradigm: string, kind: string, outcome: AdapterOutcome, latencyMs: number): ResultEnvelope {
    return outcome.ok
      ? this.success(paradigm, kind, outcome.value, latencyMs)
      : this.failure(paradigm, kind, outcome.error, latencyMs)
  }

  success(paradigm: string, kind: string, value: unknown, latencyMs: number): SuccessEnvelope {
    return {
      ok: true,
      paradigm,
      kind,
      data: value === undefined || value === null ? ACK : value,
      error: null,
      latencyMs,
    }
  }

  failure(paradigm: string, kind: string, err: unknown, latencyMs: number): FailureEnvelope {
    return {
      ok: false,
      paradigm,
      kind,
      data: null,
      error: this.toErrorInfo(paradigm, kind, err),
      latencyMs,
    }
  }

  toErrorInfo(paradigm: string, kind: string, err: unknown): ErrorInfo {
    if (err instanceof GatewayError && err.code !== 'QUERY_FAILED') {
      const fixed = CODE_CATEGORIES[err.code]
      if (fixed !== undefined) {
        return { ...fixed, message: sanitizeMessage(err.message, this.maxMessageLength) }
      }
    }

    const tables: ErrorMappingTable[] = []
    if (isParadigm(paradigm)) {
      const override = this.tables[paradigm]
      if (override !== undefined) tables.push(override)
      tables.push(DEFAULT_ERROR_TABLES[paradigm])
    }
    tables.push(NETWORK_ERROR_TABLE)

    // The wrapper's own message is generic; classify and describe by the innermost driver error.
    const signals = extractSignals(err)
    for (const signal of signals.reverse()) {
      for (const table of tables) {
        const rule = matchRule(table, signal)
        if (rule !== undefined) {
          return {
            category: rule.category,
            retryable: rule.retryable,
            message: sanitizeMessage(signal.message, this.maxMessageLength),
          }
        }
      }
    }

    this.logger.error('Unmapped backend error', { paradigm, kind, error: serializeError(err) })
    return { category: 'Internal', retryable: false, message: `Internal error during ${paradigm}.${kind}` }
  }
}
