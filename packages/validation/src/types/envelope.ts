import type { ErrorCategory } from './paradigm.js'

export interface ErrorInfo {
  readonly category: ErrorCategory
  readonly message: string
  readonly retryable: boolean
}

export interface DebugLogEntry {
  timestamp: number
  phase: 'validation' | 'resolve' | 'execution' | 'normalization'
  message: string
  details?: unknown
}

interface EnvelopeBase {
  readonly paradigm: string
  readonly kind: string
  readonly latencyMs: number
  readonly debugLog?: readonly DebugLogEntry[] | undefined
}

export interface SuccessEnvelope<T = unknown> extends EnvelopeBase {
  readonly ok: true
  readonly data: T
  readonly error: null
}

export interface FailureEnvelope extends EnvelopeBase {
  readonly ok: false
  readonly data: null
  readonly error: ErrorInfo
}

/**
 * Uniform response for every paradigm. Exactly one of `data` / `error` is
 * non-null, selected by `ok`.
 */
export type ResultEnvelope<T = unknown> = SuccessEnvelope<T> | FailureEnvelope

/** Data returned by operations that have nothing else to report. */
export interface Ack {
  readonly acknowledged: true
}

export const ACK: Ack = Object.freeze({ acknowledged: true })
