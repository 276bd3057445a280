import type {
  BenchmarkReport,
  BenchmarkSample,
  ErrorInfo,
  HealthCheckResult,
  HealthRecord,
  ResultEnvelope,
} from '@polystore/validation'
import { isErrorCategory, isParadigm, isPlainRecord } from '@polystore/validation'

// Structural checks on response bodies before they are handed out as typed values

export function isErrorInfo(value: unknown): value is ErrorInfo {
  return (
    isPlainRecord(value) &&
    isErrorCategory(value.category) &&
    typeof value.message === 'string' &&
    typeof value.retryable === 'boolean'
  )
}

export function isResultEnvelope(value: unknown): value is ResultEnvelope {
  if (!isPlainRecord(value)) return false
  if (typeof value.paradigm !== 'string' || typeof value.kind !== 'string' || typeof value.latencyMs !== 'number') {
    return false
  }
  if (value.ok === true) return value.error === null && value.data !== null && value.data !== undefined
  if (value.ok === false) return value.data === null && isErrorInfo(value.error)
  return false
}

function isHealthRecord(value: unknown): value is HealthRecord {
  return (
    isPlainRecord(value) &&
    isParadigm(value.paradigm) &&
    typeof value.state === 'string' &&
    (value.lastError === null || isErrorInfo(value.lastError))
  )
}

export function isHealthCheckResult(value: unknown): value is HealthCheckResult {
  if (!isPlainRecord(value) || typeof value.healthy !== 'boolean') return false
  const adapters = value.adapters
  return isPlainRecord(adapters) && Object.values(adapters).every((record) => isHealthRecord(record))
}

function isBenchmarkSample(value: unknown): value is BenchmarkSample {
  return (
    isPlainRecord(value) &&
    typeof value.paradigm === 'string' &&
    typeof value.kind === 'string' &&
    typeof value.latencyMs === 'number' &&
    typeof value.ok === 'boolean'
  )
}

export function isBenchmarkReport(value: unknown): value is BenchmarkReport {
  return (
    isPlainRecord(value) &&
    isPlainRecord(value.summary) &&
    Array.isArray(value.recent) &&
    value.recent.every((sample) => isBenchmarkSample(sample))
  )
}

export function isResetAck(value: unknown): value is { reset: true } {
  return isPlainRecord(value) && value.reset === true
}
