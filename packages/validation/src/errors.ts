import type { Paradigm } from './types/paradigm.js'

// --- Base Error ---

export class GatewayError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'GatewayError'
    this.code = code
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Config Error ---

export interface ConfigErrorEntry {
  code: 'MISSING_SETTING' | 'INVALID_SETTING' | 'INVALID_IDENTIFIER' | 'DUPLICATE_NAMED_QUERY'
  message: string
  details: {
    paradigm?: Paradigm | undefined
    field?: string | undefined
    expected?: string | undefined
    actual?: string | undefined
  }
}

export class ConfigError extends GatewayError {
  declare readonly code: 'CONFIG_INVALID'
  readonly errors: readonly ConfigErrorEntry[]

  constructor(errors: readonly ConfigErrorEntry[]) {
    super('CONFIG_INVALID', `Config invalid: ${errors.length} error${errors.length === 1 ? '' : 's'}`)
    this.name = 'ConfigError'
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Connection Error ---

export type ConnectionErrorCode =
  | 'CONNECTION_FAILED'
  | 'NOT_CONFIGURED'
  | 'ADAPTER_DEGRADED'
  | 'ADAPTER_CLOSED'
  | 'NETWORK_ERROR'
  | 'REQUEST_TIMEOUT'

export interface ConnectionErrorDetails {
  paradigm?: Paradigm | undefined
  url?: string | undefined
  timeoutMs?: number | undefined
  retryAt?: string | undefined
}

export class ConnectionError extends GatewayError {
  declare readonly code: ConnectionErrorCode
  readonly details: ConnectionErrorDetails

  constructor(code: ConnectionErrorCode, message: string, details: ConnectionErrorDetails, cause?: Error | undefined) {
    super(code, message, cause ? { cause } : undefined)
    this.name = 'ConnectionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Validation Error ---

export interface ValidationErrorEntry {
  code:
    | 'UNKNOWN_PARADIGM'
    | 'UNKNOWN_KIND'
    | 'MISSING_PARAMETER'
    | 'INVALID_PARAMETER'
    | 'UNKNOWN_PARAMETER'
    | 'DIMENSION_MISMATCH'
    | 'LIMIT_EXCEEDED'
    | 'INVALID_ROW'
    | 'UNKNOWN_NAMED_QUERY'
  message: string
  details: {
    parameter?: string | undefined
    expected?: string | undefined
    actual?: string | undefined
    rowIndex?: number | undefined
    column?: string | undefined
  }
}

export class ValidationError extends GatewayError {
  declare readonly code: 'VALIDATION_FAILED'
  readonly paradigm: string
  readonly kind: string
  readonly errors: readonly ValidationErrorEntry[]

  constructor(paradigm: string, kind: string, errors: readonly ValidationErrorEntry[]) {
    super('VALIDATION_FAILED', validationMessage(errors))
    this.name = 'ValidationError'
    this.paradigm = paradigm
    this.kind = kind
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      paradigm: this.paradigm,
      kind: this.kind,
      errors: this.errors,
    }
  }
}

// --- Not Found / Conflict ---

export interface ResourceDetails {
  paradigm: Paradigm
  resource: 'object' | 'vector' | 'node' | 'path' | 'table'
  id: string
}

export class NotFoundError extends GatewayError {
  declare readonly code: 'NOT_FOUND'
  readonly details: ResourceDetails

  constructor(details: ResourceDetails, message?: string | undefined) {
    super('NOT_FOUND', message ?? `${capitalize(details.resource)} not found: ${details.id}`)
    this.name = 'NotFoundError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

export class ConflictError extends GatewayError {
  declare readonly code: 'CONFLICT'
  readonly details: ResourceDetails

  constructor(details: ResourceDetails, message?: string | undefined) {
    super('CONFLICT', message ?? `${capitalize(details.resource)} already exists: ${details.id}`)
    this.name = 'ConflictError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Execution Error ---

export type ExecutionErrorDetails =
  | { code: 'QUERY_FAILED'; paradigm: Paradigm; kind: string; cause?: Error | undefined }
  | { code: 'OPERATION_TIMEOUT'; paradigm: Paradigm; kind: string; timeoutMs: number }
  | { code: 'OPERATION_CANCELLED'; paradigm: Paradigm; kind: string }

export class ExecutionError extends GatewayError {
  declare readonly code: 'QUERY_FAILED' | 'OPERATION_TIMEOUT' | 'OPERATION_CANCELLED'
  readonly details: ExecutionErrorDetails

  constructor(details: ExecutionErrorDetails, cause?: Error | undefined) {
    super(details.code, defaultExecutionMessage(details), cause ? { cause } : undefined)
    this.name = 'ExecutionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: serializeExecutionDetails(this.details),
    }
  }
}

/** Wrap a driver failure so it reaches the normalizer with its paradigm attached. */
export function wrapBackendError(err: unknown, paradigm: Paradigm, kind: string): GatewayError {
  if (err instanceof GatewayError) return err
  const cause = err instanceof Error ? err : new Error(String(err))
  return new ExecutionError({ code: 'QUERY_FAILED', paradigm, kind, cause }, cause)
}

// --- Helpers ---

export function serializeError(err: unknown): Record<string, unknown> | unknown {
  if (err instanceof GatewayError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}

function serializeExecutionDetails(details: ExecutionErrorDetails): unknown {
  if (details.code === 'QUERY_FAILED' && details.cause !== undefined) {
    const { cause, ...rest } = details
    return { ...rest, cause: serializeError(cause) }
  }
  return details
}

function validationMessage(errors: readonly ValidationErrorEntry[]): string {
  const first = errors[0]
  if (errors.length === 1 && first !== undefined) {
    return `Validation failed: ${first.message}`
  }
  return `Validation failed: ${errors.length} errors`
}

function defaultExecutionMessage(details: ExecutionErrorDetails): string {
  switch (details.code) {
    case 'QUERY_FAILED':
      return `Operation failed on ${details.paradigm} store: ${details.kind}`
    case 'OPERATION_TIMEOUT':
      return `Operation timed out on ${details.paradigm} store: ${details.kind} (${details.timeoutMs}ms)`
    case 'OPERATION_CANCELLED':
      return `Operation cancelled on ${details.paradigm} store: ${details.kind}`
  }
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1)
}
