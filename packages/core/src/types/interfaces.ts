import type { CommandFor, Paradigm } from '@polystore/validation'

// --- StorageAdapter (implemented by adapter packages) ---

/**
 * Whether one adapter may serve several calls at once (pooled driver) or
 * needs the handle to queue them.
 */
export type AdapterConcurrency = 'concurrent' | 'serialized'

export interface ExecutionContext {
  /** Aborted when the caller gives up or the gateway shuts down. Backends honour it best-effort. */
  readonly signal: AbortSignal
}

/**
 * Capability interface every backend adapter satisfies.
 *
 * Error contract:
 * - `connect()` / `healthCheck()` throw `ConnectionError` on any failure.
 * - `execute()` throws gateway errors (`NotFoundError`, `ValidationError`, ...) for
 *   failures it can classify, and wraps driver errors with `wrapBackendError`.
 * - `disconnect()` should attempt cleanup; failures may propagate as raw errors.
 */
export interface StorageAdapter<P extends Paradigm = Paradigm> {
  readonly paradigm: P
  readonly concurrency: AdapterConcurrency
  connect(): Promise<void>
  disconnect(): Promise<void>
  healthCheck(): Promise<void>
  execute(command: CommandFor<P>, context: ExecutionContext): Promise<unknown>
}

export type AdapterFactory<P extends Paradigm = Paradigm> = () => StorageAdapter<P> | Promise<StorageAdapter<P>>
