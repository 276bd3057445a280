import type { Paradigm } from '@polystore/validation'
import { ExecutionError } from '@polystore/validation'

export interface DeadlineOptions {
  readonly timeoutMs: number
  readonly paradigm: Paradigm
  readonly kind: string
  /** Caller cancellation. */
  readonly signal?: AbortSignal | undefined
}

/**
 * Settles with `work`, or rejects once `timeoutMs` elapses or either signal aborts,
 * whichever comes first. On timeout or caller cancellation `controller` is aborted
 * so the backend call can stop; whether it does is up to the driver.
 */
export function withDeadline<T>(work: Promise<T>, controller: AbortController, options: DeadlineOptions): Promise<T> {
  const { paradigm, kind } = options

  return new Promise<T>((resolve, reject) => {
    let settled = false

    const finish = (complete: () => void): void => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      options.signal?.removeEventListener('abort', onCallerAbort)
      controller.signal.removeEventListener('abort', onControllerAbort)
      complete()
    }

    const cancelled = (): ExecutionError => new ExecutionError({ code: 'OPERATION_CANCELLED', paradigm, kind })

    const onCallerAbort = (): void => {
      finish(() => reject(cancelled()))
      controller.abort()
    }

    // Aborted from outside (gateway shutdown).
    const onControllerAbort = (): void => {
      finish(() => reject(cancelled()))
    }

    const timer = setTimeout(() => {
      finish(() =>
        reject(new ExecutionError({ code: 'OPERATION_TIMEOUT', paradigm, kind, timeoutMs: options.timeoutMs })),
      )
      controller.abort()
    }, options.timeoutMs)

    if (options.signal?.aborted === true || controller.signal.aborted) {
      onCallerAbort()
      return
    }
    options.signal?.addEventListener('abort', onCallerAbort, { once: true })
    controller.signal.addEventListener('abort', onControllerAbort, { once: true })

    work.then(
      (value) => finish(() => resolve(value)),
      (err: unknown) => finish(() => reject(err)),
    )
  })
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms)
  })
}
