import { describe, expect, it } from 'vitest'
import { withDeadline } from '../src/index.js'

const target = { paradigm: 'graph', kind: 'neighbors' } as const

describe('withDeadline', () => {
  it('settles with the work when it finishes first', async () => {
    const controller = new AbortController()
    await expect(withDeadline(Promise.resolve(['B']), controller, { ...target, timeoutMs: 1000 })).resolves.toEqual([
      'B',
    ])
    expect(controller.signal.aborted).toBe(false)
  })

  it('passes work failures through untouched', async () => {
    const failure = new Error('boom')
    await expect(
      withDeadline(Promise.reject(failure), new AbortController(), { ...target, timeoutMs: 1000 }),
    ).rejects.toBe(failure)
  })

  it('rejects with OPERATION_TIMEOUT and aborts the work', async () => {
    const controller = new AbortController()
    await expect(withDeadline(new Promise(() => {}), controller, { ...target, timeoutMs: 10 })).rejects.toMatchObject({
      code: 'OPERATION_TIMEOUT',
      details: { paradigm: 'graph', kind: 'neighbors', timeoutMs: 10 },
    })
    expect(controller.signal.aborted).toBe(true)
  })

  it('rejects immediately when the caller signal is already aborted', async () => {
    const caller = new AbortController()
    caller.abort()
    const controller = new AbortController()
    await expect(
      withDeadline(new Promise(() => {}), controller, { ...target, timeoutMs: 1000, signal: caller.signal }),
    ).rejects.toMatchObject({ code: 'OPERATION_CANCELLED' })
    expect(controller.signal.aborted).toBe(true)
  })

  it('rejects as cancelled when the controller is aborted from outside', async () => {
    const controller = new AbortController()
    const pending = withDeadline(new Promise(() => {}), controller, { ...target, timeoutMs: 1000 })
    controller.abort()
    await expect(pending).rejects.toMatchObject({ code: 'OPERATION_CANCELLED' })
  })
})
