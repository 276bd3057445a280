import type { Paradigm } from './paradigm.js'

/**
 * A single request against one paradigm. Frozen by `createOperation` and
 * discarded once its envelope has been produced.
 */
export interface Operation {
  readonly paradigm: Paradigm
  readonly kind: string
  readonly parameters: Readonly<Record<string, unknown>>
}

/** Inbound request shape accepted by the router (paradigm is not yet trusted). */
export interface GatewayRequest {
  readonly paradigm: string
  readonly kind: string
  readonly parameters?: Readonly<Record<string, unknown>> | undefined
  readonly debug?: boolean | undefined
  readonly timeoutMs?: number | undefined
}

export function createOperation(
  paradigm: Paradigm,
  kind: string,
  parameters: Readonly<Record<string, unknown>> = {},
): Operation {
  return Object.freeze({
    paradigm,
    kind,
    parameters: Object.freeze({ ...parameters }),
  })
}
