import { createColumnarAdapter } from '@polystore/adapter-columnar'
import { createGraphAdapter } from '@polystore/adapter-graph'
import { createObjectAdapter } from '@polystore/adapter-object'
import type { Embedder } from '@polystore/adapter-vector'
import { createVectorAdapter } from '@polystore/adapter-vector'
import type { AdapterFactories, AdapterFactory, Paradigm } from '@polystore/gateway'
import { ConnectionError } from '@polystore/gateway'
import type { LoadedConfig } from './config.js'

export interface AdapterWiring {
  readonly embedder?: Embedder | undefined
}

function notConfigured<P extends Paradigm>(paradigm: P, missing: readonly string[]): AdapterFactory<P> {
  return () => {
    throw new ConnectionError(
      'NOT_CONFIGURED',
      `The ${paradigm} store is not configured; set ${missing.join(', ')}`,
      { paradigm },
    )
  }
}

/** One factory per paradigm; stores without settings fail with NOT_CONFIGURED on first use. */
export function createAdapterFactories(loaded: LoadedConfig, wiring: AdapterWiring = {}): AdapterFactories {
  const { gateway, missing } = loaded
  const object = gateway.object
  const vector = gateway.vector
  const graph = gateway.graph
  const columnar = gateway.columnar

  return {
    object: object !== undefined ? () => createObjectAdapter(object) : notConfigured('object', missing.object ?? []),
    vector:
      vector !== undefined
        ? () => createVectorAdapter(vector, { embedder: wiring.embedder })
        : notConfigured('vector', missing.vector ?? []),
    graph: graph !== undefined ? () => createGraphAdapter(graph) : notConfigured('graph', missing.graph ?? []),
    columnar:
      columnar !== undefined ? () => createColumnarAdapter(columnar) : notConfigured('columnar', missing.columnar ?? []),
  }
}
