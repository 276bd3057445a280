// Typed commands produced by operation validation. Adapters only ever see these.

// --- Object store ---

export type ObjectCommand =
  | { readonly paradigm: 'object'; readonly kind: 'put'; readonly key: string; readonly bytes: Uint8Array }
  | { readonly paradigm: 'object'; readonly kind: 'get'; readonly key: string }
  | { readonly paradigm: 'object'; readonly kind: 'list'; readonly prefix: string }
  | { readonly paradigm: 'object'; readonly kind: 'delete'; readonly key: string }
  | { readonly paradigm: 'object'; readonly kind: 'stat'; readonly key: string }

// --- Vector store ---

export type MetadataValue = string | number | boolean

export type VectorQueryInput = { readonly embedding: readonly number[] } | { readonly text: string }

export type VectorCommand =
  | {
      readonly paradigm: 'vector'
      readonly kind: 'index'
      readonly id: string
      readonly embedding: readonly number[]
      readonly metadata: Readonly<Record<string, MetadataValue>>
      readonly text?: string | undefined
    }
  | {
      readonly paradigm: 'vector'
      readonly kind: 'query'
      readonly input: VectorQueryInput
      readonly topK: number
      readonly filter?: Readonly<Record<string, MetadataValue>> | undefined
    }
  | { readonly paradigm: 'vector'; readonly kind: 'delete'; readonly id: string }
  | { readonly paradigm: 'vector'; readonly kind: 'stats' }

// --- Graph store ---

export type PropertyValue = string | number | boolean | null | readonly (string | number | boolean)[]

export type TraversalDirection = 'out' | 'in' | 'both'

export type GraphCommand =
  | {
      readonly paradigm: 'graph'
      readonly kind: 'createNode'
      readonly label: string
      readonly properties: Readonly<Record<string, PropertyValue>>
    }
  | {
      readonly paradigm: 'graph'
      readonly kind: 'createEdge'
      readonly fromId: string
      readonly toId: string
      readonly relation: string
      readonly properties: Readonly<Record<string, PropertyValue>>
    }
  | {
      readonly paradigm: 'graph'
      readonly kind: 'neighbors'
      readonly nodeId: string
      readonly relation?: string | undefined
      readonly maxHops: number
      readonly direction: TraversalDirection
    }
  | {
      readonly paradigm: 'graph'
      readonly kind: 'shortestPath'
      readonly fromId: string
      readonly toId: string
      readonly relation?: string | undefined
    }
  | { readonly paradigm: 'graph'; readonly kind: 'clear' }

// --- Columnar store ---

export type ColumnType = 'string' | 'int' | 'float' | 'decimal' | 'date' | 'datetime' | 'boolean'

export interface ColumnDef {
  readonly name: string
  readonly type: ColumnType
  readonly nullable?: boolean | undefined
}

export interface TableSchema {
  readonly table: string
  readonly columns: readonly ColumnDef[]
  readonly orderBy?: readonly string[] | undefined
}

export type ColumnarQueryInput =
  | { readonly named: string; readonly params: Readonly<Record<string, unknown>> }
  | { readonly statement: string }

export type ColumnarCommand =
  | { readonly paradigm: 'columnar'; readonly kind: 'createTable'; readonly schema: TableSchema; readonly ifNotExists: boolean }
  | {
      readonly paradigm: 'columnar'
      readonly kind: 'bulkInsert'
      readonly table: string
      readonly rows: readonly Readonly<Record<string, unknown>>[]
    }
  | { readonly paradigm: 'columnar'; readonly kind: 'query'; readonly input: ColumnarQueryInput }
  | { readonly paradigm: 'columnar'; readonly kind: 'stats'; readonly table: string }

// --- Union ---

export type Command = ObjectCommand | VectorCommand | GraphCommand | ColumnarCommand

export type CommandFor<P extends Command['paradigm']> = Extract<Command, { readonly paradigm: P }>
