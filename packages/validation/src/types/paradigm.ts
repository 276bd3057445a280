// --- Paradigms ---

export type Paradigm = 'object' | 'vector' | 'graph' | 'columnar'

export const PARADIGMS: readonly Paradigm[] = ['object', 'vector', 'graph', 'columnar']

const PARADIGM_SET = new Set<string>(PARADIGMS)

export function isParadigm(value: unknown): value is Paradigm {
  return typeof value === 'string' && PARADIGM_SET.has(value)
}

// --- Error taxonomy ---

/** Closed set of categories an error may carry across the gateway boundary. */
export type ErrorCategory = 'NotFound' | 'InvalidInput' | 'BackendUnavailable' | 'Timeout' | 'Conflict' | 'Internal'

export const ERROR_CATEGORIES: readonly ErrorCategory[] = [
  'NotFound',
  'InvalidInput',
  'BackendUnavailable',
  'Timeout',
  'Conflict',
  'Internal',
]

const CATEGORY_SET = new Set<string>(ERROR_CATEGORIES)

export function isErrorCategory(value: unknown): value is ErrorCategory {
  return typeof value === 'string' && CATEGORY_SET.has(value)
}
