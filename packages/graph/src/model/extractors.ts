/**
 * Element Extractors
 *
 * Pluggable functions that derive keys, weights and labels from user elements.
 * The graph calls them when a vertex or edge is created, never afterwards.
 */

/**
 * Maps an element to the value used for equality.
 * Two elements with the same key (SameValueZero) are the same element.
 */
export type ElementKey<T> = (element: T) => unknown

/**
 * Resolves the weight of an edge from its element.
 */
export type WeightExtractor<E> = (element: E) => number

/**
 * Resolves the display label of a vertex or edge element.
 */
export type LabelExtractor<T> = (element: T) => string

export const DEFAULT_WEIGHT = 1

/**
 * Primitives compare by value, objects by reference.
 */
export function identityKey<T>(element: T): unknown {
  return element
}

export function constantWeight<E>(value: number = DEFAULT_WEIGHT): WeightExtractor<E> {
  return () => value
}

/**
 * Reads a numeric field (or a zero-argument method) from object elements.
 *
 * @example
 * ```typescript
 * const graph = createGraph<string, { name: string; km: number }>({ weight: propertyWeight('km') })
 * graph.insertEdge('A', 'B', { name: 'A-B', km: 12.5 }) // weight 12.5
 * ```
 */
export function propertyWeight<E>(key: string, fallback: number = DEFAULT_WEIGHT): WeightExtractor<E> {
  return (element) => {
    const value = readMember(element, key)
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback
  }
}

export function defaultLabel<T>(element: T): string {
  return String(element)
}

/**
 * Reads a string field (or a zero-argument method) from object elements,
 * falling back to `String(element)`.
 */
export function propertyLabel<T>(key: string): LabelExtractor<T> {
  return (element) => {
    const value = readMember(element, key)
    return typeof value === 'string' ? value : String(element)
  }
}

function readMember(element: unknown, key: string): unknown {
  if (typeof element !== 'object' || element === null || !(key in element)) {
    return undefined
  }
  const value: unknown = Reflect.get(element, key)
  if (typeof value === 'function') {
    return value.length === 0 ? value.call(element) : undefined
  }
  return value
}
