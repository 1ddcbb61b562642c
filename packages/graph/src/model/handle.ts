/**
 * Opaque reference from a vertex or edge to the slot it occupies in its graph.
 */
export interface ElementHandle {
  /** Id of the owning graph instance */
  readonly owner: number
  /** Slot within the owner, allocated in creation order */
  readonly slot: number
}

/**
 * SameValueZero, the equality `Map` uses for keys.
 */
export function sameKey(a: unknown, b: unknown): boolean {
  return a === b || (a !== a && b !== b)
}
