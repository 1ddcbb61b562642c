import { sameKey, type ElementHandle } from './handle'

export interface VertexInit<V> {
  element: V
  key: unknown
  label: string
  handle: ElementHandle
}

/**
 * A graph vertex holding one user element.
 *
 * Vertices are created by a graph and compare equal when they belong to the same
 * graph and hold equal elements, so a handle obtained before the vertex was
 * removed and re-inserted still matches.
 */
export class Vertex<V> {
  readonly element: V
  readonly label: string
  readonly handle: ElementHandle
  /** @internal equality key derived from the element */
  readonly key: unknown

  /** @internal vertices are created through `Graph.insertVertex` */
  constructor(init: VertexInit<V>) {
    this.element = init.element
    this.key = init.key
    this.label = init.label
    this.handle = init.handle
    Object.freeze(this)
  }

  equals(other: unknown): boolean {
    if (this === other) return true
    return other instanceof Vertex && other.handle.owner === this.handle.owner && sameKey(other.key, this.key)
  }

  toString(): string {
    return `Vertex{${this.label}}`
  }
}
