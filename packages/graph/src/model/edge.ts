import { sameKey, type ElementHandle } from './handle'
import type { Vertex } from './vertex'

/**
 * Opaque, string-keyed edge properties.
 */
export type EdgeProperties = Readonly<Record<string, unknown>>

export interface EdgeInit<V, E> {
  endpointA: Vertex<V>
  endpointB: Vertex<V>
  directed: boolean
  weight: number
  element: E
  key: unknown
  label: string
  properties: EdgeProperties
  handle: ElementHandle
}

/**
 * A graph edge connecting two vertices.
 *
 * Identity is the edge element, not its endpoints. For directed edges
 * `endpointA` is the source and `endpointB` the target.
 */
export class Edge<V, E> {
  readonly endpointA: Vertex<V>
  readonly endpointB: Vertex<V>
  readonly directed: boolean
  readonly weight: number
  readonly element: E
  readonly label: string
  readonly properties: EdgeProperties
  readonly handle: ElementHandle
  /** @internal equality key derived from the element */
  readonly key: unknown

  /** @internal edges are created through `Graph.insertEdge` */
  constructor(init: EdgeInit<V, E>) {
    this.endpointA = init.endpointA
    this.endpointB = init.endpointB
    this.directed = init.directed
    this.weight = init.weight
    this.element = init.element
    this.key = init.key
    this.label = init.label
    this.properties = Object.freeze({ ...init.properties })
    this.handle = init.handle
    Object.freeze(this)
  }

  contains(vertex: Vertex<V>): boolean {
    return this.endpointA.equals(vertex) || this.endpointB.equals(vertex)
  }

  /**
   * The endpoint at the other end from `vertex`, or undefined when this edge does not touch it.
   */
  opposite(vertex: Vertex<V>): Vertex<V> | undefined {
    if (this.endpointA.equals(vertex)) return this.endpointB
    if (this.endpointB.equals(vertex)) return this.endpointA
    return undefined
  }

  equals(other: unknown): boolean {
    if (this === other) return true
    return other instanceof Edge && other.handle.owner === this.handle.owner && sameKey(other.key, this.key)
  }

  toString(): string {
    const arrow = this.directed ? '->' : '--'
    return `Edge{${this.label}: ${this.endpointA.label} ${arrow} ${this.endpointB.label}, weight=${this.weight}}`
  }
}

/**
 * Copy of `edge` with one endpoint swapped for another (both, for a loop).
 */
export function rewireEdge<V, E>(edge: Edge<V, E>, from: Vertex<V>, to: Vertex<V>): Edge<V, E> {
  return new Edge({
    ...edgeInit(edge),
    endpointA: edge.endpointA.equals(from) ? to : edge.endpointA,
    endpointB: edge.endpointB.equals(from) ? to : edge.endpointB,
  })
}

/**
 * Copy of `edge` holding a different element.
 */
export function renameEdge<V, E>(edge: Edge<V, E>, element: E, key: unknown, label: string): Edge<V, E> {
  return new Edge({ ...edgeInit(edge), element, key, label })
}

function edgeInit<V, E>(edge: Edge<V, E>): EdgeInit<V, E> {
  return {
    endpointA: edge.endpointA,
    endpointB: edge.endpointB,
    directed: edge.directed,
    weight: edge.weight,
    element: edge.element,
    key: edge.key,
    label: edge.label,
    properties: edge.properties,
    handle: edge.handle,
  }
}
