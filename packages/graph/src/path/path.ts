/**
 * Path
 *
 * An immutable walk over a graph: vertices v0..vn joined by edges e1..en,
 * where each edge leaves the vertex before it (source to target for directed
 * edges). Extending a path copies its sequences, so derived paths never share
 * mutable state and can be handed around freely.
 */

import { InvalidTraversalError, InvalidVertexError } from '../errors'
import { Edge, type Vertex } from '../model'

/**
 * The part of a graph a path needs to look around its tail.
 */
export interface TraversalView<V, E> {
  hasVertex(vertex: Vertex<V>): boolean
  /** Edges that can be walked from `vertex`: all incident edges, or outbound ones when directed */
  traversableEdges(vertex: Vertex<V>): Edge<V, E>[]
}

export class Path<V, E> {
  private readonly view: TraversalView<V, E>
  private readonly vertexList: readonly Vertex<V>[]
  private readonly edgeList: readonly Edge<V, E>[]
  private readonly last: Vertex<V>
  private readonly total: number

  private constructor(
    view: TraversalView<V, E>,
    vertices: readonly Vertex<V>[],
    edges: readonly Edge<V, E>[],
    last: Vertex<V>,
    total: number,
  ) {
    this.view = view
    this.vertexList = Object.freeze(vertices)
    this.edgeList = Object.freeze(edges)
    this.last = last
    this.total = total
  }

  /**
   * A path holding only `source`.
   * @throws InvalidVertexError if `source` is not in the graph
   */
  static startFrom<V, E>(graph: TraversalView<V, E>, source: Vertex<V>): Path<V, E> {
    if (!graph.hasVertex(source)) {
      throw new InvalidVertexError(`Vertex does not exist! vertex=${source.label}`, source.element)
    }
    return new Path(graph, [source], [], source, 0)
  }

  get length(): number {
    return this.edgeList.length
  }

  origin(): Vertex<V> {
    return this.vertexList[0] ?? this.last
  }

  tail(): Vertex<V> {
    return this.last
  }

  vertices(): Vertex<V>[] {
    return [...this.vertexList]
  }

  edges(): Edge<V, E>[] {
    return [...this.edgeList]
  }

  /**
   * Sum of edge weights, 0 for a path without edges.
   */
  distance(): number {
    return this.total
  }

  contains(item: Vertex<V> | Edge<V, E>): boolean {
    if (item instanceof Edge) {
      return this.edgeList.some((edge) => edge.equals(item))
    }
    return this.vertexList.some((vertex) => vertex.equals(item))
  }

  endsWith(vertex: Vertex<V>): boolean {
    return this.last.equals(vertex)
  }

  /**
   * Vertices one traversable hop away from the tail, computed on demand.
   * A self-loop on the tail yields the tail itself, and parallel edges yield
   * the same vertex once per edge.
   */
  *accessibleVertices(): Generator<Vertex<V>, void, undefined> {
    const tail = this.last
    for (const edge of this.view.traversableEdges(tail)) {
      const next = edge.opposite(tail)
      if (next) yield next
    }
  }

  /**
   * A new path extended by `edge`.
   * @throws InvalidTraversalError if `edge` does not leave the tail
   */
  walk(edge: Edge<V, E>): Path<V, E> {
    const tail = this.last
    const leavesTail = edge.directed ? edge.endpointA.equals(tail) : edge.contains(tail)
    const next = leavesTail ? edge.opposite(tail) : undefined
    if (!next) {
      throw new InvalidTraversalError(tail.label, edge.label)
    }
    return new Path(this.view, [...this.vertexList, next], [...this.edgeList, edge], next, this.total + edge.weight)
  }

  equals(other: unknown): boolean {
    if (this === other) return true
    if (!(other instanceof Path)) return false
    return sameSequence(this.vertexList, other.vertexList) && sameSequence(this.edgeList, other.edgeList)
  }

  toString(): string {
    return `Path[${this.vertexList.map((vertex) => vertex.label).join(' -> ')}]`
  }
}

function sameSequence(a: readonly { equals(other: unknown): boolean }[], b: readonly unknown[]): boolean {
  return a.length === b.length && a.every((item, index) => item.equals(b[index]))
}
