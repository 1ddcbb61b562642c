/**
 * Undirected Graph
 *
 * Edges establish a two-way connection; the stored endpoint order carries no
 * meaning for adjacency or traversal.
 */

import type { Edge, Vertex } from '../model'
import { BaseGraph } from './base'
import type { GraphOptions } from './config'
import type { Graph, VertexRef } from './types'

export class UndirectedGraph<V, E> extends BaseGraph<V, E> implements Graph<V, E> {
  constructor(options?: GraphOptions<V, E>) {
    super(false, options)
  }

  /**
   * All edges touching the vertex, in insertion order.
   */
  incidentEdges(ref: VertexRef<V>): Edge<V, E>[] {
    return this.store.touching(this.resolveVertex(ref).key)
  }

  traversableEdges(vertex: Vertex<V>): Edge<V, E>[] {
    return this.incidentEdges(vertex)
  }
}

/**
 * Create an empty undirected graph.
 *
 * @example
 * ```typescript
 * const graph = createGraph<string, string>()
 * graph.insertVertex('A')
 * graph.insertVertex('B')
 * graph.insertEdge('A', 'B', 'A-B', 2.5)
 * graph.areAdjacent('B', 'A') // true
 * ```
 */
export function createGraph<V, E>(options?: GraphOptions<V, E>): Graph<V, E> {
  return new UndirectedGraph(options)
}
