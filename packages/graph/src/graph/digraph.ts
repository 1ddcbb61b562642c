/**
 * Directed Graph
 *
 * Every edge goes from its outbound vertex (`endpointA`) to its inbound vertex
 * (`endpointB`). Adjacency, edge lookup, removal by endpoints and traversal
 * all follow that direction.
 */

import type { Edge, Vertex } from '../model'
import { BaseGraph } from './base'
import type { GraphOptions } from './config'
import type { Digraph, VertexRef } from './types'

export class DirectedGraph<V, E> extends BaseGraph<V, E> implements Digraph<V, E> {
  constructor(options?: GraphOptions<V, E>) {
    super(true, options)
  }

  /**
   * Edges entering the vertex.
   */
  incidentEdges(ref: VertexRef<V>): Edge<V, E>[] {
    return this.store.incoming(this.resolveVertex(ref).key)
  }

  inboundEdges(ref: VertexRef<V>): Edge<V, E>[] {
    return this.incidentEdges(ref)
  }

  /**
   * Edges leaving the vertex.
   */
  outboundEdges(ref: VertexRef<V>): Edge<V, E>[] {
    return this.store.outgoing(this.resolveVertex(ref).key)
  }

  traversableEdges(vertex: Vertex<V>): Edge<V, E>[] {
    return this.outboundEdges(vertex)
  }
}

/**
 * Create an empty directed graph.
 *
 * @example
 * ```typescript
 * const digraph = createDigraph<string, string>()
 * digraph.insertVertex('A')
 * digraph.insertVertex('B')
 * digraph.insertEdge('A', 'B', 'A->B')
 * digraph.areAdjacent('A', 'B') // true
 * digraph.areAdjacent('B', 'A') // false
 * ```
 */
export function createDigraph<V, E>(options?: GraphOptions<V, E>): Digraph<V, E> {
  return new DirectedGraph(options)
}
