/**
 * Shortest Path
 *
 * Best-first exploration over simple paths with branch-and-bound pruning.
 * Paths are expanded in FIFO order; a path is only extended while it is
 * shorter than the best complete path found so far, and never revisits a
 * vertex it already holds. There is no per-vertex distance table, so the same
 * vertex may be reached by several paths. Terminates on finite graphs;
 * exponential in the worst case.
 *
 * The search reads the graph many times without holding a lock. Mutating the
 * graph from elsewhere while it runs gives undefined results.
 */

import { InvalidVertexError } from '../errors'
import type { Edge, Vertex } from '../model'
import type { Path, TraversalView } from '../path'
import type { GraphLogger } from '../graph/logger'
import { FifoQueue } from './queue'

/**
 * The graph operations the search relies on.
 */
export interface SearchableGraph<V, E> extends TraversalView<V, E> {
  readonly logger: GraphLogger
  /** Minimum-weight edge usable to step from `from` to `to` */
  edge(from: Vertex<V>, to: Vertex<V>): Edge<V, E> | undefined
  pathFrom(vertex: Vertex<V>): Path<V, E>
}

/**
 * Minimum-distance simple path from `source` to `destination`, or undefined
 * when `destination` cannot be reached.
 *
 * @throws InvalidVertexError if either vertex is not in the graph
 */
export function shortestPath<V, E>(
  graph: SearchableGraph<V, E>,
  source: Vertex<V>,
  destination: Vertex<V>,
): Path<V, E> | undefined {
  if (!graph.hasVertex(source)) {
    throw new InvalidVertexError(`Vertex does not exist! vertex=${source.label}`, source.element)
  }
  if (!graph.hasVertex(destination)) {
    throw new InvalidVertexError(`Vertex does not exist! vertex=${destination.label}`, destination.element)
  }

  const queue = new FifoQueue<Path<V, E>>()
  queue.push(graph.pathFrom(source))

  let best: Path<V, E> | undefined
  let explored = 0
  let pruned = 0

  for (let path = queue.shift(); path !== undefined; path = queue.shift()) {
    explored++

    if (path.endsWith(destination)) {
      if (!best || path.distance() < best.distance()) {
        best = path
      }
      continue
    }

    if (best && path.distance() >= best.distance()) {
      pruned++
      continue
    }

    const tail = path.tail()
    for (const next of path.accessibleVertices()) {
      if (path.contains(next)) continue
      const edge = graph.edge(tail, next)
      if (edge) queue.push(path.walk(edge))
    }
  }

  graph.logger.debug('shortest path search finished', {
    source: source.label,
    destination: destination.label,
    explored,
    pruned,
    distance: best?.distance(),
  })

  return best
}
