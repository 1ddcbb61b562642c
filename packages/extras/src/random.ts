/**
 * Random Graphs
 *
 * Erdős–Rényi style generation: vertices 1..n, and for every pair (i, j)
 * with j <= i an edge i -> j with probability p, so the expected edge count is
 * p * n(n+1)/2 (loops included). Draws come from a seeded PRNG, so the same
 * seed always yields the same graph.
 */

import { z } from 'zod'
import {
  GraphConfigError,
  createDigraph,
  createGraph,
  type Digraph,
  type Graph,
  type GraphOptions,
} from '@weavegraph/graph'

export interface RandomGraphOptions<V, E> {
  /** Number of vertices */
  nodeSize: number
  /** Probability (0..1) of an edge between two vertices */
  edgeProbability: number
  /** Element of the i-th vertex, i starting at 1; must be unique */
  vertex: (index: number) => V
  /** Element of the edge between two vertex elements; must be unique */
  edge: (a: V, b: V) => E
  /** PRNG seed (defaults to 0) */
  seed?: number
  /** Options for the generated graph */
  graph?: GraphOptions<V, E>
}

export const randomGraphParamsSchema = z.object({
  nodeSize: z.number().int().nonnegative(),
  edgeProbability: z.number().min(0).max(1),
  seed: z.number().int().default(0),
})

/**
 * mulberry32: 32-bit state, uniform doubles in [0, 1).
 */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function randomGraph<V, E>(options: RandomGraphOptions<V, E>): Graph<V, E> {
  return populate(createGraph(options.graph), options)
}

export function randomDigraph<V, E>(options: RandomGraphOptions<V, E>): Digraph<V, E> {
  return populate(createDigraph(options.graph), options)
}

function populate<V, E, G extends Graph<V, E>>(graph: G, options: RandomGraphOptions<V, E>): G {
  const parsed = randomGraphParamsSchema.safeParse({
    nodeSize: options.nodeSize,
    edgeProbability: options.edgeProbability,
    seed: options.seed,
  })
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    throw new GraphConfigError(`Invalid random graph options: ${issues[0]?.path}: ${issues[0]?.message}`, issues)
  }

  const { nodeSize, edgeProbability, seed } = parsed.data
  const next = mulberry32(seed)
  const loops = options.graph?.allowSelfLoops ?? true

  const elements: V[] = []
  for (let i = 1; i <= nodeSize; i++) {
    const element = options.vertex(i)
    graph.insertVertex(element)
    elements.push(element)
  }

  elements.forEach((a, i) => {
    for (const [j, b] of elements.slice(0, i + 1).entries()) {
      if (next() >= edgeProbability) continue
      if (j === i && !loops) continue
      graph.insertEdge(a, b, options.edge(a, b))
    }
  })

  graph.logger.debug('generated random graph', {
    directed: graph.directed,
    vertices: graph.numVertices(),
    edges: graph.numEdges(),
    seed,
  })
  return graph
}
