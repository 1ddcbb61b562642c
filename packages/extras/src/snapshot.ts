/**
 * Graph Snapshots
 *
 * JSON-safe export/import of a graph. Vertices are listed in graph order and
 * edges refer to them by index, so a snapshot survives element types that do
 * not serialise to unique strings. Element values go through a codec.
 */

import { z } from 'zod'
import {
  GraphError,
  createDigraph,
  createGraph,
  type Graph,
  type GraphOptions,
  type Vertex,
} from '@weavegraph/graph'
import { SnapshotError } from './errors'

// =============================================================================
// TYPES
// =============================================================================

export const SNAPSHOT_VERSION = 1

export const graphSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  directed: z.boolean(),
  vertices: z.array(z.unknown()),
  edges: z.array(
    z.object({
      element: z.unknown(),
      source: z.number().int().nonnegative(),
      target: z.number().int().nonnegative(),
      weight: z.number().finite(),
      properties: z.record(z.unknown()).optional(),
    }),
  ),
})

export type GraphSnapshot = z.infer<typeof graphSnapshotSchema>

/**
 * Converts vertex and edge elements to and from JSON-safe values.
 */
export interface SnapshotCodec<V, E> {
  encodeVertex(element: V): unknown
  decodeVertex(raw: unknown): V
  encodeEdge(element: E): unknown
  decodeEdge(raw: unknown): E
}

/**
 * Codec that stores elements as they are and validates them with zod on the way back.
 */
export function zodCodec<V, E>(vertex: z.ZodType<V>, edge: z.ZodType<E>): SnapshotCodec<V, E> {
  return {
    encodeVertex: (element) => element,
    decodeVertex: (raw) => decodeWith(vertex, raw, 'vertex'),
    encodeEdge: (element) => element,
    decodeEdge: (raw) => decodeWith(edge, raw, 'edge'),
  }
}

export const stringCodec: SnapshotCodec<string, string> = zodCodec(z.string(), z.string())

// =============================================================================
// EXPORT
// =============================================================================

export function exportSnapshot<V, E>(graph: Graph<V, E>, codec: SnapshotCodec<V, E>): GraphSnapshot {
  const vertices = graph.vertices()
  const indexes = new Map<Vertex<V>, number>(vertices.map((vertex, index) => [vertex, index]))

  const indexOf = (vertex: Vertex<V>): number => {
    const index = indexes.get(vertex) ?? vertices.findIndex((candidate) => candidate.equals(vertex))
    if (index < 0) {
      throw new SnapshotError(`Edge endpoint is not a vertex of the graph: ${vertex.label}`)
    }
    return index
  }

  return {
    version: SNAPSHOT_VERSION,
    directed: graph.directed,
    vertices: vertices.map((vertex) => codec.encodeVertex(vertex.element)),
    edges: graph.edges().map((edge) => ({
      element: codec.encodeEdge(edge.element),
      source: indexOf(edge.endpointA),
      target: indexOf(edge.endpointB),
      weight: edge.weight,
      ...(Object.keys(edge.properties).length > 0 ? { properties: { ...edge.properties } } : {}),
    })),
  }
}

export function serializeGraph<V, E>(graph: Graph<V, E>, codec: SnapshotCodec<V, E>): string {
  return JSON.stringify(exportSnapshot(graph, codec))
}

// =============================================================================
// IMPORT
// =============================================================================

/**
 * Build a graph (directed or not, as recorded) from a snapshot.
 * @throws SnapshotError if the snapshot is malformed or describes an invalid graph
 */
export function importSnapshot<V, E>(
  input: unknown,
  codec: SnapshotCodec<V, E>,
  options?: GraphOptions<V, E>,
): Graph<V, E> {
  const result = graphSnapshotSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.errors.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    const first = issues[0]
    throw new SnapshotError(`Invalid snapshot: ${first ? `${first.path}: ${first.message}` : 'validation failed'}`, issues)
  }

  const snapshot = result.data
  const graph: Graph<V, E> = snapshot.directed ? createDigraph(options) : createGraph(options)
  const vertices = snapshot.vertices.map((raw) => codec.decodeVertex(raw))

  try {
    for (const element of vertices) {
      graph.insertVertex(element)
    }

    snapshot.edges.forEach((edge, index) => {
      const source = vertices[edge.source]
      const target = vertices[edge.target]
      if (edge.source >= vertices.length || edge.target >= vertices.length || source === undefined || target === undefined) {
        throw new SnapshotError(`Edge ${index} refers to a missing vertex`, [
          { path: `edges.${index}`, message: 'Vertex index out of range' },
        ])
      }
      graph.insertEdge(source, target, codec.decodeEdge(edge.element), edge.weight, edge.properties ?? {})
    })
  } catch (error) {
    if (error instanceof GraphError && !(error instanceof SnapshotError)) {
      throw new SnapshotError(`Snapshot describes an invalid graph: ${error.message}`, [], error)
    }
    throw error
  }

  return graph
}

export function deserializeGraph<V, E>(
  json: string,
  codec: SnapshotCodec<V, E>,
  options?: GraphOptions<V, E>,
): Graph<V, E> {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (error) {
    throw new SnapshotError('Snapshot is not valid JSON', [], error instanceof Error ? error : undefined)
  }
  return importSnapshot(parsed, codec, options)
}

function decodeWith<T>(schema: z.ZodType<T>, raw: unknown, kind: 'vertex' | 'edge'): T {
  const result = schema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.errors.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    throw new SnapshotError(`Invalid ${kind} element: ${issues[0]?.message ?? 'validation failed'}`, issues)
  }
  return result.data
}
