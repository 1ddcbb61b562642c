/**
 * weavegraph
 *
 * Mutable, type-generic graphs (undirected and directed) with value-identity
 * vertices and edges, immutable paths and a shortest-path search.
 *
 * @example
 * ```typescript
 * import { createDigraph, propertyWeight } from '@weavegraph/graph'
 *
 * interface Road { name: string; km: number }
 *
 * const roads = createDigraph<string, Road>({ weight: propertyWeight('km') })
 * roads.insertVertex('Lisbon')
 * roads.insertVertex('Porto')
 * roads.insertVertex('Braga')
 * roads.insertEdge('Lisbon', 'Porto', { name: 'A1', km: 313 })
 * roads.insertEdge('Porto', 'Braga', { name: 'A3', km: 55 })
 *
 * const route = roads.dijkstra('Lisbon', 'Braga')
 * route?.distance() // 368
 * route?.toString() // 'Path[Lisbon -> Porto -> Braga]'
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// GRAPHS
// =============================================================================

export { createGraph, createDigraph, UndirectedGraph, DirectedGraph, BaseGraph } from './graph'
export type { Graph, Digraph, VertexRef, EdgeRef, GraphStats } from './graph'

// =============================================================================
// CONFIGURATION, HOOKS & LOGGING
// =============================================================================

export { resolveGraphOptions, graphOptionsSchema, defaultGraphOptions } from './graph'
export type { GraphOptions, ResolvedGraphConfig } from './graph'
export { HooksRunner, MutationLock, AsyncMutex, silentLogger, consoleLogger } from './graph'
export type {
  GraphHooks,
  GraphLogger,
  MutationContext,
  MutationOperation,
  RemovedVertex,
  ReplacedVertex,
  ReplacedEdge,
} from './graph'

// =============================================================================
// MODEL
// =============================================================================

export {
  Vertex,
  Edge,
  DEFAULT_WEIGHT,
  identityKey,
  constantWeight,
  propertyWeight,
  defaultLabel,
  propertyLabel,
} from './model'
export type { EdgeProperties, ElementHandle, ElementKey, WeightExtractor, LabelExtractor } from './model'

// =============================================================================
// PATHS & SEARCH
// =============================================================================

export { Path } from './path'
export type { TraversalView } from './path'
export { shortestPath } from './search'
export type { SearchableGraph } from './search'

// =============================================================================
// ERRORS
// =============================================================================

export {
  GraphError,
  InvalidVertexError,
  DuplicateVertexError,
  InvalidEdgeError,
  DuplicateEdgeError,
  InvalidTraversalError,
  ConcurrentMutationError,
  GraphConfigError,
} from './errors'
export type { GraphIssue } from './errors'
