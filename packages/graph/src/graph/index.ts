export { BaseGraph } from './base'
export { UndirectedGraph, createGraph } from './graph'
export { DirectedGraph, createDigraph } from './digraph'
export { resolveGraphOptions, graphOptionsSchema, defaultGraphOptions } from './config'
export type { GraphOptions, ResolvedGraphConfig } from './config'
export { HooksRunner } from './hooks'
export type {
  GraphHooks,
  MutationContext,
  MutationOperation,
  RemovedVertex,
  ReplacedVertex,
  ReplacedEdge,
  BeforeInsertVertexHook,
  AfterInsertVertexHook,
  BeforeInsertEdgeHook,
  AfterInsertEdgeHook,
  BeforeRemoveVertexHook,
  AfterRemoveVertexHook,
  BeforeRemoveEdgeHook,
  AfterRemoveEdgeHook,
  AfterReplaceVertexHook,
  AfterReplaceEdgeHook,
} from './hooks'
export { MutationLock, AsyncMutex } from './lock'
export { silentLogger, consoleLogger } from './logger'
export type { GraphLogger } from './logger'
export type { Graph, Digraph, VertexRef, EdgeRef, GraphStats } from './types'
