/**
 * Mutation Hooks
 *
 * Lifecycle hooks for graph mutations. Before-hooks run while the mutation
 * lock is held and may throw to abort the mutation; nothing has changed at
 * that point. After-hooks run once the lock is released, so they may mutate
 * the graph themselves.
 *
 * An error thrown by an after-hook reaches the caller of the mutation, but the
 * mutation has already been applied and stays in place. Later after-hooks for
 * the same call do not run.
 */

import type { Edge, Vertex } from '../model'

// =============================================================================
// HOOK CONTEXT
// =============================================================================

export type MutationOperation =
  | 'insertVertex'
  | 'insertEdge'
  | 'removeVertex'
  | 'removeEdge'
  | 'replaceVertex'
  | 'replaceEdge'
  | 'clear'

/**
 * Context passed to mutation hooks.
 */
export interface MutationContext {
  /** Operation being performed */
  operation: MutationOperation
  /** Whether the mutated graph is directed */
  directed: boolean
  /** Timestamp when the hook was invoked */
  timestamp: Date
}

/**
 * Result of a vertex removal, including the edges removed with it.
 */
export interface RemovedVertex<V, E> {
  element: V
  edges: Edge<V, E>[]
}

export interface ReplacedVertex<V> {
  previous: V
  vertex: Vertex<V>
}

export interface ReplacedEdge<V, E> {
  previous: E
  edge: Edge<V, E>
}

// =============================================================================
// HOOK TYPES
// =============================================================================

export type BeforeInsertVertexHook<V> = (element: V, ctx: MutationContext) => void
export type AfterInsertVertexHook<V> = (vertex: Vertex<V>, ctx: MutationContext) => void

export type BeforeInsertEdgeHook<V, E> = (
  endpointA: Vertex<V>,
  endpointB: Vertex<V>,
  element: E,
  ctx: MutationContext,
) => void
export type AfterInsertEdgeHook<V, E> = (edge: Edge<V, E>, ctx: MutationContext) => void

export type BeforeRemoveVertexHook<V> = (vertex: Vertex<V>, ctx: MutationContext) => void
export type AfterRemoveVertexHook<V, E> = (result: RemovedVertex<V, E>, ctx: MutationContext) => void

export type BeforeRemoveEdgeHook<V, E> = (edge: Edge<V, E>, ctx: MutationContext) => void
export type AfterRemoveEdgeHook<V, E> = (edge: Edge<V, E>, ctx: MutationContext) => void

export type AfterReplaceVertexHook<V> = (result: ReplacedVertex<V>, ctx: MutationContext) => void
export type AfterReplaceEdgeHook<V, E> = (result: ReplacedEdge<V, E>, ctx: MutationContext) => void

// =============================================================================
// HOOKS CONFIGURATION
// =============================================================================

/**
 * All available mutation hooks.
 */
export interface GraphHooks<V, E> {
  // Vertex lifecycle
  beforeInsertVertex?: BeforeInsertVertexHook<V> | BeforeInsertVertexHook<V>[]
  afterInsertVertex?: AfterInsertVertexHook<V> | AfterInsertVertexHook<V>[]
  beforeRemoveVertex?: BeforeRemoveVertexHook<V> | BeforeRemoveVertexHook<V>[]
  afterRemoveVertex?: AfterRemoveVertexHook<V, E> | AfterRemoveVertexHook<V, E>[]
  afterReplaceVertex?: AfterReplaceVertexHook<V> | AfterReplaceVertexHook<V>[]

  // Edge lifecycle
  beforeInsertEdge?: BeforeInsertEdgeHook<V, E> | BeforeInsertEdgeHook<V, E>[]
  afterInsertEdge?: AfterInsertEdgeHook<V, E> | AfterInsertEdgeHook<V, E>[]
  beforeRemoveEdge?: BeforeRemoveEdgeHook<V, E> | BeforeRemoveEdgeHook<V, E>[]
  afterRemoveEdge?: AfterRemoveEdgeHook<V, E> | AfterRemoveEdgeHook<V, E>[]
  afterReplaceEdge?: AfterReplaceEdgeHook<V, E> | AfterReplaceEdgeHook<V, E>[]
}

// =============================================================================
// HOOKS RUNNER
// =============================================================================

/**
 * Runs mutation hooks in registration order.
 */
export class HooksRunner<V, E> {
  constructor(
    private readonly directed: boolean,
    private readonly hooks: GraphHooks<V, E> = {},
  ) {}

  private createContext(operation: MutationOperation): MutationContext {
    return {
      operation,
      directed: this.directed,
      timestamp: new Date(),
    }
  }

  private toArray<T>(hook: T | T[] | undefined): T[] {
    if (!hook) return []
    return Array.isArray(hook) ? hook : [hook]
  }

  // Vertex hooks

  runBeforeInsertVertex(element: V): void {
    const ctx = this.createContext('insertVertex')
    for (const hook of this.toArray(this.hooks.beforeInsertVertex)) {
      hook(element, ctx)
    }
  }

  runAfterInsertVertex(vertex: Vertex<V>): void {
    const ctx = this.createContext('insertVertex')
    for (const hook of this.toArray(this.hooks.afterInsertVertex)) {
      hook(vertex, ctx)
    }
  }

  runBeforeRemoveVertex(vertex: Vertex<V>): void {
    const ctx = this.createContext('removeVertex')
    for (const hook of this.toArray(this.hooks.beforeRemoveVertex)) {
      hook(vertex, ctx)
    }
  }

  runAfterRemoveVertex(result: RemovedVertex<V, E>): void {
    const ctx = this.createContext('removeVertex')
    for (const hook of this.toArray(this.hooks.afterRemoveVertex)) {
      hook(result, ctx)
    }
  }

  runAfterReplaceVertex(result: ReplacedVertex<V>): void {
    const ctx = this.createContext('replaceVertex')
    for (const hook of this.toArray(this.hooks.afterReplaceVertex)) {
      hook(result, ctx)
    }
  }

  // Edge hooks

  runBeforeInsertEdge(endpointA: Vertex<V>, endpointB: Vertex<V>, element: E): void {
    const ctx = this.createContext('insertEdge')
    for (const hook of this.toArray(this.hooks.beforeInsertEdge)) {
      hook(endpointA, endpointB, element, ctx)
    }
  }

  runAfterInsertEdge(edge: Edge<V, E>): void {
    const ctx = this.createContext('insertEdge')
    for (const hook of this.toArray(this.hooks.afterInsertEdge)) {
      hook(edge, ctx)
    }
  }

  runBeforeRemoveEdge(edge: Edge<V, E>): void {
    const ctx = this.createContext('removeEdge')
    for (const hook of this.toArray(this.hooks.beforeRemoveEdge)) {
      hook(edge, ctx)
    }
  }

  runAfterRemoveEdge(edge: Edge<V, E>): void {
    const ctx = this.createContext('removeEdge')
    for (const hook of this.toArray(this.hooks.afterRemoveEdge)) {
      hook(edge, ctx)
    }
  }

  runAfterReplaceEdge(result: ReplacedEdge<V, E>): void {
    const ctx = this.createContext('replaceEdge')
    for (const hook of this.toArray(this.hooks.afterReplaceEdge)) {
      hook(result, ctx)
    }
  }
}
