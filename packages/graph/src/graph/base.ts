/**
 * Base Graph
 *
 * Storage, validation and mutation shared by the undirected and directed
 * graphs. Subclasses only decide which edges count as incident to a vertex and
 * which edges can be walked from it.
 *
 * Every operation validates its arguments before touching the store, so a
 * failed call leaves the graph unchanged.
 */

import {
  DuplicateEdgeError,
  DuplicateVertexError,
  InvalidEdgeError,
  InvalidVertexError,
} from '../errors'
import { Edge, Vertex, renameEdge, type EdgeProperties, type ElementHandle } from '../model'
import { Path } from '../path'
import { shortestPath } from '../search'
import { EdgeListStore } from '../store'
import { resolveGraphOptions, type GraphOptions, type ResolvedGraphConfig } from './config'
import { HooksRunner, type RemovedVertex } from './hooks'
import { AsyncMutex, MutationLock } from './lock'
import type { GraphLogger } from './logger'
import type { EdgeRef, Graph, GraphStats, VertexRef } from './types'

let graphIds = 0

export abstract class BaseGraph<V, E> implements Graph<V, E> {
  readonly directed: boolean
  readonly logger: GraphLogger

  /** Owner id stamped on every handle this graph creates */
  protected readonly id: number
  protected readonly store = new EdgeListStore<V, E>()
  protected readonly config: ResolvedGraphConfig<V, E>
  protected readonly hooks: HooksRunner<V, E>

  private readonly lock = new MutationLock()
  private readonly mutex = new AsyncMutex()
  private nextSlot = 0

  protected constructor(directed: boolean, options?: GraphOptions<V, E>) {
    this.config = resolveGraphOptions(options)
    this.directed = directed
    this.logger = this.config.logger
    this.hooks = new HooksRunner(directed, this.config.hooks)
    this.id = ++graphIds
  }

  abstract incidentEdges(ref: VertexRef<V>): Edge<V, E>[]

  abstract traversableEdges(vertex: Vertex<V>): Edge<V, E>[]

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  numVertices(): number {
    return this.store.stats().vertices
  }

  numEdges(): number {
    return this.store.stats().edges
  }

  vertices(): Vertex<V>[] {
    return this.store.getAllVertices()
  }

  edges(): Edge<V, E>[] {
    return this.store.getAllEdges()
  }

  hasVertex(ref: VertexRef<V>): boolean {
    return this.findVertex(ref) !== undefined
  }

  hasEdge(ref: EdgeRef<V, E>): boolean {
    return this.findEdge(ref) !== undefined
  }

  vertex(element: V): Vertex<V> | undefined {
    return this.store.getVertex(this.config.vertexKey(element))
  }

  getEdge(element: E): Edge<V, E> | undefined {
    return this.store.getEdge(this.config.edgeKey(element))
  }

  areAdjacent(u: VertexRef<V>, v: VertexRef<V>): boolean {
    return this.connecting(this.resolveVertex(u), this.resolveVertex(v)).length > 0
  }

  opposite(vertex: VertexRef<V>, edge: EdgeRef<V, E>): Vertex<V> | undefined {
    const resolvedVertex = this.resolveVertex(vertex)
    return this.resolveEdge(edge).opposite(resolvedVertex)
  }

  edge(a: VertexRef<V>, b: VertexRef<V>): Edge<V, E> | undefined {
    let lightest: Edge<V, E> | undefined
    for (const candidate of this.connecting(this.resolveVertex(a), this.resolveVertex(b))) {
      if (!lightest || candidate.weight < lightest.weight) {
        lightest = candidate
      }
    }
    return lightest
  }

  pathFrom(ref: VertexRef<V>): Path<V, E> {
    return Path.startFrom(this, this.resolveVertex(ref))
  }

  dijkstra(source: VertexRef<V>, destination: VertexRef<V>): Path<V, E> | undefined {
    return shortestPath(this, this.resolveVertex(source), this.resolveVertex(destination))
  }

  stats(): GraphStats {
    return { ...this.store.stats(), directed: this.directed }
  }

  exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.mutex.acquire(fn)
  }

  // ===========================================================================
  // VERTEX MUTATIONS
  // ===========================================================================

  insertVertex(element: V): Vertex<V> {
    const vertex = this.lock.run('insertVertex', () => {
      const key = this.config.vertexKey(element)
      if (this.store.hasVertex(key)) {
        throw new DuplicateVertexError(element)
      }

      this.hooks.runBeforeInsertVertex(element)

      const created = new Vertex({
        element,
        key,
        label: this.config.vertexLabel(element),
        handle: this.allocate(),
      })
      this.store.addVertex(created)
      return created
    })

    this.hooks.runAfterInsertVertex(vertex)
    return vertex
  }

  removeVertex(ref: VertexRef<V>): V {
    const result = this.lock.run('removeVertex', (): RemovedVertex<V, E> => {
      const vertex = this.resolveVertex(ref)
      this.hooks.runBeforeRemoveVertex(vertex)
      return { element: vertex.element, edges: this.store.deleteVertex(vertex.key) }
    })

    if (result.edges.length > 0) {
      this.logger.debug('removed vertex with its edges', {
        vertex: String(result.element),
        edges: result.edges.map((edge) => edge.label),
      })
    }
    this.hooks.runAfterRemoveVertex(result)
    return result.element
  }

  replace(vertex: Vertex<V>, element: V): V
  replace(edge: Edge<V, E>, element: E): E
  replace(...args: [Vertex<V>, V] | [Edge<V, E>, E]): V | E {
    if (isEdgeReplacement<V, E>(args)) {
      return this.replaceEdge(args[0], args[1])
    }
    return this.replaceVertex(args[0], args[1])
  }

  replaceVertex(ref: VertexRef<V>, element: V): V {
    const result = this.lock.run('replaceVertex', () => {
      const key = this.config.vertexKey(element)
      if (this.store.hasVertex(key)) {
        throw new DuplicateVertexError(element)
      }

      const previous = this.resolveVertex(ref)
      const vertex = new Vertex({
        element,
        key,
        label: this.config.vertexLabel(element),
        handle: this.allocate(),
      })
      const rewired = this.store.replaceVertex(previous.key, vertex)
      return { previous: previous.element, vertex, rewired }
    })

    this.logger.debug('replaced vertex element', {
      previous: String(result.previous),
      vertex: result.vertex.label,
      rewired: result.rewired.length,
    })
    this.hooks.runAfterReplaceVertex({ previous: result.previous, vertex: result.vertex })
    return result.previous
  }

  // ===========================================================================
  // EDGE MUTATIONS
  // ===========================================================================

  insertEdge(
    u: VertexRef<V>,
    v: VertexRef<V>,
    element: E,
    weight?: number,
    properties: EdgeProperties = {},
  ): Edge<V, E> {
    const edge = this.lock.run('insertEdge', () => {
      const key = this.config.edgeKey(element)
      if (this.store.hasEdge(key)) {
        throw new DuplicateEdgeError(element)
      }

      const endpointA = this.resolveVertex(u)
      const endpointB = this.resolveVertex(v)
      if (!this.config.allowSelfLoops && endpointA.equals(endpointB)) {
        throw new InvalidEdgeError(`Self-loops are not allowed: ${String(element)}`, element)
      }

      this.hooks.runBeforeInsertEdge(endpointA, endpointB, element)

      const resolvedWeight = weight ?? this.config.weight(element)
      if (!Number.isFinite(resolvedWeight)) {
        throw new InvalidEdgeError(`Edge weight must be a finite number, got ${resolvedWeight}`, element)
      }

      const created = new Edge<V, E>({
        endpointA,
        endpointB,
        directed: this.directed,
        weight: resolvedWeight,
        element,
        key,
        label: this.config.edgeLabel(element),
        properties,
        handle: this.allocate(),
      })
      this.store.addEdge(created)
      return created
    })

    this.hooks.runAfterInsertEdge(edge)
    return edge
  }

  removeEdge(edge: EdgeRef<V, E>): E
  removeEdge(u: VertexRef<V>, v: VertexRef<V>): E | undefined
  removeEdge(...args: [EdgeRef<V, E>] | [VertexRef<V>, VertexRef<V>]): E | undefined {
    let removed: Edge<V, E> | undefined
    if (args.length === 1) {
      const [ref] = args
      removed = this.lock.run('removeEdge', () => this.deleteEdge(this.resolveEdge(ref)))
    } else {
      const [u, v] = args
      removed = this.lock.run('removeEdge', () => {
        const [first] = this.connecting(this.resolveVertex(u), this.resolveVertex(v))
        return first ? this.deleteEdge(first) : undefined
      })
    }

    if (!removed) return undefined
    this.hooks.runAfterRemoveEdge(removed)
    return removed.element
  }

  replaceEdge(ref: EdgeRef<V, E>, element: E): E {
    const result = this.lock.run('replaceEdge', () => {
      const key = this.config.edgeKey(element)
      if (this.store.hasEdge(key)) {
        throw new DuplicateEdgeError(element)
      }

      const previous = this.resolveEdge(ref)
      const edge = renameEdge(previous, element, key, this.config.edgeLabel(element))
      this.store.replaceEdge(previous.key, edge)
      return { previous: previous.element, edge }
    })

    this.hooks.runAfterReplaceEdge(result)
    return result.previous
  }

  clear(): void {
    this.lock.run('clear', () => this.store.clear())
    this.logger.debug('cleared graph', { directed: this.directed })
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  toString(): string {
    const lines = [
      `${this.directed ? 'Digraph' : 'Graph'} with ${this.numVertices()} vertices and ${this.numEdges()} edges:`,
      '--- Vertices:',
      ...this.vertices().map((vertex) => `\t${vertex.toString()}`),
      '',
      '--- Edges:',
      ...this.edges().map((edge) => `\t${edge.toString()}`),
    ]
    return lines.join('\n')
  }

  /**
   * Stored vertex for `ref`.
   * @throws InvalidVertexError if `ref` is null, foreign or absent
   */
  protected resolveVertex(ref: VertexRef<V> | null | undefined): Vertex<V> {
    if (ref === null || ref === undefined) {
      throw new InvalidVertexError('Null vertex.')
    }

    const vertex = this.findVertex(ref)
    if (vertex) return vertex

    if (ref instanceof Vertex) {
      throw new InvalidVertexError('Vertex does not belong to this graph.', ref.element)
    }
    throw new InvalidVertexError(`No vertex contains ${String(ref)}`, ref)
  }

  /**
   * Stored edge for `ref`.
   * @throws InvalidEdgeError if `ref` is null, foreign or absent
   */
  protected resolveEdge(ref: EdgeRef<V, E> | null | undefined): Edge<V, E> {
    if (ref === null || ref === undefined) {
      throw new InvalidEdgeError('Null edge.')
    }

    const edge = this.findEdge(ref)
    if (edge) return edge

    if (ref instanceof Edge) {
      throw new InvalidEdgeError('Edge does not belong to this graph.', ref.element)
    }
    throw new InvalidEdgeError(`No edge contains ${String(ref)}`, ref)
  }

  /**
   * Edges that can be walked from `a` straight to `b`, in insertion order.
   */
  protected connecting(a: Vertex<V>, b: Vertex<V>): Edge<V, E>[] {
    return this.traversableEdges(a).filter((edge) => edge.opposite(a)?.equals(b) === true)
  }

  private findVertex(ref: VertexRef<V> | null | undefined): Vertex<V> | undefined {
    if (ref === null || ref === undefined) return undefined
    if (ref instanceof Vertex) {
      return ref.handle.owner === this.id ? this.store.getVertex(ref.key) : undefined
    }
    return this.store.getVertex(this.config.vertexKey(ref))
  }

  private findEdge(ref: EdgeRef<V, E> | null | undefined): Edge<V, E> | undefined {
    if (ref === null || ref === undefined) return undefined
    if (ref instanceof Edge) {
      return ref.handle.owner === this.id ? this.store.getEdge(ref.key) : undefined
    }
    return this.store.getEdge(this.config.edgeKey(ref))
  }

  private deleteEdge(edge: Edge<V, E>): Edge<V, E> | undefined {
    this.hooks.runBeforeRemoveEdge(edge)
    return this.store.deleteEdge(edge.key)
  }

  private allocate(): ElementHandle {
    return { owner: this.id, slot: this.nextSlot++ }
  }
}

function isEdgeReplacement<V, E>(args: [Vertex<V>, V] | [Edge<V, E>, E]): args is [Edge<V, E>, E] {
  return args[0] instanceof Edge
}
