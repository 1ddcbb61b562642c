/**
 * Graph Options
 *
 * Options accepted by `createGraph` / `createDigraph`, validated against a zod
 * schema before the graph is built. Validation only checks the shape; the
 * typed options object is what the graph keeps.
 */

import { z } from 'zod'
import { GraphConfigError } from '../errors'
import {
  constantWeight,
  defaultLabel,
  identityKey,
  type ElementKey,
  type LabelExtractor,
  type WeightExtractor,
} from '../model'
import type { GraphHooks } from './hooks'
import { silentLogger, type GraphLogger } from './logger'

// =============================================================================
// OPTIONS
// =============================================================================

export interface GraphOptions<V, E> {
  /** Resolves an edge weight when `insertEdge` gets none (defaults to a constant 1) */
  weight?: WeightExtractor<E>
  /** Vertex label (defaults to `String(element)`) */
  vertexLabel?: LabelExtractor<V>
  /** Edge label (defaults to `String(element)`) */
  edgeLabel?: LabelExtractor<E>
  /** Vertex equality key (defaults to the element itself) */
  vertexKey?: ElementKey<V>
  /** Edge equality key (defaults to the element itself) */
  edgeKey?: ElementKey<E>
  /** Lifecycle hooks */
  hooks?: GraphHooks<V, E>
  /** Debug sink */
  logger?: GraphLogger
  /** Whether an edge may connect a vertex to itself */
  allowSelfLoops?: boolean
}

export interface ResolvedGraphConfig<V, E> {
  weight: WeightExtractor<E>
  vertexLabel: LabelExtractor<V>
  edgeLabel: LabelExtractor<E>
  vertexKey: ElementKey<V>
  edgeKey: ElementKey<E>
  hooks: GraphHooks<V, E>
  logger: GraphLogger
  allowSelfLoops: boolean
}

// =============================================================================
// SCHEMA
// =============================================================================

const fn = z.custom<(...args: never[]) => unknown>((value) => typeof value === 'function', {
  message: 'Expected a function',
})

const hook = z.union([fn, z.array(fn)])

export const graphHooksSchema = z
  .object({
    beforeInsertVertex: hook,
    afterInsertVertex: hook,
    beforeRemoveVertex: hook,
    afterRemoveVertex: hook,
    afterReplaceVertex: hook,
    beforeInsertEdge: hook,
    afterInsertEdge: hook,
    beforeRemoveEdge: hook,
    afterRemoveEdge: hook,
    afterReplaceEdge: hook,
  })
  .partial()
  .strict()

export const graphLoggerSchema = z.object({
  debug: fn,
})

export const graphOptionsSchema = z
  .object({
    weight: fn,
    vertexLabel: fn,
    edgeLabel: fn,
    vertexKey: fn,
    edgeKey: fn,
    hooks: graphHooksSchema,
    logger: graphLoggerSchema,
    allowSelfLoops: z.boolean(),
  })
  .partial()
  .strict()

export const defaultGraphOptions = {
  allowSelfLoops: true,
} as const

// =============================================================================
// RESOLUTION
// =============================================================================

/**
 * Validate options and fill in defaults.
 * @throws GraphConfigError if the options do not match the schema
 */
export function resolveGraphOptions<V, E>(options: GraphOptions<V, E> = {}): ResolvedGraphConfig<V, E> {
  const result = graphOptionsSchema.safeParse(options)
  if (!result.success) {
    const issues = result.error.errors.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }))
    const first = issues[0]
    throw new GraphConfigError(
      `Invalid graph options: ${first ? `${first.path || '(root)'}: ${first.message}` : 'validation failed'}`,
      issues,
    )
  }

  return {
    weight: options.weight ?? constantWeight<E>(),
    vertexLabel: options.vertexLabel ?? defaultLabel,
    edgeLabel: options.edgeLabel ?? defaultLabel,
    vertexKey: options.vertexKey ?? identityKey,
    edgeKey: options.edgeKey ?? identityKey,
    hooks: options.hooks ?? {},
    logger: options.logger ?? silentLogger,
    allowSelfLoops: options.allowSelfLoops ?? defaultGraphOptions.allowSelfLoops,
  }
}
