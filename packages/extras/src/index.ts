/**
 * weavegraph extras
 *
 * Random graph generation and JSON snapshots built on `@weavegraph/graph`.
 *
 * @example
 * ```typescript
 * import { randomGraph, serializeGraph, deserializeGraph, stringCodec } from '@weavegraph/extras'
 *
 * const graph = randomGraph({
 *   nodeSize: 50,
 *   edgeProbability: 0.1,
 *   vertex: (i) => `v${i}`,
 *   edge: (a, b) => `${a}-${b}`,
 *   seed: 7,
 * })
 *
 * const copy = deserializeGraph(serializeGraph(graph, stringCodec), stringCodec)
 * ```
 *
 * @packageDocumentation
 */

export { randomGraph, randomDigraph, mulberry32, randomGraphParamsSchema } from './random'
export type { RandomGraphOptions } from './random'

export {
  exportSnapshot,
  importSnapshot,
  serializeGraph,
  deserializeGraph,
  zodCodec,
  stringCodec,
  graphSnapshotSchema,
  SNAPSHOT_VERSION,
} from './snapshot'
export type { GraphSnapshot, SnapshotCodec } from './snapshot'

export { SnapshotError } from './errors'
