export { Vertex } from './vertex'
export type { VertexInit } from './vertex'
export { Edge, rewireEdge, renameEdge } from './edge'
export type { EdgeInit, EdgeProperties } from './edge'
export { sameKey } from './handle'
export type { ElementHandle } from './handle'
export {
  DEFAULT_WEIGHT,
  identityKey,
  constantWeight,
  propertyWeight,
  defaultLabel,
  propertyLabel,
} from './extractors'
export type { ElementKey, WeightExtractor, LabelExtractor } from './extractors'
