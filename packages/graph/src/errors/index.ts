/**
 * Errors Module
 */

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
