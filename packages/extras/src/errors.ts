import { GraphError, type GraphIssue } from '@weavegraph/graph'

/**
 * Snapshot error.
 * Thrown when a snapshot cannot be read back into a graph.
 */
export class SnapshotError extends GraphError {
  constructor(
    message: string,
    public readonly issues: GraphIssue[] = [],
    cause?: Error,
  ) {
    super(message, cause)
    this.name = 'SnapshotError'
  }
}
