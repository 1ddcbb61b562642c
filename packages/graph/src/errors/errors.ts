/**
 * Custom Error Classes
 */

/**
 * Base error for all graph errors.
 */
export class GraphError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'GraphError'
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === 'function') {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Invalid vertex error.
 * Thrown for a missing, foreign or absent vertex.
 */
export class InvalidVertexError extends GraphError {
  constructor(
    message: string,
    public readonly element?: unknown,
  ) {
    super(message)
    this.name = 'InvalidVertexError'
  }
}

/**
 * Thrown when a vertex element is already in use on insert or replace.
 */
export class DuplicateVertexError extends InvalidVertexError {
  constructor(element: unknown) {
    super(`There's already a vertex with this element: ${String(element)}`, element)
    this.name = 'DuplicateVertexError'
  }
}

/**
 * Invalid edge error.
 * Thrown for a missing, foreign or absent edge, or a weight that is not a finite number.
 */
export class InvalidEdgeError extends GraphError {
  constructor(
    message: string,
    public readonly element?: unknown,
  ) {
    super(message)
    this.name = 'InvalidEdgeError'
  }
}

/**
 * Thrown when an edge element is already in use on insert or replace.
 */
export class DuplicateEdgeError extends InvalidEdgeError {
  constructor(element: unknown) {
    super(`There's already an edge with this element: ${String(element)}`, element)
    this.name = 'DuplicateEdgeError'
  }
}

/**
 * Invalid traversal error.
 * Thrown when a path is extended with an edge that does not leave its tail.
 */
export class InvalidTraversalError extends GraphError {
  constructor(
    public readonly tail: string,
    public readonly edge: string,
  ) {
    super(`Cannot walk edge ${edge} from ${tail}`)
    this.name = 'InvalidTraversalError'
  }
}

/**
 * Thrown when a mutation starts while another mutation of the same graph is running,
 * e.g. from inside a before-hook.
 */
export class ConcurrentMutationError extends GraphError {
  constructor(
    public readonly operation: string,
    public readonly running: string,
  ) {
    super(`Cannot run ${operation} while ${running} is in progress`)
    this.name = 'ConcurrentMutationError'
  }
}

/**
 * A single configuration or input issue.
 */
export interface GraphIssue {
  path: string
  message: string
}

/**
 * Configuration error.
 * Thrown when graph options do not match the options schema.
 */
export class GraphConfigError extends GraphError {
  constructor(
    message: string,
    public readonly issues: GraphIssue[] = [],
  ) {
    super(message)
    this.name = 'GraphConfigError'
  }
}
