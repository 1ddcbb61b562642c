/**
 * Graph locks.
 *
 * Every mutating call holds the graph's MutationLock for its duration. A call
 * runs to completion before any other code, so the lock only ever rejects
 * re-entrant mutations started from inside a running one.
 *
 * Nothing spans calls: a sequence of reads and writes is not transactional.
 * Callers that interleave awaits and need a consistent view queue the whole
 * sequence on an AsyncMutex (see `Graph.exclusive`).
 */

import { ConcurrentMutationError } from '../errors'
import type { MutationOperation } from './hooks'

export class MutationLock {
  private holder: MutationOperation | null = null

  get held(): boolean {
    return this.holder !== null
  }

  run<T>(operation: MutationOperation, fn: () => T): T {
    if (this.holder !== null) {
      throw new ConcurrentMutationError(operation, this.holder)
    }

    this.holder = operation
    try {
      return fn()
    } finally {
      this.holder = null
    }
  }
}

/**
 * Queues async work so that each callback starts only after every earlier one
 * has settled. A rejection goes to the caller of that `acquire` only; the
 * queue moves on either way.
 */
export class AsyncMutex {
  private tail: Promise<unknown> = Promise.resolve()

  acquire<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(fn)
    // the rejection is delivered through `run`
    this.tail = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }
}
