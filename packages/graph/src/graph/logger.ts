/**
 * Logger injected through graph options. The engine only emits debug traces;
 * nothing is logged unless a logger is supplied.
 */
export interface GraphLogger {
  debug(message: string, meta?: Record<string, unknown>): void
}

export const silentLogger: GraphLogger = {
  debug: () => {},
}

export function consoleLogger(prefix = '[weavegraph]'): GraphLogger {
  return {
    debug: (message, meta) => {
      if (meta) console.debug(`${prefix} ${message}`, meta)
      else console.debug(`${prefix} ${message}`)
    },
  }
}
