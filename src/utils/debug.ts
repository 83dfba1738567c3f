import debug from 'debug'

/** Root namespace shared by every rolevirt logger */
export const DEBUG_NAMESPACE = 'rolevirt'

/** Sub-channels used across the codebase */
export type LogLevel = 'error' | 'warn' | 'info'

/**
 * Debugger wraps the `debug` package with one default channel per module
 * and lazily created sub-channels per level.
 *
 * Enable with `DEBUG=rolevirt:*` (everything) or e.g. `DEBUG=rolevirt:*:error`.
 *
 * @example
 * const log = new Debugger('orchestrator')
 * log.log('Creating network')            // rolevirt:orchestrator
 * log.log('warn', 'Rollback step failed') // rolevirt:orchestrator:warn
 */
export class Debugger {
  private channels: Map<string, debug.Debugger> = new Map()

  constructor (private readonly module: string) {
    this.channels.set('default', debug(`${DEBUG_NAMESPACE}:${module}`))
  }

  log (message: string): void
  log (level: LogLevel, message: string): void
  log (levelOrMessage: string, message?: string): void {
    if (message === undefined) {
      this.channel('default')(levelOrMessage)
      return
    }
    this.channel(levelOrMessage)(message)
  }

  private channel (name: string): debug.Debugger {
    let existing = this.channels.get(name)
    if (!existing) {
      existing = debug(`${DEBUG_NAMESPACE}:${this.module}:${name}`)
      this.channels.set(name, existing)
    }
    return existing
  }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage (error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message
  }
  return String(error)
}
