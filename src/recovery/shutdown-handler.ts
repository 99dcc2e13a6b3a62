/**
 * setupGracefulShutdown - registers SIGTERM and SIGINT handlers for clean process exit.
 *
 * On signal receipt:
 *  1. Stops the given surface (e.g. closes the HTTP listener)
 *  2. Shuts the orchestrator down: aborts every workflow, awaits the
 *     background tasks, closes the store
 *  3. Exits with code 0 (1 when a step failed)
 *
 * Returns a cleanup function that removes the listeners (for test teardown).
 */

import type { EventEmitter } from 'node:events'
import type pino from 'pino'
import type { Orchestrator } from '../core/orchestrator.js'
import { createLogger } from '../utils/logger.js'

const defaultLogger = createLogger('shutdown-handler')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ShutdownHandlerOptions {
  orchestrator: Pick<Orchestrator, 'shutdown'>
  /** Runs before the orchestrator shuts down */
  stopSurface?: () => Promise<void>
  logger?: pino.Logger
  /** Injected for tests; defaults to process.exit */
  exit?: (code: number) => void
  /** Signal source; defaults to process */
  signals?: EventEmitter
}

// ---------------------------------------------------------------------------
// setupGracefulShutdown
// ---------------------------------------------------------------------------

/**
 * Register SIGTERM and SIGINT handlers for graceful shutdown.
 * A second signal while shutting down is ignored.
 *
 * @returns Cleanup function that removes the signal listeners
 */
export function setupGracefulShutdown(options: ShutdownHandlerOptions): () => void {
  const { orchestrator, stopSurface } = options
  const log = options.logger ?? defaultLogger
  const exit = options.exit ?? ((code: number) => process.exit(code))
  const signals: EventEmitter = options.signals ?? process
  let shuttingDown = false

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return
    shuttingDown = true
    log.info({ signal }, 'Graceful shutdown initiated')

    let exitCode = 0
    if (stopSurface !== undefined) {
      try {
        await stopSurface()
      } catch (err) {
        log.error({ err }, 'Failed to stop the surface')
        exitCode = 1
      }
    }
    try {
      await orchestrator.shutdown()
    } catch (err) {
      log.error({ err }, 'Orchestrator shutdown failed')
      exitCode = 1
    }

    log.info({ exitCode }, 'Graceful shutdown complete')
    exit(exitCode)
  }

  const sigintHandler = (): void => {
    void shutdown('SIGINT')
  }

  const sigtermHandler = (): void => {
    void shutdown('SIGTERM')
  }

  signals.on('SIGINT', sigintHandler)
  signals.on('SIGTERM', sigtermHandler)

  // Return cleanup function for test teardown
  return (): void => {
    signals.removeListener('SIGINT', sigintHandler)
    signals.removeListener('SIGTERM', sigtermHandler)
  }
}
