/**
 * Service lifecycle registry.
 *
 * Stateful collaborators (the template store, the progress store) register
 * here so that startup opens them in order and shutdown closes them in
 * reverse. Only services whose initialize() resolved are ever shut down.
 */

import { createLogger } from '../utils/logger.js'

const logger = createLogger('services')

// ---------------------------------------------------------------------------
// BaseService interface
// ---------------------------------------------------------------------------

/** Lifecycle of a stateful collaborator */
export interface BaseService {
  /** Open connections, run migrations, subscribe to events */
  initialize(): Promise<void>

  /** Release everything initialize() acquired */
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

/**
 * @example
 * const registry = new ServiceRegistry()
 * registry.register('templateStore', store)
 * registry.register('progress', progress)
 * await registry.initializeAll()
 * // ...
 * await registry.shutdownAll()
 */
export class ServiceRegistry {
  private readonly _services: { name: string; service: BaseService }[] = []
  /** Names of initialized services, in initialization order */
  private readonly _running: string[] = []

  /** @throws {Error} if the name is already registered */
  register(name: string, service: BaseService): void {
    if (this._services.some((entry) => entry.name === name)) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._services.push({ name, service })
  }

  get serviceNames(): string[] {
    return this._services.map((entry) => entry.name)
  }

  /**
   * Initialize in registration order. On the first failure the services
   * already running are shut down and the failure is rethrown.
   */
  async initializeAll(): Promise<void> {
    for (const { name, service } of this._services) {
      if (this._running.includes(name)) continue
      try {
        await service.initialize()
      } catch (err) {
        logger.error({ service: name, err }, 'Service initialization failed, shutting down the others')
        try {
          await this.shutdownAll()
        } catch (shutdownErr) {
          logger.error({ err: shutdownErr }, 'Error during cleanup after failed initialization')
        }
        throw err
      }
      this._running.push(name)
    }
  }

  /**
   * Shut down running services in reverse initialization order. Every
   * service gets its turn; failures are rethrown together as an AggregateError.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []
    while (this._running.length > 0) {
      const name = this._running.pop()
      const service = this._services.find((entry) => entry.name === name)?.service
      if (service === undefined) continue
      try {
        await service.shutdown()
      } catch (err) {
        errors.push(err instanceof Error ? err : new Error(String(err)))
      }
    }
    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${String(errors.length)} service(s)`)
    }
  }
}
