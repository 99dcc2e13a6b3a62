/**
 * Public API for the recovery module.
 */

export { setupGracefulShutdown, type ShutdownHandlerOptions } from './shutdown-handler.js'
