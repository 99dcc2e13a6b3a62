/**
 * `pipewright serve`
 *
 * Starts the HTTP surface on server.host:server.port and keeps running
 * until SIGINT/SIGTERM, which closes the listener and then shuts the
 * orchestrator down.
 */

import type { Command } from 'commander'
import { createServer, type Server } from 'node:http'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { PartialPipewrightConfig, PipewrightConfig } from '../../modules/config/config-schema.js'
import { createOrchestrator, type CreateOrchestratorOptions } from '../../core/orchestrator-impl.js'
import type { Orchestrator } from '../../core/orchestrator.js'
import { ConfigError, errorMessage } from '../../core/errors.js'
import { createApp } from '../../server/app.js'
import { setupGracefulShutdown, type ShutdownHandlerOptions } from '../../recovery/shutdown-handler.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('serve-cmd')

export const SERVE_EXIT_ERROR = 1
export const SERVE_EXIT_INVALID = 2

export interface ServeOptions {
  host?: string
  port?: number
  version?: string
  projectConfigDir?: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
  orchestratorOptions?: CreateOrchestratorOptions
  /** Forwarded to the shutdown handler */
  signals?: ShutdownHandlerOptions['signals']
  exit?: ShutdownHandlerOptions['exit']
}

export interface RunningServer {
  readonly server: Server
  readonly orchestrator: Orchestrator
  /** Port actually bound (differs from the configured one for port 0) */
  readonly port: number
  /** Removes the signal handlers */
  readonly dispose: () => void
}

function listen(server: Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject)
    server.listen(port, host, () => {
      server.off('error', reject)
      const address = server.address()
      resolve(address !== null && typeof address === 'object' ? address.port : port)
    })
  })
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err !== undefined ? reject(err) : resolve()))
  })
}

/**
 * Build the orchestrator, bind the listener and install the shutdown handler.
 * @throws {ConfigError} when the configuration is invalid
 */
export async function startServer(opts: ServeOptions = {}): Promise<RunningServer> {
  const cliOverrides: PartialPipewrightConfig = {
    ...((opts.host !== undefined || opts.port !== undefined) && {
      server: {
        ...(opts.host !== undefined && { host: opts.host }),
        ...(opts.port !== undefined && { port: opts.port }),
      },
    }),
  }
  const system = createConfigSystem({
    cliOverrides,
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })
  await system.load()
  const config: PipewrightConfig = system.getConfig()

  const orchestrator = await createOrchestrator(config, opts.orchestratorOptions)
  const app = createApp(orchestrator, { ...(opts.version !== undefined && { version: opts.version }) })
  const server = createServer(app)

  let port: number
  try {
    port = await listen(server, config.server.port, config.server.host)
  } catch (err) {
    await orchestrator.shutdown()
    throw err
  }
  logger.info({ host: config.server.host, port }, 'HTTP server listening')

  const dispose = setupGracefulShutdown({
    orchestrator,
    stopSurface: () => close(server),
    ...(opts.signals !== undefined && { signals: opts.signals }),
    ...(opts.exit !== undefined && { exit: opts.exit }),
  })
  return { server, orchestrator, port, dispose }
}

export function registerServeCommand(program: Command, version: string): void {
  program
    .command('serve')
    .description('Serve the workflow HTTP API')
    .option('--host <host>', 'Bind address (default: server.host)')
    .option('--port <port>', 'Port (default: server.port)', (value) => parseInt(value, 10))
    .option('--project-config-dir <dir>', 'Path to project .pipewright/ directory')
    .option('--global-config-dir <dir>', 'Path to global .pipewright/ directory')
    .action(async (opts: { host?: string; port?: number; projectConfigDir?: string; globalConfigDir?: string }) => {
      try {
        const running = await startServer({
          version,
          ...(opts.host !== undefined && { host: opts.host }),
          ...(opts.port !== undefined && { port: opts.port }),
          ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
          ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
        })
        process.stdout.write(`  Listening on port ${String(running.port)}\n`)
      } catch (err) {
        process.stderr.write(`  Error: ${errorMessage(err)}\n`)
        process.exit(err instanceof ConfigError ? SERVE_EXIT_INVALID : SERVE_EXIT_ERROR)
      }
    })
}
