import type { Command } from 'commander'
import { loadConfig, ConfigError } from '../../config/index.js'
import { AccessLogger } from '../../access-log/index.js'
import { HelloServer, ServerStartError } from '../../server/index.js'
import type { ServiceConfig } from '../../types/config.js'
import { onShutdownSignals } from '../signals.js'
import { output, errorMessage } from '../output.js'

interface StartOptions {
  config?: string
  port?: string
  host?: string
}

/**
 * Register the `start` command on the Commander program.
 *
 * Loads configuration, opens the access log when enabled, binds the HTTP
 * server and stays in the foreground until SIGINT/SIGTERM.
 */
export function registerStartCommand(program: Command): void {
  program
    .command('start')
    .description('Start the HTTP service')
    .option('-c, --config <path>', 'configuration file path (optional)')
    .option('-p, --port <port>', 'port to listen on, overrides config')
    .option('-H, --host <host>', 'address to bind, overrides config')
    .action(async (options: StartOptions) => {
      // 1. Load and validate configuration
      let config: ServiceConfig
      try {
        config = loadConfig(options.config, {
          server: {
            port: options.port !== undefined ? Number(options.port) : undefined,
            host: options.host,
          },
        })
      } catch (err) {
        if (err instanceof ConfigError) {
          output.error(err.message)
          process.exit(1)
          return
        }
        throw err
      }

      // 2. Access log, if enabled
      let accessLog: AccessLogger | undefined
      if (config.accessLog.enabled) {
        try {
          accessLog = new AccessLogger(config.accessLog.path)
        } catch (err) {
          output.error(`Cannot open access log ${config.accessLog.path}: ${errorMessage(err)}`)
          process.exit(1)
          return
        }
        output.info(`Access log: ${accessLog.path}`)
      }

      // 3. Bind
      const server = new HelloServer(config, {
        accessLog,
        onError: (err) => output.error(`Request error: ${errorMessage(err)}`),
      })

      try {
        await server.start()
      } catch (err) {
        if (err instanceof ServerStartError) {
          output.error(err.message)
          process.exit(1)
          return
        }
        throw err
      }

      if (config.greeting.delayMs > 0) {
        output.warn(`Greeting delayed by ${config.greeting.delayMs}ms`)
      }
      output.success(`Listening on http://${config.server.host}:${server.port ?? config.server.port}`)

      // 4. Clean shutdown on signals
      const shutdown = async (): Promise<void> => {
        try {
          await server.stop()
        } catch (err) {
          output.warn(`Error while stopping: ${errorMessage(err)}`)
        }
        output.info('Server stopped')
        process.exit(0)
      }

      onShutdownSignals(() => void shutdown())
    })
}
