import type { Command } from 'commander'
import { Value } from '@sinclair/typebox/value'
import { loadConfig, ConfigError } from '../../config/index.js'
import { HealthPayloadSchema } from '../../types/health.js'
import { output, errorMessage } from '../output.js'

interface CheckOptions {
  url?: string
  config?: string
  timeout: string
}

/** Wildcard bind addresses are probed over loopback */
function probeHost(host: string): string {
  if (host === '0.0.0.0') return '127.0.0.1'
  if (host === '::') return '[::1]'
  return host.includes(':') ? `[${host}]` : host
}

/**
 * Register the `check` command on the Commander program.
 *
 * Probes the /healthz endpoint of a running instance. Exits 0 when the
 * service answers 200 with {"status":"ok"}, 1 otherwise. Suitable as a
 * container HEALTHCHECK.
 */
export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Probe the health endpoint of a running service')
    .option('-u, --url <url>', 'health endpoint URL (default: derived from config)')
    .option('-c, --config <path>', 'configuration file path (optional)')
    .option('-t, --timeout <ms>', 'request timeout in milliseconds', '2000')
    .action(async (options: CheckOptions) => {
      const timeoutMs = Number(options.timeout)
      if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
        output.error(`Invalid timeout: ${options.timeout}`)
        process.exit(1)
        return
      }

      let url = options.url
      if (url === undefined) {
        try {
          const config = loadConfig(options.config)
          url = `http://${probeHost(config.server.host)}:${config.server.port}/healthz`
        } catch (err) {
          if (err instanceof ConfigError) {
            output.error(err.message)
            process.exit(1)
            return
          }
          throw err
        }
      }

      let status: number
      let body: unknown
      try {
        const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) })
        status = res.status
        const text = await res.text()
        try {
          body = JSON.parse(text)
        } catch {
          body = text
        }
      } catch (err) {
        output.error(`${url} unreachable: ${errorMessage(err)}`)
        process.exit(1)
        return
      }

      if (status === 200 && Value.Check(HealthPayloadSchema, body)) {
        output.success(`${url} is healthy`)
        return
      }

      output.error(`${url} is unhealthy (status ${status})`)
      process.exit(1)
    })
}
