import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync, existsSync, readFileSync, writeFileSync } from 'node:fs'
import { createServer, type Server, type RequestListener } from 'node:http'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { Command } from 'commander'
import { registerStartCommand } from './commands/start.js'
import { registerInitCommand } from './commands/init.js'
import { registerCheckCommand } from './commands/check.js'
import { onShutdownSignals } from './signals.js'
import { ServerStartError } from '../server/index.js'
import { createApiRouter } from '../api/router.js'
import { createRouteTable } from '../api/route-table.js'
import { DEFAULT_CONFIG } from '../config/defaults.js'
import { ENV_PREFIX } from '../config/loader.js'
import type { ServiceConfig } from '../types/config.js'
import type { HelloServerOptions } from '../server/server.js'

const serverMocks = vi.hoisted(() => ({
  start: vi.fn(async (_port?: number, _host?: string): Promise<void> => undefined),
  stop: vi.fn(async (): Promise<void> => undefined),
  created: [] as Array<{ config: unknown; options: unknown }>,
}))

// Replace the HTTP server so `start` never binds a real socket
vi.mock('../server/index.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../server/index.js')>()
  class MockHelloServer {
    start = serverMocks.start
    stop = serverMocks.stop
    port = 4321
    constructor(config: ServiceConfig, options: HelloServerOptions = {}) {
      serverMocks.created.push({ config, options })
    }
  }
  return { ...actual, HelloServer: MockHelloServer }
})

vi.mock('./signals.js', () => ({
  onShutdownSignals: vi.fn(),
}))

describe('CLI', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'sre-hello-cli-test-'))
    serverMocks.start.mockResolvedValue(undefined)
    serverMocks.stop.mockResolvedValue(undefined)
    serverMocks.created.length = 0
  })

  afterEach(() => {
    vi.restoreAllMocks()
    vi.clearAllMocks()
    for (const key of Object.keys(process.env)) {
      if (key.startsWith(ENV_PREFIX)) {
        delete process.env[key]
      }
    }
    rmSync(tempDir, { recursive: true, force: true })
  })

  function createProgram(): Command {
    const program = new Command()
    program
      .name('sre-hello')
      .description('Greeting and health-check HTTP service')
      .version('1.0.0')
      .exitOverride()
    registerStartCommand(program)
    registerInitCommand(program)
    registerCheckCommand(program)
    return program
  }

  function writtenTo(spy: { mock: { calls: ReadonlyArray<ReadonlyArray<unknown>> } }): string[] {
    return spy.mock.calls.map((c) => String(c[0]))
  }

  describe('help output', () => {
    it('should list all commands in help', () => {
      const help = createProgram().helpInformation()
      expect(help).toContain('start')
      expect(help).toContain('init')
      expect(help).toContain('check')
    })
  })

  describe('init command', () => {
    it('should write the default configuration', () => {
      const configPath = join(tempDir, 'sre-hello.config.json')
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      vi.spyOn(process.stdout, 'write').mockReturnValue(true)

      createProgram().parse(['node', 'sre-hello', 'init', '--output', configPath])

      expect(exitSpy).not.toHaveBeenCalled()
      expect(existsSync(configPath)).toBe(true)
      const written: unknown = JSON.parse(readFileSync(configPath, 'utf-8'))
      expect(written).toEqual(DEFAULT_CONFIG)
    })

    it('should refuse to overwrite an existing config', () => {
      const configPath = join(tempDir, 'existing.config.json')
      writeFileSync(configPath, '{}')
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      vi.spyOn(process.stderr, 'write').mockReturnValue(true)

      createProgram().parse(['node', 'sre-hello', 'init', '--output', configPath])

      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(readFileSync(configPath, 'utf-8')).toBe('{}')
    })
  })

  describe('start command', () => {
    it('should start the server with defaults when no config is given', async () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stdoutSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true)

      createProgram().parse(['node', 'sre-hello', 'start'])

      await vi.waitFor(() => {
        expect(writtenTo(stdoutSpy)).toContain('OK: Listening on http://0.0.0.0:4321\n')
      })
      expect(serverMocks.start).toHaveBeenCalledTimes(1)
      expect(exitSpy).not.toHaveBeenCalled()
      expect(serverMocks.created).toHaveLength(1)
      expect(serverMocks.created[0].config).toMatchObject({
        server: { host: '0.0.0.0', port: 8080 },
      })
      expect(onShutdownSignals).toHaveBeenCalledTimes(1)
    })

    it('should apply --port and --host over the config file', async () => {
      const configPath = join(tempDir, 'sre-hello.config.json')
      writeFileSync(configPath, JSON.stringify({ server: { port: 9000, host: '10.0.0.1' } }))
      vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      vi.spyOn(process.stdout, 'write').mockReturnValue(true)

      createProgram().parse([
        'node', 'sre-hello', 'start', '-c', configPath, '--port', '9100', '--host', '127.0.0.1',
      ])

      await vi.waitFor(() => {
        expect(serverMocks.start).toHaveBeenCalled()
      })
      expect(serverMocks.created[0].config).toMatchObject({
        server: { host: '127.0.0.1', port: 9100 },
      })
    })

    it('should exit with error for a missing config file', () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true)
      const missing = join(tempDir, 'nonexistent.json')

      createProgram().parse(['node', 'sre-hello', 'start', '--config', missing])

      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(writtenTo(stderrSpy)).toContain(`Error: Configuration file not found: ${missing}\n`)
      expect(serverMocks.start).not.toHaveBeenCalled()
    })

    it('should exit with error for a non-numeric --port', () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      vi.spyOn(process.stderr, 'write').mockReturnValue(true)

      createProgram().parse(['node', 'sre-hello', 'start', '--port', 'http'])

      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(serverMocks.start).not.toHaveBeenCalled()
    })

    it('should exit 1 with a diagnostic when the port cannot be bound', async () => {
      serverMocks.start.mockRejectedValue(
        new ServerStartError('ADDRESS_IN_USE', 'Address already in use: 0.0.0.0:8080'),
      )
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true)
      vi.spyOn(process.stdout, 'write').mockReturnValue(true)

      createProgram().parse(['node', 'sre-hello', 'start'])

      await vi.waitFor(() => {
        expect(exitSpy).toHaveBeenCalledWith(1)
      })
      expect(writtenTo(stderrSpy)).toContain('Error: Address already in use: 0.0.0.0:8080\n')
      expect(onShutdownSignals).not.toHaveBeenCalled()
    })

    it('should open the access log when enabled', async () => {
      const logPath = join(tempDir, 'logs', 'access.jsonl')
      process.env.SRE_HELLO_ACCESSLOG__ENABLED = 'true'
      process.env.SRE_HELLO_ACCESSLOG__PATH = logPath
      vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stdoutSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true)

      createProgram().parse(['node', 'sre-hello', 'start'])

      await vi.waitFor(() => {
        expect(serverMocks.start).toHaveBeenCalled()
      })
      expect(writtenTo(stdoutSpy)).toContain(`Access log: ${logPath}\n`)
      expect(existsSync(join(tempDir, 'logs'))).toBe(true)
      expect(serverMocks.created[0].options).toHaveProperty('accessLog')
    })

    it('should stop the server and exit 0 on a shutdown signal', async () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stdoutSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true)

      createProgram().parse(['node', 'sre-hello', 'start'])

      await vi.waitFor(() => {
        expect(onShutdownSignals).toHaveBeenCalled()
      })
      const [handler] = vi.mocked(onShutdownSignals).mock.calls[0]
      handler('SIGTERM')

      await vi.waitFor(() => {
        expect(exitSpy).toHaveBeenCalledWith(0)
      })
      expect(serverMocks.stop).toHaveBeenCalledTimes(1)
      expect(writtenTo(stdoutSpy)).toContain('Server stopped\n')
    })
  })

  describe('check command', () => {
    let probeServer: Server
    let probePort: number

    async function listenWith(listener: RequestListener): Promise<void> {
      probeServer = createServer(listener)
      probePort = await new Promise<number>((resolve) => {
        probeServer.listen(0, '127.0.0.1', () => {
          const addr = probeServer.address()
          if (addr && typeof addr === 'object') {
            resolve(addr.port)
          }
        })
      })
    }

    afterEach(async () => {
      if (probeServer?.listening) {
        await new Promise<void>((resolve) => probeServer.close(() => resolve()))
      }
    })

    it('should report a healthy service', async () => {
      await listenWith(createApiRouter({ routes: createRouteTable({ greetingDelayMs: 0 }) }))
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stdoutSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true)
      const url = `http://127.0.0.1:${probePort}/healthz`

      createProgram().parse(['node', 'sre-hello', 'check', '--url', url])

      await vi.waitFor(() => {
        expect(writtenTo(stdoutSpy)).toContain(`OK: ${url} is healthy\n`)
      })
      expect(exitSpy).not.toHaveBeenCalled()
    })

    it('should derive the probe URL from config, using loopback for 0.0.0.0', async () => {
      await listenWith(createApiRouter({ routes: createRouteTable({ greetingDelayMs: 0 }) }))
      process.env.SRE_HELLO_SERVER__PORT = String(probePort)
      vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stdoutSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true)

      createProgram().parse(['node', 'sre-hello', 'check'])

      await vi.waitFor(() => {
        expect(writtenTo(stdoutSpy)).toContain(
          `OK: http://127.0.0.1:${probePort}/healthz is healthy\n`,
        )
      })
    })

    it('should fail on an unhealthy payload', async () => {
      await listenWith((_req, res) => {
        res.writeHead(503, { 'Content-Type': 'application/json' })
        res.end(JSON.stringify({ status: 'down' }))
      })
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true)
      const url = `http://127.0.0.1:${probePort}/healthz`

      createProgram().parse(['node', 'sre-hello', 'check', '--url', url])

      await vi.waitFor(() => {
        expect(exitSpy).toHaveBeenCalledWith(1)
      })
      expect(writtenTo(stderrSpy)).toContain(`Error: ${url} is unhealthy (status 503)\n`)
    })

    it('should fail on a 200 whose body is not the health payload', async () => {
      await listenWith((_req, res) => {
        res.writeHead(200, { 'Content-Type': 'text/plain' })
        res.end('ok')
      })
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      vi.spyOn(process.stderr, 'write').mockReturnValue(true)

      createProgram().parse([
        'node', 'sre-hello', 'check', '--url', `http://127.0.0.1:${probePort}/healthz`,
      ])

      await vi.waitFor(() => {
        expect(exitSpy).toHaveBeenCalledWith(1)
      })
    })

    it('should fail when nothing is listening', async () => {
      await listenWith((_req, res) => res.end())
      const closedPort = probePort
      await new Promise<void>((resolve) => probeServer.close(() => resolve()))

      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true)
      const url = `http://127.0.0.1:${closedPort}/healthz`

      createProgram().parse(['node', 'sre-hello', 'check', '--url', url])

      await vi.waitFor(() => {
        expect(exitSpy).toHaveBeenCalledWith(1)
      })
      expect(writtenTo(stderrSpy).some((line) => line.startsWith(`Error: ${url} unreachable:`))).toBe(true)
    })

    it('should reject an invalid timeout', () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true)

      createProgram().parse(['node', 'sre-hello', 'check', '--timeout', '-5'])

      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(writtenTo(stderrSpy)).toContain('Error: Invalid timeout: -5\n')
    })
  })
})
