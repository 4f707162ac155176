/**
 * HelloServer: owns the Node.js HTTP server for the service.
 *
 * The route table is built once in the constructor from the config and
 * handed to the router; nothing about routing changes while the process runs.
 * Connection timeouts come from `server.*TimeoutMs` so slow or idle clients
 * cannot hold sockets open indefinitely.
 */

import { createServer, type Server as HttpServer } from 'node:http'
import type { ServiceConfig } from '../types/config.js'
import type { AccessLogSink } from '../access-log/logger.js'
import { createApiRouter } from '../api/router.js'
import { createRouteTable, type RouteTable } from '../api/route-table.js'
import { ServerStartError, toStartError } from './errors.js'

/** Optional collaborators for the server */
export interface HelloServerOptions {
  accessLog?: AccessLogSink
  onError?: (err: unknown) => void
}

export class HelloServer {
  private httpServer: HttpServer | null = null
  readonly routes: RouteTable

  constructor(
    private readonly config: ServiceConfig,
    private readonly options: HelloServerOptions = {},
  ) {
    this.routes = createRouteTable({ greetingDelayMs: config.greeting.delayMs })
  }

  /**
   * Bind and start accepting connections.
   *
   * @param port - Port to listen on. Use 0 for OS-assigned (tests).
   * @throws ServerStartError when the socket cannot be bound or the server is already running
   */
  async start(
    port: number = this.config.server.port,
    host: string = this.config.server.host,
  ): Promise<void> {
    if (this.httpServer) {
      throw new ServerStartError('ALREADY_RUNNING', 'Server is already running')
    }

    const httpServer = createServer(
      createApiRouter({
        routes: this.routes,
        accessLog: this.options.accessLog,
        onError: this.options.onError,
      }),
    )
    httpServer.requestTimeout = this.config.server.requestTimeoutMs
    httpServer.headersTimeout = this.config.server.headersTimeoutMs
    httpServer.keepAliveTimeout = this.config.server.keepAliveTimeoutMs

    // Claimed before listening so a concurrent start() sees ALREADY_RUNNING
    this.httpServer = httpServer

    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (err: Error): void => {
          reject(toStartError(err, host, port))
        }
        httpServer.once('error', onError)
        httpServer.listen(port, host, () => {
          httpServer.removeListener('error', onError)
          resolve()
        })
      })
    } catch (err) {
      if (this.httpServer === httpServer) {
        this.httpServer = null
      }
      throw err
    }
  }

  /**
   * Stop accepting connections and wait for in-flight requests to finish.
   * Idle keep-alive sockets are closed right away. No-op when not running.
   */
  async stop(): Promise<void> {
    const httpServer = this.httpServer
    if (!httpServer) return
    this.httpServer = null

    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()))
      httpServer.closeIdleConnections()
    })
  }

  get running(): boolean {
    return this.httpServer !== null
  }

  /** Expose the underlying HTTP server */
  get server(): HttpServer | null {
    return this.httpServer
  }

  /** Get the port the server is listening on (useful in tests with port 0) */
  get port(): number | null {
    const addr = this.httpServer?.address()
    if (addr && typeof addr === 'object') {
      return addr.port
    }
    return null
  }
}
