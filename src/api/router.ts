/**
 * HTTP request router.
 *
 * Sequential inline pipeline, no middleware chain:
 *   1. Resolve pathname (query string ignored)
 *   2. Look up the route table
 *   3. Unmatched method/path -> 404
 *   4. Run the handler; a thrown or rejected handler -> 500
 *
 * Each completed response is recorded in the access log when one is wired in.
 */

import { performance } from 'node:perf_hooks'
import type { IncomingMessage, ServerResponse } from 'node:http'
import type { AccessLogSink } from '../access-log/logger.js'
import { sendJson } from './http-utils.js'
import { lookupRoute, type RouteTable } from './route-table.js'

/** Dependencies injected into the API router */
export interface ApiRouterDeps {
  routes: RouteTable
  accessLog?: AccessLogSink
  /**
   * Receives handler failures that were turned into a 500, and access log
   * write failures. Neither takes the process down.
   */
  onError?: (err: unknown) => void
}

export type RequestListener = (req: IncomingMessage, res: ServerResponse) => void

/**
 * Extract the pathname from a request target.
 *
 * Origin-form targets ("/path?query") are split by hand so that a target
 * such as "//evil" is not mistaken for a protocol-relative URL. Absolute-form
 * targets ("http://host/path") are parsed as URLs.
 */
export function getPathname(url: string | undefined): string {
  if (url === undefined || url === '') return '/'
  if (url.startsWith('/')) {
    const end = url.search(/[?#]/)
    return end === -1 ? url : url.slice(0, end)
  }
  try {
    return new URL(url).pathname
  } catch {
    return url
  }
}

/**
 * Create the request listener for the service.
 *
 * Returns a `(req, res) => void` function for an HTTP server's 'request' event.
 */
export function createApiRouter(deps: ApiRouterDeps): RequestListener {
  return (req: IncomingMessage, res: ServerResponse): void => {
    const startedAt = performance.now()
    const method = req.method ?? 'GET'
    const pathname = getPathname(req.url)

    if (deps.accessLog) {
      const accessLog = deps.accessLog
      res.once('finish', () => {
        try {
          accessLog.append({
            method,
            path: pathname,
            status: res.statusCode,
            durationMs: performance.now() - startedAt,
          })
        } catch (err) {
          deps.onError?.(err)
        }
      })
    }

    const handler = lookupRoute(deps.routes, method, pathname)
    if (!handler) {
      sendJson(res, 404, { error: 'Not found' })
      return
    }

    const fail = (err: unknown): void => {
      deps.onError?.(err)
      if (res.headersSent) {
        res.destroy()
        return
      }
      sendJson(res, 500, { error: 'Internal server error' })
    }

    try {
      void Promise.resolve(handler(req, res)).catch(fail)
    } catch (err) {
      fail(err)
    }
  }
}
