/**
 * Static route table: (method, path) -> handler.
 *
 * Built once per server instance and never mutated afterwards. Lookups are
 * exact-match on the pathname; there are no parameters or wildcards.
 */

import type { IncomingMessage, ServerResponse } from 'node:http'
import { handleRoot } from './routes/root.js'
import { handleHealth } from './routes/health.js'

export type RouteHandler = (req: IncomingMessage, res: ServerResponse) => void | Promise<void>

export type RouteMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export type RouteKey = `${RouteMethod} /${string}`

export type RouteTable = ReadonlyMap<RouteKey, RouteHandler>

/** Options for the handlers in the table */
export interface RouteTableOptions {
  /** Artificial latency applied to GET / (0 disables it) */
  greetingDelayMs: number
}

export function routeKey(method: RouteMethod, path: `/${string}`): RouteKey {
  return `${method} ${path}`
}

function isRouteMethod(method: string): method is RouteMethod {
  return (
    method === 'GET' ||
    method === 'POST' ||
    method === 'PUT' ||
    method === 'PATCH' ||
    method === 'DELETE'
  )
}

function isRootedPath(path: string): path is `/${string}` {
  return path.startsWith('/')
}

export function createRouteTable(options: RouteTableOptions): RouteTable {
  return new Map<RouteKey, RouteHandler>([
    [routeKey('GET', '/'), (_req, res) => handleRoot(res, options.greetingDelayMs)],
    [routeKey('GET', '/healthz'), (_req, res) => handleHealth(res)],
  ])
}

/**
 * Find the handler for a request. HEAD is served by the GET handler;
 * Node drops the body of a HEAD response on its own.
 */
export function lookupRoute(
  table: RouteTable,
  method: string,
  pathname: string,
): RouteHandler | undefined {
  const effective = method === 'HEAD' ? 'GET' : method
  if (!isRouteMethod(effective) || !isRootedPath(pathname)) return undefined
  return table.get(routeKey(effective, pathname))
}
