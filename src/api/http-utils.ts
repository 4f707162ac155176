/**
 * HTTP response helpers shared by the router and route handlers.
 */

import type { ServerResponse } from 'node:http'

/**
 * Send a JSON response with the given status code.
 * Sets Content-Type to application/json and ends the response.
 */
export function sendJson(res: ServerResponse, statusCode: number, data: unknown): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' })
  res.end(JSON.stringify(data))
}

/**
 * Send a plain-text response with the given status code.
 */
export function sendText(res: ServerResponse, statusCode: number, text: string): void {
  res.writeHead(statusCode, { 'Content-Type': 'text/plain; charset=utf-8' })
  res.end(text)
}
