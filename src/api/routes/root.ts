/**
 * GET / -- fixed greeting.
 */

import { setTimeout as sleep } from 'node:timers/promises'
import type { ServerResponse } from 'node:http'
import { sendText } from '../http-utils.js'

export const GREETING = 'Hello from SRE Test!'

/**
 * Respond with the greeting. A non-zero `delayMs` holds the response back
 * for that long first (opt-in latency for load testing).
 */
export async function handleRoot(res: ServerResponse, delayMs: number): Promise<void> {
  if (delayMs > 0) {
    await sleep(delayMs)
  }
  sendText(res, 200, GREETING)
}
