/**
 * GET /healthz -- liveness probe for orchestrators and monitors.
 *
 * The payload never varies: if the process can answer, it is healthy.
 */

import type { ServerResponse } from 'node:http'
import type { HealthPayload } from '../../types/health.js'
import { sendJson } from '../http-utils.js'

export const HEALTH_PAYLOAD: Readonly<HealthPayload> = Object.freeze({ status: 'ok' })

export function handleHealth(res: ServerResponse): void {
  sendJson(res, 200, HEALTH_PAYLOAD)
}
