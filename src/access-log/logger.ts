import { appendFileSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import type { AccessLogEntry } from '../types/access-log.js'

/**
 * Request data for an access log entry.
 */
export interface AccessEvent {
  method: string
  path: string
  status: number
  durationMs: number
}

/** Anything that records completed requests */
export interface AccessLogSink {
  append(event: AccessEvent): AccessLogEntry
}

/**
 * Append-only JSONL access logger.
 *
 * One line per completed request. The parent directory is created on
 * construction so a fresh deployment needs no setup.
 */
export class AccessLogger implements AccessLogSink {
  private readonly logPath: string

  constructor(logPath: string) {
    this.logPath = logPath
    mkdirSync(dirname(logPath), { recursive: true })
  }

  append(event: AccessEvent): AccessLogEntry {
    const entry: AccessLogEntry = {
      timestamp: new Date().toISOString(),
      method: event.method,
      path: event.path,
      status: event.status,
      duration_ms: Math.round(event.durationMs * 1000) / 1000,
    }

    appendFileSync(this.logPath, JSON.stringify(entry) + '\n')

    return entry
  }

  get path(): string {
    return this.logPath
  }
}
