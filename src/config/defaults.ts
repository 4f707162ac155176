import type { ServiceConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: ServiceConfig = {
  server: {
    host: '0.0.0.0',
    port: 8080,
    requestTimeoutMs: 30000,
    headersTimeoutMs: 10000,
    keepAliveTimeoutMs: 5000,
  },
  greeting: {
    delayMs: 0,
  },
  accessLog: {
    enabled: false,
    path: './logs/access.jsonl',
  },
}
