// Configuration
export { ServiceConfigSchema } from './config.js'
export type { ServiceConfig } from './config.js'

// Access log
export { AccessLogEntrySchema } from './access-log.js'
export type { AccessLogEntry } from './access-log.js'

// Health
export { HealthPayloadSchema } from './health.js'
export type { HealthPayload } from './health.js'
