export { AccessLogger } from './logger.js'
export type { AccessEvent, AccessLogSink } from './logger.js'
