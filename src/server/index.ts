export { HelloServer } from './server.js'
export type { HelloServerOptions } from './server.js'
export { ServerStartError, toStartError } from './errors.js'
export type { ServerErrorCode } from './errors.js'
