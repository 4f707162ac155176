export * from './types/index.js'
export { loadConfig, ConfigError, DEFAULT_CONFIG, ENV_PREFIX } from './config/index.js'
export type { ConfigOverrides } from './config/loader.js'
export * from './api/index.js'
export * from './server/index.js'
export * from './access-log/index.js'
