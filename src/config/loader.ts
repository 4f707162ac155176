import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { ServiceConfigSchema, type ServiceConfig } from '../types/config.js'
import { DEFAULT_CONFIG } from './defaults.js'

/** Environment variables with this prefix override configuration values */
export const ENV_PREFIX = 'SRE_HELLO_'

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends Error {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super(message)
    this.name = 'ConfigError'
    this.fields = fields
  }
}

/** Per-section partial configuration, applied after env overrides (CLI flags). */
export type ConfigOverrides = {
  [K in keyof ServiceConfig]?: Partial<ServiceConfig[K]>
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Deep merge source into target. Source values override target values.
 * Arrays from source replace target arrays (no concatenation).
 * Undefined source values are skipped.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target }
  for (const key of Object.keys(source)) {
    const sourceVal = source[key]
    const targetVal = result[key]
    if (sourceVal === undefined) continue
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal)
    } else {
      result[key] = sourceVal
    }
  }
  return result
}

/**
 * Coerce string values to appropriate types.
 * Environment variables are always strings; this converts numeric strings
 * and boolean strings to their proper types.
 */
function coerceValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false

  if (/^\d+$/.test(value)) return parseInt(value, 10)
  if (/^\d+\.\d+$/.test(value)) return parseFloat(value)

  return value
}

/**
 * Find the actual key in an object that matches the given key case-insensitively.
 * Returns the original-cased key if found, or the input key if no match exists.
 */
function findCaseInsensitiveKey(obj: Record<string, unknown>, key: string): string {
  const lowerKey = key.toLowerCase()
  for (const k of Object.keys(obj)) {
    if (k.toLowerCase() === lowerKey) return k
  }
  return key
}

/**
 * Set a nested value in an object using a path array.
 * Resolves each path segment case-insensitively against existing keys.
 */
function setNestedValue(
  obj: Record<string, unknown>,
  path: string[],
  value: unknown,
): void {
  let current = obj
  for (const segment of path.slice(0, -1)) {
    const resolvedKey = findCaseInsensitiveKey(current, segment)
    const next = current[resolvedKey]
    if (isPlainObject(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[resolvedKey] = created
      current = created
    }
  }
  const last = path[path.length - 1]
  if (last === undefined) return
  current[findCaseInsensitiveKey(current, last)] = value
}

/**
 * Apply SRE_HELLO_ prefixed environment variable overrides to config.
 * Double underscores (__) indicate nested paths:
 *   SRE_HELLO_SERVER__PORT=9090 -> config.server.port = 9090
 */
function applyEnvOverrides(config: Record<string, unknown>): Record<string, unknown> {
  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue
    const path = key.slice(ENV_PREFIX.length).toLowerCase().split('__')
    setNestedValue(config, path, coerceValue(value))
  }
  return config
}

/**
 * Recursively freeze an object and all nested objects.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj)
  const values: unknown[] = Object.values(obj)
  for (const value of values) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  }
  return obj
}

/**
 * Read and parse the user configuration file.
 */
function readConfigFile(configPath: string): Record<string, unknown> {
  let rawContent: string
  try {
    rawContent = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`)
    }
    throw new ConfigError(`Failed to read configuration file: ${configPath}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(rawContent)
  } catch {
    throw new ConfigError(`Invalid JSON in configuration file: ${configPath}`)
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }
  return parsed
}

/**
 * Load, validate, and return a frozen ServiceConfig.
 *
 * Pipeline: read file (if given) -> merge defaults -> apply env overrides
 *           -> apply explicit overrides -> validate against TypeBox schema
 *           -> check timeout ordering -> freeze
 *
 * The file is optional: without a path the service runs on defaults plus
 * environment overrides.
 *
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(configPath?: string, overrides: ConfigOverrides = {}): ServiceConfig {
  const userConfig = configPath !== undefined ? readConfigFile(configPath) : {}

  // Deep clone so the frozen result never shares objects with DEFAULT_CONFIG
  const merged: unknown = JSON.parse(JSON.stringify(deepMerge(DEFAULT_CONFIG, userConfig)))
  if (!isPlainObject(merged)) {
    throw new ConfigError('Configuration invalid: expected an object')
  }

  const config = deepMerge(applyEnvOverrides(merged), overrides)

  if (!Value.Check(ServiceConfigSchema, config)) {
    const fields = [...Value.Errors(ServiceConfigSchema, config)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields)
  }

  // Node rejects a headers timeout longer than the request timeout
  const { requestTimeoutMs, headersTimeoutMs } = config.server
  if (requestTimeoutMs > 0 && headersTimeoutMs > requestTimeoutMs) {
    throw new ConfigError(
      `Configuration invalid: server.headersTimeoutMs (${headersTimeoutMs}) exceeds server.requestTimeoutMs (${requestTimeoutMs})`,
      [{ path: '/server/headersTimeoutMs', message: 'must not exceed requestTimeoutMs' }],
    )
  }

  return deepFreeze(config)
}
