import { Type, type Static } from '@sinclair/typebox'

/** Service configuration schema for sre-hello.config.json */
export const ServiceConfigSchema = Type.Object({
  server: Type.Object({
    host: Type.String({ minLength: 1, default: '0.0.0.0' }),
    port: Type.Integer({ minimum: 0, maximum: 65535, default: 8080 }),
    requestTimeoutMs: Type.Integer({ minimum: 0, default: 30000 }),
    headersTimeoutMs: Type.Integer({ minimum: 0, default: 10000 }),
    keepAliveTimeoutMs: Type.Integer({ minimum: 0, default: 5000 }),
  }),
  greeting: Type.Object({
    delayMs: Type.Integer({ minimum: 0, default: 0 }),
  }),
  accessLog: Type.Object({
    enabled: Type.Boolean({ default: false }),
    path: Type.String({ minLength: 1, default: './logs/access.jsonl' }),
  }),
})

export type ServiceConfig = Static<typeof ServiceConfigSchema>
