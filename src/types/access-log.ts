import { Type, type Static } from '@sinclair/typebox'

/** One completed HTTP request, as written to the access log */
export const AccessLogEntrySchema = Type.Object({
  timestamp: Type.String(),
  method: Type.String(),
  path: Type.String(),
  status: Type.Integer({ minimum: 100, maximum: 599 }),
  duration_ms: Type.Number({ minimum: 0 }),
})

export type AccessLogEntry = Static<typeof AccessLogEntrySchema>
