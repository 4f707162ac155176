import { Type, type Static } from '@sinclair/typebox'

/** Body of a healthy GET /healthz response */
export const HealthPayloadSchema = Type.Object({
  status: Type.Literal('ok'),
})

export type HealthPayload = Static<typeof HealthPayloadSchema>
