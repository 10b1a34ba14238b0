import { Type, type Static } from '@sinclair/typebox'

/** Gateway configuration schema for gateway.config.json */
export const GatewayConfigSchema = Type.Object({
  strategies: Type.Object({
    ensemble: Type.Boolean({ default: false }),
    defaultDomain: Type.String({ minLength: 1, default: 'general' }),
  }),
  validation: Type.Object({
    maxTextLength: Type.Integer({ minimum: 1, default: 1000000 }),
  }),
  monitoring: Type.Object({
    audit: Type.Object({
      enabled: Type.Boolean({ default: true }),
      path: Type.String({ default: './data/audit.jsonl' }),
      maxEntries: Type.Integer({ minimum: 1, default: 10000 }),
    }),
    performance: Type.Object({
      slowThresholdMs: Type.Number({ minimum: 0, default: 5000 }),
    }),
  }),
})

export type GatewayConfig = Static<typeof GatewayConfigSchema>
