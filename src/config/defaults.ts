import type { GatewayConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: GatewayConfig = {
  strategies: {
    ensemble: false,
    defaultDomain: 'general',
  },
  validation: {
    maxTextLength: 1000000,
  },
  monitoring: {
    audit: {
      enabled: true,
      path: './data/audit.jsonl',
      maxEntries: 10000,
    },
    performance: {
      slowThresholdMs: 5000,
    },
  },
}

/** Prefix of environment variables that override configuration */
export const ENV_PREFIX = 'GATEWAY_'
