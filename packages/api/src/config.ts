// ---------------------------------------------------------------------------
// Runtime configuration
//
// Environment variables are parsed once, on first use, so a misconfigured
// deployment fails at cold start with the full zod issue list instead of
// halfway through a request.
// ---------------------------------------------------------------------------

import { z } from 'zod'

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATABASE_URL: z.string().min(1),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  /** HS256 key for bearer tokens carrying elevated permissions (e.g. tickets:reopen). */
  AUTH_JWT_SECRET: z.string().min(16),
  DEFAULT_TAX_RATE_BPS: z.coerce.number().int().min(0).max(10_000).default(0),
  INVOICE_DUE_DAYS: z.coerce.number().int().min(0).default(30),
  RECURRENCE_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
})

export type AppConfig = z.infer<typeof EnvSchema>

export const loadConfig = (input: Record<string, string | undefined> = process.env): AppConfig => {
  return EnvSchema.parse(input)
}

let cached: AppConfig | null = null

/** The process-wide configuration, parsed from `process.env` on first call. */
export function getConfig(): AppConfig {
  if (cached === null) {
    cached = loadConfig()
  }
  return cached
}
