/**
 * Environment configuration
 *
 * Every variable is optional; defaults reproduce the library's behaviour
 * without any environment set.
 */

import { z } from 'zod';
import { ConfigError } from './errors';

const booleanFromEnv = z.preprocess((value) => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0' || normalized === '') return false;
  }
  return value;
}, z.boolean());

// ─── Environment Schema ───────────────────────────────────────────────
const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Logs each circuit operator's output size
  ANALYTICS_DEBUG: booleanFromEnv.default(false),

  // Orders whose customer_id has no customer row: drop them or fail the run
  MISSING_CUSTOMER_POLICY: z.enum(['exclude', 'fail']).default('exclude'),

  PAYMENT_METHOD_SEPARATOR: z.string().min(1).default(', '),
  CSV_DELIMITER: z.string().length(1).default(','),
});

export type Config = z.infer<typeof envSchema>;

// ─── Parse & Validate ─────────────────────────────────────────────────
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors);
  }
  return parsed.data;
}
