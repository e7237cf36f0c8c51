import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

/**
 * Environment contract, checked once at startup by ConfigModule.
 * Numeric values arrive as strings and are coerced.
 */
export const EnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DEBUG: booleanString.default('false'),

  DATABASE_URL: z.string().min(1),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_IDLE_TIMEOUT: z.coerce.number().int().positive().default(30),

  /** Without a token the bot stays offline and every DM counts as a transient failure */
  DISCORD_BOT_TOKEN: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().optional(),
  ),
  ADMIN_API_TOKEN: z.string().min(16),

  REMINDER_LOOP_ENABLED: booleanString.default('true'),
  // Must stay below the 15-minute reminder offset or 15min reminders arrive late
  REMINDER_INTERVAL_MS: z.coerce
    .number()
    .int()
    .min(1_000)
    .max(15 * 60 * 1000 - 1)
    .default(60_000),
  REMINDER_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  REMINDER_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  DELIVERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  BROADCAST_CONCURRENCY: z.coerce.number().int().positive().max(50).default(5),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * `validate` hook for ConfigModule.forRoot. Throws with one line per
 * offending variable so a misconfigured deploy fails fast.
 */
export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${issues}`);
  }
  return result.data;
}
