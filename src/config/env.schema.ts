import { z } from 'zod';

const intFromEnv = (min: number) =>
  z.preprocess(
    (val) => (val === undefined || val === '' ? undefined : Number(val)),
    z.number().int().min(min),
  );

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: intFromEnv(1).default(3000),

  DATABASE_URL: z.string().url(),
  DB_SYNC: z.preprocess((val) => val === 'true', z.boolean()).default(false),
  DB_LOG: z.preprocess((val) => val === 'true', z.boolean()).default(false),

  // external payment gateway (card + terminal endpoints)
  PAYMENT_GATEWAY_URL: z.string().url(),
  PAYMENT_RETRY_ATTEMPTS: intFromEnv(1).default(3),
  PAYMENT_RETRY_BASE_DELAY_MS: intFromEnv(0).default(1000),

  BANK_INVOICE_VALIDITY_DAYS: intFromEnv(1).default(30),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    console.error(
      'Invalid environment variables:',
      result.error.flatten().fieldErrors,
    );
    throw new Error('Invalid environment variables');
  }

  return result.data;
}
