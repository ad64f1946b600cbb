import { Logger } from '@nestjs/common';
import { DateTime } from 'luxon';
import { z } from 'zod';

const booleanFlag = z.preprocess((val) => val === 'true', z.boolean());

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),

  DATABASE_URL: z.string().url(),
  DB_SYNC: booleanFlag.default(false),
  DB_LOG: booleanFlag.default(false),
  DB_SSL: booleanFlag.default(false),

  JWT_SECRET: z.string().trim().min(1),
  JWT_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),

  // IANA zone used to decide what "today" is for event classification
  APP_TIMEZONE: z
    .string()
    .refine((zone) => DateTime.local().setZone(zone).isValid, {
      message: 'Unknown IANA time zone',
    })
    .default('UTC'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const fieldErrors = result.error.flatten().fieldErrors;
    new Logger('Config').error(
      `Invalid environment variables: ${JSON.stringify(fieldErrors)}`,
    );
    throw new Error('Invalid environment variables');
  }

  return result.data;
}
