import { z } from 'zod';

const NUMBER_FROM_STRING = (schema: z.ZodNumber) =>
  z
    .string()
    .transform((value) => Number.parseInt(value, 10))
    .pipe(schema);

export const schema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    BUCKET_EXTENSION_PERIOD: NUMBER_FROM_STRING(z.number().int().min(1)).default('1'),
    BUCKET_EXTENSION_UNLOCK_WINDOW: NUMBER_FROM_STRING(z.number().int().min(0)).default('1'),
    BUCKET_RENEWAL_FUNDING: z.enum(['full_balance', 'quoted_cost']).default('full_balance'),
    BUCKET_RECEIVE_POLICY: z.enum(['auto_reserve', 'require_reservation']).default('auto_reserve'),
    COLLABORATOR_TIMEOUT_MS: NUMBER_FROM_STRING(z.number().int().min(1)).default('5000'),
    SWEEP_RETRY_ATTEMPTS: NUMBER_FROM_STRING(z.number().int().min(1)).default('3'),
    STORAGE_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
    POSTGRES_URL: z.string().url().optional(),
    POSTGRES_SCHEMA: z
      .string()
      .regex(/^[a-z_][a-z0-9_]*$/)
      .default('larder')
  })
  .superRefine((value, ctx) => {
    if (value.STORAGE_DRIVER === 'postgres' && !value.POSTGRES_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['POSTGRES_URL'],
        message: 'POSTGRES_URL is required when STORAGE_DRIVER=postgres'
      });
    }
  });

export type Config = z.infer<typeof schema>;

let cachedConfig: Config | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.message}`);
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfig() {
  cachedConfig = null;
}
