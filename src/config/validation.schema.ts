import { z } from 'zod';
import { ConfigurationError } from '../domain/errors/export.errors';

const required = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} must not be empty`);

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Wiki site and credentials
  CONFLUENCE_BASE_URL: required('CONFLUENCE_BASE_URL').pipe(z.string().url()),
  CONFLUENCE_USER: required('CONFLUENCE_USER'),
  CONFLUENCE_PASS: required('CONFLUENCE_PASS'),

  // Batch input and output
  PAGES_FILE: z.string().min(1).default('pages.txt'),
  EXPORT_DIR: z.string().min(1).default('exported'),

  // Polling
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
  POLL_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),

  // HTTP
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError('Environment validation failed', issues);
  }

  return result.data;
}
