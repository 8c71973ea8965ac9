import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../shared/utils/errors';

export const DEFAULT_API_URL =
  'https://backoffice.dev.api.discomax.com/mlp-metadata-manager/meta-manager';

const httpUrl = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' });

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  MODEL_API_URL: httpUrl.default(DEFAULT_API_URL),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  LOG_FORMAT: z.enum(['pretty', 'json']).default('pretty'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Formats zod issues as "path: message" strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validates the process environment. Empty strings count as unset.
 */
export function parseEnv(source: NodeJS.ProcessEnv): EnvConfig {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );
  const result = envSchema.safeParse(present);

  if (!result.success) {
    throw new ConfigurationError('Invalid environment', formatIssues(result.error));
  }

  return result.data;
}

/**
 * Loads .env (without overriding variables already set) and validates the result
 */
export function loadEnv(): EnvConfig {
  dotenv.config();
  return parseEnv(process.env);
}

/**
 * Checks an --api-url override the same way MODEL_API_URL is checked
 */
export function parseApiUrl(value: string): string {
  const result = httpUrl.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError('Invalid --api-url', formatIssues(result.error));
  }
  return result.data;
}
