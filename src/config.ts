import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { HemisConfig } from './types.js';

// Blank values are dropped before parsing, so presence is the only check; the
// value itself is passed on untouched.
const required = (name: string) =>
  z.string({ required_error: `${name} environment variable is required` });

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  HEMIS_API_BASE: required('HEMIS_API_BASE').trim().url('HEMIS_API_BASE must be an absolute URL'),
  HEMIS_LOGIN: required('HEMIS_LOGIN'),
  HEMIS_PASSWORD: required('HEMIS_PASSWORD'),
  HEMIS_TIMEOUT_MS: positiveInt.default(30_000),
  HEMIS_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  HEMIS_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
  HEMIS_TOKEN_TTL_SECONDS: positiveInt.optional(),
});

// Blank values in a .env file read as unset.
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Read and validate the process configuration. Throws ConfigurationError when a
 * required setting is missing or malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HemisConfig {
  const parsed = EnvSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => issue.message).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    baseUrl: vars.HEMIS_API_BASE,
    login: vars.HEMIS_LOGIN,
    secret: vars.HEMIS_PASSWORD,
    timeoutMs: vars.HEMIS_TIMEOUT_MS,
    maxRetries: vars.HEMIS_MAX_RETRIES,
    retryDelayMs: vars.HEMIS_RETRY_DELAY_MS,
    tokenTtlSeconds: vars.HEMIS_TOKEN_TTL_SECONDS,
  };
}

export function loadConfigFromDotenv(): HemisConfig {
  dotenv.config();
  return loadConfig();
}
