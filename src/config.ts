import { z } from 'zod';
import {
  DNS_TTL,
  LINODE_API,
  ZONE_POLL_ATTEMPTS,
  ZONE_POLL_INTERVAL_MS,
} from './constants.js';
import { ValidationError } from './errors.js';

const configSchema = z.object({
  LINODE_API_TOKEN: z
    .string({ required_error: 'LINODE_API_TOKEN is required' })
    .regex(/^[0-9a-f]+$/i, 'LINODE_API_TOKEN must be hexadecimal'),
  LINODE_API_URL: z.string().url().default(LINODE_API),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  DNS_DEFAULT_TTL: z.coerce.number().int().nonnegative().default(DNS_TTL),
  LINODE_ZONE_POLL_ATTEMPTS: z.coerce
    .number()
    .int()
    .positive()
    .default(ZONE_POLL_ATTEMPTS),
  LINODE_ZONE_POLL_INTERVAL_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(ZONE_POLL_INTERVAL_MS),
});

export interface AdapterConfig {
  apiToken: string;
  apiUrl: string;
  logLevel: z.infer<typeof configSchema>['LOG_LEVEL'];
  defaultTtl: number;
  zonePollAttempts: number;
  zonePollIntervalMs: number;
}

/**
 * Read adapter settings from the environment.
 *
 * Throws a `ValidationError` listing every offending variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AdapterConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid configuration: ${details}`);
  }

  const c = parsed.data;
  return {
    apiToken: c.LINODE_API_TOKEN,
    apiUrl: c.LINODE_API_URL.replace(/\/+$/, ''),
    logLevel: c.LOG_LEVEL,
    defaultTtl: c.DNS_DEFAULT_TTL,
    zonePollAttempts: c.LINODE_ZONE_POLL_ATTEMPTS,
    zonePollIntervalMs: c.LINODE_ZONE_POLL_INTERVAL_MS,
  };
}
