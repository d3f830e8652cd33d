import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { WebsupportOptions } from './providers/websupport.js';

// Issue messages are prefixed with the field path when reported
const required = () =>
  z.string({ required_error: 'is required' }).trim().min(1, 'is required');

/**
 * Provider configuration as ACME clients store it (snake_case JSON).
 */
export const WebsupportConfigSchema = z.object({
  api_key: required(),
  api_secret: required(),
  service_id: required().regex(/^\d+$/, 'must be numeric'),
  api_base: z.string().url('must be a URL').optional(),
});

export type WebsupportConfig = z.infer<typeof WebsupportConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Validate a snake_case configuration object and convert it to provider options.
 */
export function parseWebsupportConfig(input: unknown): WebsupportOptions {
  const parsed = WebsupportConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) =>
        i.path.length ? `${i.path.join('.')} ${i.message}` : i.message
      )
      .join(', ');
    throw new ConfigError(`Websupport: invalid configuration: ${details}`);
  }

  const { api_key, api_secret, service_id, api_base } = parsed.data;
  return {
    apiKey: api_key,
    apiSecret: api_secret,
    serviceId: service_id,
    ...(api_base ? { apiBase: api_base } : {}),
  };
}

/**
 * Read provider options from `WEBSUPPORT_*` environment variables.
 *
 * - `WEBSUPPORT_API_KEY`, `WEBSUPPORT_API_SECRET`, `WEBSUPPORT_SERVICE_ID` (required)
 * - `WEBSUPPORT_API_BASE` (optional)
 */
export function websupportOptionsFromEnv(env: Env = process.env): WebsupportOptions {
  return parseWebsupportConfig({
    api_key: env.WEBSUPPORT_API_KEY,
    api_secret: env.WEBSUPPORT_API_SECRET,
    service_id: env.WEBSUPPORT_SERVICE_ID,
    api_base: env.WEBSUPPORT_API_BASE || undefined,
  });
}

/** Zone used by the CLI when none is given (`WEBSUPPORT_TEST_ZONE`) */
export function testZoneFromEnv(env: Env = process.env): string {
  return env.WEBSUPPORT_TEST_ZONE || 'example.com';
}

/** Domain checked in public DNS by `acme-test` (`WEBSUPPORT_TEST_DOMAIN`) */
export function testDomainFromEnv(env: Env = process.env): string {
  return env.WEBSUPPORT_TEST_DOMAIN || 'libdns.example.com';
}
