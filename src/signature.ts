import { createHmac } from 'node:crypto';

export interface Credentials {
  apiKey: string;
  apiSecret: string;
}

/**
 * Websupport request signature: lowercase hex HMAC-SHA1 of
 * `"{METHOD} {PATH} {TIMESTAMP}"` keyed with the API secret.
 *
 * `path` is the signed path, which carries the `/v2` prefix.
 */
export function signRequest(
  secret: string,
  method: string,
  path: string,
  timestamp: number
): string {
  return createHmac('sha1', secret)
    .update(`${method} ${path} ${timestamp}`)
    .digest('hex');
}

/**
 * Format a Unix timestamp (seconds) for the `X-Date` header: `YYYYMMDDTHHMMSSZ` in UTC.
 */
export function formatXDate(timestamp: number): string {
  // 2023-11-14T22:13:20.000Z → 20231114T221320Z
  return new Date(timestamp * 1000)
    .toISOString()
    .replace(/[-:]/g, '')
    .replace(/\.\d{3}/, '');
}

/** Current Unix time in whole seconds */
export function unixTimestamp(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Build the headers for one signed request.
 */
export function authHeaders(
  credentials: Credentials,
  method: string,
  signPath: string,
  timestamp: number = unixTimestamp()
): Record<string, string> {
  const signature = signRequest(
    credentials.apiSecret,
    method,
    signPath,
    timestamp
  );
  const basic = Buffer.from(
    `${credentials.apiKey}:${signature}`,
    'utf8'
  ).toString('base64');

  return {
    Authorization: `Basic ${basic}`,
    'X-Date': formatXDate(timestamp),
    'Content-Type': 'application/json',
    Accept: 'application/json',
  };
}
