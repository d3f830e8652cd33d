import createDebug from 'debug';
import {
  DEFAULT_LOOKUP_ATTEMPTS,
  DEFAULT_PROPAGATION_DELAY,
  DEFAULT_TTL,
  PAGE_SIZE,
  WEBSUPPORT_API_BASE,
  WEBSUPPORT_SIGNATURE_PREFIX,
} from '../constants.js';
import { sameRecordName } from '../domain.js';
import {
  CancelledError,
  ConfigError,
  DecodeError,
  RemoteError,
  errorMessage,
} from '../errors.js';
import {
  RecordPageSchema,
  WireRecordSchema,
  decodeRecord,
  encodeRecord,
  type RecordPage,
  type WireRecord,
} from '../records.js';
import { authHeaders, type Credentials } from '../signature.js';
import {
  createTransport,
  delay,
  type FetchFn,
  type TransportResponse,
} from '../transport.js';
import type {
  DnsRecord,
  DnsRecordManager,
  RequestOptions,
  TxtRecord,
} from '../types.js';

const debug = createDebug('websupport-dns:records');

export interface WebsupportOptions {
  apiKey: string;
  apiSecret: string;
  /** Numeric service ID of the domain, as shown in the Websupport admin */
  serviceId: string;
  /** Defaults to `https://rest.websupport.sk/v2` */
  apiBase?: string;
  /** Replaces the global `fetch` */
  fetch?: FetchFn;
  /** Per-request timeout in milliseconds (default 30 000) */
  timeout?: number;
  /** Wait before looking up a created record, doubled after every miss (default 1 000 ms) */
  propagationDelay?: number;
  /** Lookups made before a created record is returned without `providerId` (default 3) */
  lookupAttempts?: number;
}

interface CallOptions {
  query?: string;
  body?: string;
  signal?: AbortSignal;
}

/**
 * Keep the TXT records of a mixed batch; every other variant is skipped.
 */
function txtRecords(records: DnsRecord[]): TxtRecord[] {
  const result: TxtRecord[] = [];
  for (const record of records) {
    switch (record.type) {
      case 'TXT':
        result.push(record);
        break;
      case 'A':
      case 'AAAA':
      case 'CNAME':
      case 'MX':
        debug('skipping %s record %s', record.type, record.name);
        break;
      default:
        skipUnknown(record);
    }
  }
  return result;
}

function skipUnknown(record: never): void {
  debug('skipping unsupported record %o', record);
}

function findRecord(
  existing: TxtRecord[],
  target: TxtRecord,
  zone: string
): TxtRecord | undefined {
  return existing.find(
    (r) => sameRecordName(r.name, target.name, zone) && r.text === target.text
  );
}

function parsePage(body: string, page: number): RecordPage {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new DecodeError(
      `Websupport: failed to decode record page ${page}: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  const parsed = RecordPageSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join(', ');
    throw new DecodeError(
      `Websupport: unexpected record page ${page}: ${details}`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

function parseTxtRow(row: unknown, page: number, index: number): WireRecord {
  const parsed = WireRecordSchema.safeParse(row);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `data.${index}.${i.path.join('.')}: ${i.message}`)
      .join(', ');
    throw new DecodeError(
      `Websupport: unexpected record page ${page}: ${details}`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

/**
 * Create a Websupport DNS provider.
 *
 * Manages TXT records through the Websupport REST API v2 with HMAC-SHA1
 * request signing. The transport is built here, once, and shared by every
 * operation.
 *
 * Record creation answers 204 with no body, so the ID of a created record
 * is recovered by listing the zone and matching on name and text.
 */
export function websupport(options: WebsupportOptions): DnsRecordManager {
  const { apiKey, apiSecret, serviceId } = options;

  if (!apiKey) throw new ConfigError('Websupport: apiKey is required');
  if (!apiSecret) throw new ConfigError('Websupport: apiSecret is required');
  if (!serviceId) throw new ConfigError('Websupport: serviceId is required');

  const lookupAttempts = options.lookupAttempts ?? DEFAULT_LOOKUP_ATTEMPTS;
  if (!Number.isInteger(lookupAttempts) || lookupAttempts < 1) {
    throw new ConfigError(
      `Websupport: lookupAttempts must be a positive integer, got ${lookupAttempts}`
    );
  }
  const propagationDelay =
    options.propagationDelay ?? DEFAULT_PROPAGATION_DELAY;
  if (!Number.isFinite(propagationDelay) || propagationDelay < 0) {
    throw new ConfigError(
      `Websupport: propagationDelay must be a non-negative number, got ${propagationDelay}`
    );
  }

  const apiBase = (options.apiBase || WEBSUPPORT_API_BASE).replace(/\/+$/, '');
  const credentials: Credentials = { apiKey, apiSecret };
  const transport = createTransport({
    fetch: options.fetch,
    timeout: options.timeout,
  });
  const recordsPath = `/service/${encodeURIComponent(serviceId)}/dns/record`;

  function call(
    method: 'GET' | 'POST' | 'DELETE',
    path: string,
    callOptions: CallOptions = {}
  ): Promise<TransportResponse> {
    const { query, body, signal } = callOptions;
    // The API signs against /v2{path} without the query string
    const headers = authHeaders(
      credentials,
      method,
      `${WEBSUPPORT_SIGNATURE_PREFIX}${path}`
    );
    return transport.request({
      method,
      url: `${apiBase}${path}${query ? `?${query}` : ''}`,
      headers,
      body,
      signal,
    });
  }

  async function listRecords(
    zone: string,
    signal?: AbortSignal
  ): Promise<TxtRecord[]> {
    const records: TxtRecord[] = [];
    let page = 1;

    while (true) {
      const res = await call('GET', recordsPath, {
        query: `page=${page}&rowsPerPage=${PAGE_SIZE}`,
        signal,
      });
      if (res.status !== 200) {
        throw new RemoteError(
          `Websupport: failed to list records: ${res.status}: ${res.body}`,
          res.status,
          res.body
        );
      }

      const data = parsePage(res.body, page);
      for (const [index, item] of data.data.entries()) {
        if (item.type !== 'TXT') continue;
        records.push(decodeRecord(parseTxtRow(item, page, index)));
      }

      if (data.currentPage >= data.totalPages) break;
      page++;
    }

    debug('listed %d TXT records for %s', records.length, zone);
    return records;
  }

  /**
   * Find the ID of a record that was just created. Misses and listing
   * failures are retried with a doubling wait, then give up quietly.
   */
  async function resolveCreatedId(
    zone: string,
    record: TxtRecord,
    signal?: AbortSignal
  ): Promise<string | undefined> {
    let wait = propagationDelay;

    for (let attempt = 1; attempt <= lookupAttempts; attempt++) {
      await delay(wait, signal);
      wait *= 2;

      let existing: TxtRecord[];
      try {
        existing = await listRecords(zone, signal);
      } catch (err) {
        if (err instanceof CancelledError) throw err;
        debug(
          'lookup %d/%d for %s failed: %s',
          attempt,
          lookupAttempts,
          record.name,
          errorMessage(err)
        );
        continue;
      }

      const match = findRecord(existing, record, zone);
      if (match?.providerId) return match.providerId;
      debug(
        'lookup %d/%d: %s not listed yet',
        attempt,
        lookupAttempts,
        record.name
      );
    }

    return undefined;
  }

  async function lookupId(
    zone: string,
    record: TxtRecord,
    signal?: AbortSignal
  ): Promise<string | undefined> {
    let existing: TxtRecord[];
    try {
      existing = await listRecords(zone, signal);
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      debug('lookup for %s failed: %s', record.name, errorMessage(err));
      return undefined;
    }
    return findRecord(existing, record, zone)?.providerId;
  }

  return {
    async appendRecords(
      zone: string,
      records: DnsRecord[],
      requestOptions: RequestOptions = {}
    ): Promise<TxtRecord[]> {
      const { signal } = requestOptions;
      const created: TxtRecord[] = [];

      for (const record of txtRecords(records)) {
        const toCreate: TxtRecord = {
          type: 'TXT',
          name: record.name,
          text: record.text,
          ttl: record.ttl !== undefined && record.ttl > 0 ? record.ttl : DEFAULT_TTL,
        };

        const res = await call('POST', recordsPath, {
          body: JSON.stringify(encodeRecord(toCreate)),
          signal,
        });
        if (res.status !== 204) {
          throw new RemoteError(
            `Websupport: failed to create record ${record.name}: ${res.status}: ${res.body}`,
            res.status,
            res.body
          );
        }

        const providerId = await resolveCreatedId(zone, toCreate, signal);
        if (providerId) {
          debug('created %s with id %s', toCreate.name, providerId);
          created.push({ ...toCreate, providerId });
        } else {
          debug('created %s, id unresolved', toCreate.name);
          created.push(toCreate);
        }
      }

      return created;
    },

    async deleteRecords(
      zone: string,
      records: DnsRecord[],
      requestOptions: RequestOptions = {}
    ): Promise<TxtRecord[]> {
      const { signal } = requestOptions;
      const deleted: TxtRecord[] = [];

      for (const record of txtRecords(records)) {
        const providerId =
          record.providerId || (await lookupId(zone, record, signal));
        if (!providerId) {
          debug('no listed record matches %s, skipping', record.name);
          continue;
        }

        const res = await call(
          'DELETE',
          `${recordsPath}/${encodeURIComponent(providerId)}`,
          { signal }
        );
        if (res.status !== 204) {
          throw new RemoteError(
            `Websupport: failed to delete record ${providerId}: ${res.status}: ${res.body}`,
            res.status,
            res.body
          );
        }

        deleted.push({ ...record, providerId });
      }

      return deleted;
    },

    getRecords(
      zone: string,
      requestOptions: RequestOptions = {}
    ): Promise<TxtRecord[]> {
      return listRecords(zone, requestOptions.signal);
    },
  };
}
