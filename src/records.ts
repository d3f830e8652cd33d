import { z } from 'zod';
import type { TxtRecord } from './types.js';

export const WireRecordSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  type: z.string(),
  content: z.string(),
  ttl: z.number(),
});

export type WireRecord = z.infer<typeof WireRecordSchema>;

/**
 * One page of `GET /service/{id}/dns/record`.
 *
 * Rows are only checked for `type` here; the lister parses TXT rows with
 * `WireRecordSchema` and drops the rest untouched.
 */
export const RecordPageSchema = z.object({
  currentPage: z.number().int(),
  totalPages: z.number().int(),
  totalRecords: z.number().int().optional(),
  data: z.array(z.object({ type: z.string() }).passthrough()),
});

export type RecordPage = z.infer<typeof RecordPageSchema>;

/** Body of `POST /service/{id}/dns/record` */
export interface CreateRecordBody {
  type: 'TXT';
  name: string;
  content: string;
  /** Whole seconds */
  ttl: number;
}

/**
 * Convert a listed Websupport record into a TXT record.
 * The caller filters on `type` first.
 */
export function decodeRecord(wire: WireRecord): TxtRecord {
  return {
    type: 'TXT',
    name: wire.name,
    text: wire.content,
    ttl: wire.ttl * 1000,
    providerId: String(wire.id),
  };
}

/**
 * Convert a TXT record into a creation body. Sub-second TTL precision is
 * dropped and a negative TTL is written as 0.
 */
export function encodeRecord(record: TxtRecord): CreateRecordBody {
  return {
    type: 'TXT',
    name: record.name,
    content: record.text,
    ttl: Math.trunc(Math.max(record.ttl ?? 0, 0) / 1000),
  };
}
