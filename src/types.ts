/** A TXT record, the only record type this package manages */
export interface TxtRecord {
  type: 'TXT';
  /** Record name, zone-relative (`_acme-challenge`) or absolute (`_acme-challenge.example.com.`) */
  name: string;
  /** The TXT payload */
  text: string;
  /** Time-to-live in milliseconds. Zero or absent means the default (120 s) on append */
  ttl?: number;
  /** Websupport record ID, set once the record is known to exist server-side */
  providerId?: string;
}

export interface AddressRecord {
  type: 'A' | 'AAAA';
  name: string;
  ip: string;
  ttl?: number;
}

export interface CnameRecord {
  type: 'CNAME';
  name: string;
  target: string;
  ttl?: number;
}

export interface MxRecord {
  type: 'MX';
  name: string;
  target: string;
  preference: number;
  ttl?: number;
}

/** Any record a caller may hand to the manager. Non-TXT variants are ignored. */
export type DnsRecord = TxtRecord | AddressRecord | CnameRecord | MxRecord;

/** Per-call options shared by every operation */
export interface RequestOptions {
  /** Aborts in-flight requests and pending waits */
  signal?: AbortSignal;
}

/**
 * Generic record management interface consumed by ACME DNS-01 solvers.
 */
export interface DnsRecordManager {
  /** Create records in a zone. Returns the created records, with `providerId` when it could be resolved. */
  appendRecords(
    zone: string,
    records: DnsRecord[],
    options?: RequestOptions
  ): Promise<TxtRecord[]>;
  /** Delete records from a zone. Returns the records that were actually deleted. */
  deleteRecords(
    zone: string,
    records: DnsRecord[],
    options?: RequestOptions
  ): Promise<TxtRecord[]>;
  /** List every TXT record in a zone */
  getRecords(zone: string, options?: RequestOptions): Promise<TxtRecord[]>;
}
