/** Default Websupport REST API base URL */
export const WEBSUPPORT_API_BASE = 'https://rest.websupport.sk/v2';

/** Prefix the API signs against, even though request paths omit it */
export const WEBSUPPORT_SIGNATURE_PREFIX = '/v2';

/** TTL applied when a record is appended without one (120 s) */
export const DEFAULT_TTL = 120_000;

/** Rows requested per page when listing records */
export const PAGE_SIZE = 100;

/** Default request timeout (30 s) */
export const DEFAULT_TIMEOUT = 30_000;

/** Wait before the first lookup of a freshly created record (1 s) */
export const DEFAULT_PROPAGATION_DELAY = 1_000;

/** Lookups attempted before a created record is returned without an ID */
export const DEFAULT_LOOKUP_ATTEMPTS = 3;
