export { websupport } from './providers/websupport.js';
export type { WebsupportOptions } from './providers/websupport.js';
export {
  parseWebsupportConfig,
  websupportOptionsFromEnv,
  WebsupportConfigSchema,
} from './config.js';
export type { WebsupportConfig } from './config.js';
export { authHeaders, formatXDate, signRequest } from './signature.js';
export type { Credentials } from './signature.js';
export { decodeRecord, encodeRecord } from './records.js';
export type { CreateRecordBody, RecordPage, WireRecord } from './records.js';
export { createTransport } from './transport.js';
export type {
  FetchFn,
  Transport,
  TransportOptions,
  TransportRequest,
  TransportResponse,
} from './transport.js';
export { relativeName, sameRecordName, trimTrailingDot } from './domain.js';
export { verifyTxtRecord } from './verify.js';
export {
  CancelledError,
  ConfigError,
  DecodeError,
  RemoteError,
  TransportError,
  WebsupportError,
} from './errors.js';
export {
  DEFAULT_TTL,
  PAGE_SIZE,
  WEBSUPPORT_API_BASE,
} from './constants.js';
export type {
  AddressRecord,
  CnameRecord,
  DnsRecord,
  DnsRecordManager,
  MxRecord,
  RequestOptions,
  TxtRecord,
} from './types.js';
