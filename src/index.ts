export { porkbun } from './providers/porkbun.js';
export type { PorkbunOptions } from './providers/porkbun.js';
export { runDynDns, recordExists } from './dyndns.js';
export type { DynDnsOptions } from './dyndns.js';
export { checkUrl } from './check-url.js';
export type { CheckUrlResult, CheckUrlOptions } from './check-url.js';
export {
  listRecords,
  parseTypeFilter,
  filterRecords,
  formatRecord,
} from './print-records.js';
export type { RecordListing, TypeFilter } from './print-records.js';
export {
  readClientConfig,
  parseClientConfig,
  defaultConfigPath,
  parseDuration,
} from './config.js';
export { cleanDomain, joinDomain } from './domain.js';
export { PorkbunApiError, DynDnsError, ConfigError } from './errors.js';
export type { DynDnsErrorCode, PorkbunOperation } from './errors.js';
export {
  PORKBUN_API,
  PORKBUN_API_IPV4,
  DEFAULT_TIMEOUT_MS,
  CHECK_URL_TIMEOUT_MS,
} from './constants.js';
export type { PorkbunApi } from './provider.js';
export type {
  Credentials,
  ClientConfig,
  PorkbunRecord,
  PingResult,
  RecordInput,
  RequestOptions,
  DynDnsResult,
  SkipReason,
} from './types.js';
