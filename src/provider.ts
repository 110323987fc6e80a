import type {
  PingResult,
  PorkbunRecord,
  RecordInput,
  RequestOptions,
} from './types.js';

/** The Porkbun API calls used by the updater (see `providers/porkbun.ts`) */
export interface PorkbunApi {
  /** Return the caller's public IP as seen by Porkbun */
  ping(options?: RequestOptions): Promise<PingResult>;
  /** Get every DNS record of a domain */
  retrieveAllRecords(
    domain: string,
    options?: RequestOptions
  ): Promise<PorkbunRecord[]>;
  /** Create a DNS record, returning its ID */
  createRecord(
    domain: string,
    record: RecordInput,
    options?: RequestOptions
  ): Promise<string>;
  /** Overwrite the content of all records matching name and type */
  editRecordsByNameAndType(
    domain: string,
    record: RecordInput,
    options?: RequestOptions
  ): Promise<string>;
}
