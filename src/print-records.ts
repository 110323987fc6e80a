import type { PorkbunApi } from './provider.js';
import type { PorkbunRecord, RequestOptions } from './types.js';

/** Record types selected for listing */
export interface TypeFilter {
  all: boolean;
  types: ReadonlySet<string>;
}

/**
 * Parse a comma-separated list of record types (`A,aaaa,TXT`).
 * `all` anywhere in the list selects every type.
 */
export function parseTypeFilter(text: string): TypeFilter {
  const types = new Set<string>();
  let all = false;

  for (const part of text.split(',')) {
    const name = part.trim();
    if (name === '') continue;
    if (name.toLowerCase() === 'all') {
      all = true;
    } else {
      types.add(name.toUpperCase());
    }
  }

  return { all, types };
}

export function filterRecords(
  records: readonly PorkbunRecord[],
  filter: TypeFilter
): PorkbunRecord[] {
  return records.filter((r) => filter.all || filter.types.has(r.type));
}

/** `name type content ttl prio (id)` */
export function formatRecord(record: PorkbunRecord): string {
  return `${record.name} ${record.type} ${record.content} ${record.ttl} ${record.prio} (${record.id})`;
}

export interface RecordListing {
  /** Every record of the domain, unfiltered */
  records: PorkbunRecord[];
  /** One formatted line per record matching the filter */
  lines: string[];
}

/**
 * Retrieve all records of `domain` and format those matching `types`.
 */
export async function listRecords(
  client: PorkbunApi,
  domain: string,
  types: string,
  options?: RequestOptions
): Promise<RecordListing> {
  const records = await client.retrieveAllRecords(domain, options);
  const lines = filterRecords(records, parseTypeFilter(types)).map(formatRecord);
  return { records, lines };
}
