import { describe, it, expect, vi } from 'vitest';
import {
  filterRecords,
  formatRecord,
  listRecords,
  parseTypeFilter,
} from '../src/print-records.js';
import type { PorkbunApi } from '../src/provider.js';
import type { PorkbunRecord } from '../src/types.js';

const records: PorkbunRecord[] = [
  { id: '101', name: 'example.com', type: 'A', content: '203.0.113.7', ttl: '600', prio: '0', notes: '' },
  { id: '102', name: 'www.example.com', type: 'CNAME', content: 'example.com', ttl: '600', prio: '', notes: '' },
  { id: '103', name: 'example.com', type: 'MX', content: 'mx.example.net', ttl: '3600', prio: '10', notes: '' },
  { id: '104', name: 'example.com', type: 'AAAA', content: '2001:db8::7', ttl: '600', prio: '0', notes: '' },
];

describe('parseTypeFilter', () => {
  it('upper-cases type names', () => {
    const filter = parseTypeFilter('a,cname');
    expect(filter.all).toBe(false);
    expect([...filter.types]).toEqual(['A', 'CNAME']);
  });

  it('selects everything for "all"', () => {
    expect(parseTypeFilter('all').all).toBe(true);
  });

  it('selects everything when "all" is one of several entries', () => {
    expect(parseTypeFilter('MX,all').all).toBe(true);
  });

  it('ignores blank entries and surrounding spaces', () => {
    expect([...parseTypeFilter(' A , ,TXT,').types]).toEqual(['A', 'TXT']);
  });
});

describe('filterRecords', () => {
  it('keeps records of the selected types', () => {
    const result = filterRecords(records, parseTypeFilter('A,AAAA'));
    expect(result.map((r) => r.id)).toEqual(['101', '104']);
  });

  it('keeps all records for "all"', () => {
    expect(filterRecords(records, parseTypeFilter('all'))).toEqual(records);
  });

  it('returns nothing when no type matches', () => {
    expect(filterRecords(records, parseTypeFilter('TXT'))).toEqual([]);
  });
});

describe('formatRecord', () => {
  it('formats name, type, content, ttl, priority and id', () => {
    expect(formatRecord(records[2]!)).toBe(
      'example.com MX mx.example.net 3600 10 (103)'
    );
  });

  it('keeps the separator for an empty priority', () => {
    expect(formatRecord(records[1]!)).toBe(
      'www.example.com CNAME example.com 600  (102)'
    );
  });
});

describe('listRecords', () => {
  function createClient(): PorkbunApi {
    return {
      ping: vi.fn(),
      retrieveAllRecords: vi.fn(async () => records),
      createRecord: vi.fn(),
      editRecordsByNameAndType: vi.fn(),
    };
  }

  it('retrieves, filters and formats', async () => {
    const client = createClient();

    const listing = await listRecords(client, 'example.com', 'a');

    expect(client.retrieveAllRecords).toHaveBeenCalledWith('example.com', undefined);
    expect(listing.lines).toEqual(['example.com A 203.0.113.7 600 0 (101)']);
  });

  it('returns the unfiltered snapshot', async () => {
    const listing = await listRecords(createClient(), 'example.com', 'TXT');

    expect(listing.lines).toEqual([]);
    expect(listing.records).toEqual(records);
  });

  it('passes request options to the client', async () => {
    const client = createClient();
    const controller = new AbortController();

    await listRecords(client, 'example.com', 'all', { signal: controller.signal });

    expect(client.retrieveAllRecords).toHaveBeenCalledWith('example.com', {
      signal: controller.signal,
    });
  });
});
