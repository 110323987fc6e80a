import { z } from 'zod';
import { PORKBUN_API, PORKBUN_API_IPV4, PORKBUN_SUCCESS } from '../constants.js';
import {
  PorkbunApiError,
  errorMessage,
  formatZodError,
  type PorkbunOperation,
} from '../errors.js';
import { createChildLogger } from '../logger.js';
import type { PorkbunApi } from '../provider.js';
import type { Credentials, RecordInput, RequestOptions } from '../types.js';

export interface PorkbunOptions {
  credentials: Credentials;
  /**
   * Use the IPv4-only API host (default). `ping` then reports the IPv4
   * address even on dual-stack hosts.
   */
  ipv4Only?: boolean;
  /** Override the API base URL */
  baseUrl?: string;
}

const log = createChildLogger({ service: 'porkbun' });

// Porkbun is inconsistent about numbers vs. strings, and sends null for unset fields
const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v == null ? '' : String(v)));

const id = z.union([z.string(), z.number()]).transform(String);

const statusSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
});

const pingSchema = statusSchema.extend({
  yourIp: z.string(),
});

const recordSchema = z.object({
  id,
  name: z.string(),
  type: z.string(),
  content: z.string(),
  ttl: text,
  prio: text,
  notes: text,
});

const recordsSchema = statusSchema.extend({
  records: z.array(recordSchema),
});

const createSchema = statusSchema.extend({
  id,
});

async function readBody(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch (err) {
    return `(could not read response body: ${errorMessage(err)})`;
  }
}

/**
 * POST a request to the Porkbun API and validate the response.
 *
 * The credentials are added to every request body.
 */
async function pbFetch<S extends z.ZodTypeAny>(
  baseUrl: string,
  credentials: Credentials,
  operation: PorkbunOperation,
  path: string,
  body: Record<string, string>,
  schema: S,
  signal?: AbortSignal
): Promise<z.output<S>> {
  const url = `${baseUrl}/${path}`;
  log.debug({ operation, url }, 'Porkbun request');

  let res: Response;
  try {
    res = await fetch(url, {
      method: 'POST',
      headers: new Headers({ 'Content-Type': 'application/json' }),
      body: JSON.stringify({
        secretapikey: credentials.secretApiKey,
        apikey: credentials.apiKey,
        ...body,
      }),
      signal,
    });
  } catch (err) {
    throw new PorkbunApiError(
      `Porkbun ${operation} request failed: ${errorMessage(err)}`,
      { operation, cause: err }
    );
  }

  if (res.status !== 200) {
    const raw = await readBody(res);
    throw new PorkbunApiError(
      `Porkbun API error ${res.status} (${operation}): ${raw}`,
      { operation, status: res.status, body: raw }
    );
  }

  let data: unknown;
  try {
    data = await res.json();
  } catch (err) {
    throw new PorkbunApiError(
      `Porkbun ${operation} returned an invalid response: ${errorMessage(err)}`,
      { operation, status: res.status, cause: err }
    );
  }

  const status = statusSchema.safeParse(data);
  if (!status.success) {
    throw new PorkbunApiError(
      `Porkbun ${operation} returned an invalid response: ${formatZodError(status.error)}`,
      { operation, status: res.status, cause: status.error }
    );
  }
  if (status.data.status !== PORKBUN_SUCCESS) {
    throw new PorkbunApiError(
      `Porkbun ${operation} failed: ${status.data.message ?? status.data.status}`,
      { operation, status: res.status }
    );
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new PorkbunApiError(
      `Porkbun ${operation} returned an invalid response: ${formatZodError(parsed.error)}`,
      { operation, status: res.status, cause: parsed.error }
    );
  }
  return parsed.data;
}

function optionalFields(record: RecordInput): Record<string, string> {
  const fields: Record<string, string> = {};
  if (record.ttl !== undefined) {
    fields['ttl'] = String(record.ttl);
  }
  if (record.prio !== undefined) {
    fields['prio'] = String(record.prio);
  }
  return fields;
}

/**
 * Create a Porkbun API client.
 *
 * Uses Porkbun API v3 with native `fetch` (Node 18+). Every call is a
 * POST of a JSON body carrying the API key pair.
 */
export function porkbun(options: PorkbunOptions): PorkbunApi {
  const { credentials } = options;

  if (!credentials.apiKey) {
    throw new Error('Porkbun: apiKey is required');
  }
  if (!credentials.secretApiKey) {
    throw new Error('Porkbun: secretApiKey is required');
  }

  const fallback = options.ipv4Only === false ? PORKBUN_API : PORKBUN_API_IPV4;
  const baseUrl = (options.baseUrl ?? fallback).replace(/\/+$/, '');

  function apiFetch<S extends z.ZodTypeAny>(
    operation: PorkbunOperation,
    segments: string[],
    body: Record<string, string>,
    schema: S,
    signal?: AbortSignal
  ) {
    const path = segments.map(encodeURIComponent).join('/');
    return pbFetch(baseUrl, credentials, operation, path, body, schema, signal);
  }

  return {
    async ping(opts?: RequestOptions) {
      const data = await apiFetch('ping', ['ping'], {}, pingSchema, opts?.signal);
      return { status: data.status, yourIp: data.yourIp };
    },

    async retrieveAllRecords(domain: string, opts?: RequestOptions) {
      const data = await apiFetch(
        'retrieve',
        ['dns', 'retrieve', domain],
        {},
        recordsSchema,
        opts?.signal
      );
      return data.records;
    },

    async createRecord(domain: string, record: RecordInput, opts?: RequestOptions) {
      const data = await apiFetch(
        'create',
        ['dns', 'create', domain],
        {
          name: record.name,
          type: record.type,
          content: record.content,
          ...optionalFields(record),
        },
        createSchema,
        opts?.signal
      );
      return data.id;
    },

    async editRecordsByNameAndType(
      domain: string,
      record: RecordInput,
      opts?: RequestOptions
    ) {
      // The root domain has no name segment
      const segments = ['dns', 'editByNameType', domain, record.type];
      if (record.name !== '') {
        segments.push(record.name);
      }
      const data = await apiFetch(
        'editByNameType',
        segments,
        { content: record.content, ...optionalFields(record) },
        statusSchema,
        opts?.signal
      );
      return data.status;
    },
  };
}
