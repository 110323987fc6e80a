import dns from 'node:dns';
import { isIPv4 } from 'node:net';
import { checkUrl } from './check-url.js';
import { DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS } from './constants.js';
import { joinDomain } from './domain.js';
import { DynDnsError, errorMessage, type DynDnsErrorCode } from './errors.js';
import { createChildLogger } from './logger.js';
import type { PorkbunApi } from './provider.js';
import type { DynDnsResult, PorkbunRecord } from './types.js';

const resolver = dns.promises;
const log = createChildLogger({ service: 'dyndns' });

export interface DynDnsOptions {
  /** Registered domain, as in the config file */
  domain: string;
  /** Subdomain label to update. Empty (default) updates the root domain. */
  subdomain?: string;
  /**
   * Optional URL served through the record being maintained. If a GET
   * gets any response, the record is assumed correct and nothing else runs.
   */
  checkUrl?: string;
  /** Deadline for all remote calls combined */
  timeoutMs?: number;
  /** Records already retrieved in this run, if any */
  knownRecords?: readonly PorkbunRecord[];
}

/**
 * True if `records` contains a record with exactly this type, name and content.
 */
export function recordExists(
  records: readonly PorkbunRecord[],
  type: string,
  name: string,
  content: string
): boolean {
  return records.some(
    (r) => r.type === type && r.name === name && r.content === content
  );
}

/**
 * Reject with the signal's reason once it aborts, for work that takes no signal.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Point the A record of `subdomain.domain` at the current public IP.
 *
 * Cheap checks run first, and the first conclusive one ends the run:
 * 1. the check URL answers (any status)
 * 2. public DNS already resolves to the IP reported by `ping`
 * 3. a matching A record is among `knownRecords`
 *
 * Only then is the record rewritten with `editRecordsByNameAndType`.
 * Fatal conditions are thrown as `DynDnsError`.
 */
export async function runDynDns(
  client: PorkbunApi,
  options: DynDnsOptions
): Promise<DynDnsResult> {
  const subdomain = options.subdomain ?? '';
  const hostname = joinDomain(subdomain, options.domain);
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new RangeError(
      `timeoutMs must be an integer between 1 and ${MAX_TIMEOUT_MS}, got ${timeoutMs}`
    );
  }
  const signal = AbortSignal.timeout(timeoutMs);

  function fail(code: DynDnsErrorCode, message: string, cause?: unknown): DynDnsError {
    if (signal.aborted) {
      return new DynDnsError('timeout', `${message} (deadline exceeded)`, { cause });
    }
    return new DynDnsError(code, message, { cause });
  }

  if (options.checkUrl) {
    const url = options.checkUrl;
    if (!isValidUrl(url)) {
      throw new DynDnsError('invalid-check-url', `Invalid check URL: ${url}`);
    }
    const check = await checkUrl(url, { signal });
    if (check.reachable) {
      log.info(
        { url, status: check.status, bytes: check.bytes },
        'URL check successful, skipping DNS update'
      );
      return { action: 'skipped', reason: 'check-url-reachable', hostname };
    }
    log.warn({ url, error: errorMessage(check.error) }, 'URL check failed');
  }

  let ip: string;
  try {
    ip = (await client.ping({ signal })).yourIp;
  } catch (err) {
    throw fail('ping-failed', `Ping failed: ${errorMessage(err)}`, err);
  }
  log.info({ ip }, 'Current public IP');

  let addresses: string[];
  try {
    const found = await untilAborted(resolver.lookup(hostname, { all: true }), signal);
    addresses = found.map((a) => a.address);
  } catch (err) {
    throw fail(
      'lookup-failed',
      `Failed to look up "${hostname}": ${errorMessage(err)}. Set up an A record before running in dyndns mode`,
      err
    );
  }

  if (addresses.includes(ip)) {
    log.info({ hostname, ip }, 'Public DNS already matches current IP, no update required');
    return { action: 'skipped', reason: 'dns-up-to-date', hostname, ip };
  }
  log.debug({ hostname, addresses }, 'Public DNS differs from current IP');

  if (options.knownRecords && recordExists(options.knownRecords, 'A', hostname, ip)) {
    log.info({ hostname, ip }, 'A record already exists, no update required');
    return { action: 'skipped', reason: 'record-exists', hostname, ip };
  }

  if (!isIPv4(ip)) {
    throw new DynDnsError('invalid-ip', `Not a valid IPv4 address: ${ip}`);
  }

  try {
    await client.editRecordsByNameAndType(
      options.domain,
      { name: subdomain, type: 'A', content: ip },
      { signal }
    );
  } catch (err) {
    throw fail(
      'update-failed',
      `Failed to update A record for ${hostname}: ${errorMessage(err)}`,
      err
    );
  }

  log.info({ hostname, ip }, 'Updated A record');
  return { action: 'updated', hostname, ip };
}
