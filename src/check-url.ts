import { CHECK_URL_TIMEOUT_MS } from './constants.js';

export type CheckUrlResult =
  | { reachable: true; status: number; bytes: number }
  | { reachable: false; error: unknown };

export interface CheckUrlOptions {
  /** Outer deadline; the check also stops at its own `timeoutMs` */
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Probe a URL with a GET that does not follow redirects.
 *
 * Any response counts as reachable, whatever its status code. Transport
 * errors and timeouts are returned, not thrown.
 */
export async function checkUrl(
  url: string,
  options: CheckUrlOptions = {}
): Promise<CheckUrlResult> {
  const timeout = AbortSignal.timeout(options.timeoutMs ?? CHECK_URL_TIMEOUT_MS);
  const signal = options.signal
    ? AbortSignal.any([options.signal, timeout])
    : timeout;

  let res: Response;
  try {
    res = await fetch(url, { method: 'GET', redirect: 'manual', signal });
  } catch (error) {
    return { reachable: false, error };
  }

  // The response already proves reachability; a truncated body only lowers the count
  const bytes = await res.arrayBuffer().then(
    (body) => body.byteLength,
    () => 0
  );
  return { reachable: true, status: res.status, bytes };
}
