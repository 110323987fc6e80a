import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { checkUrl } from '../src/check-url.js';

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterAll(() => {
  vi.unstubAllGlobals();
});

function response(status: number, bytes: number) {
  return {
    status,
    arrayBuffer: () => Promise.resolve(new ArrayBuffer(bytes)),
  };
}

/** A fetch that only settles when its signal aborts */
function hangingFetch(_url: string, init: RequestInit): Promise<never> {
  return new Promise((_resolve, reject) => {
    const signal = init.signal;
    if (!signal) return;
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason));
  });
}

describe('checkUrl', () => {
  it('reports a 200 response as reachable', async () => {
    mockFetch.mockResolvedValueOnce(response(200, 12));

    const result = await checkUrl('https://example.com/');

    expect(result).toEqual({ reachable: true, status: 200, bytes: 12 });
  });

  it('reports error statuses as reachable too', async () => {
    mockFetch.mockResolvedValueOnce(response(502, 0));

    const result = await checkUrl('https://example.com/');

    expect(result).toEqual({ reachable: true, status: 502, bytes: 0 });
  });

  it('does not follow redirects', async () => {
    mockFetch.mockResolvedValueOnce(response(301, 0));

    const result = await checkUrl('http://example.com/');

    expect(result).toEqual({ reachable: true, status: 301, bytes: 0 });
    expect(mockFetch).toHaveBeenCalledWith(
      'http://example.com/',
      expect.objectContaining({ method: 'GET', redirect: 'manual' })
    );
  });

  it('still counts a response whose body fails to read', async () => {
    mockFetch.mockResolvedValueOnce({
      status: 200,
      arrayBuffer: () => Promise.reject(new Error('terminated')),
    });

    const result = await checkUrl('https://example.com/');

    expect(result).toEqual({ reachable: true, status: 200, bytes: 0 });
  });

  it('reports transport errors as unreachable', async () => {
    const error = new TypeError('fetch failed');
    mockFetch.mockRejectedValueOnce(error);

    const result = await checkUrl('https://example.com/');

    expect(result).toEqual({ reachable: false, error });
  });

  it('gives up after its own timeout', async () => {
    mockFetch.mockImplementationOnce(hangingFetch);

    const result = await checkUrl('https://example.com/', { timeoutMs: 10 });

    expect(result.reachable).toBe(false);
  });

  it('gives up when the outer deadline has already passed', async () => {
    mockFetch.mockImplementationOnce(hangingFetch);
    const controller = new AbortController();
    controller.abort(new Error('outer deadline'));

    const result = await checkUrl('https://example.com/', {
      signal: controller.signal,
    });

    expect(result).toEqual({ reachable: false, error: new Error('outer deadline') });
  });
});
