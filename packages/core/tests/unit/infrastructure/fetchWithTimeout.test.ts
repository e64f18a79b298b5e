import { describe, it, expect, vi, afterEach } from 'vitest';
import { fetchWithTimeout, hasLinkRelation } from '../../../src/infrastructure/http/fetchWithTimeout.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('fetchWithTimeout()', () => {
  it('should abort a request that outlives the timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              reject(new Error('request aborted'));
            });
          }),
      ),
    );

    await expect(fetchWithTimeout('http://slow.test/', {}, 10)).rejects.toThrow('request aborted');
  });

  it('should abort a response whose body stalls', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn((_url: string, init?: RequestInit) => {
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            init?.signal?.addEventListener('abort', () => {
              controller.error(new Error('body aborted'));
            });
          },
        });
        return Promise.resolve(new Response(body));
      }),
    );

    await expect(fetchWithTimeout('http://stalled.test/', {}, 10)).rejects.toThrow('body aborted');
  });

  it('should return the status, headers and body text', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(() => Promise.resolve(new Response('gone', { status: 410, headers: { 'X-Register': 'address' } }))),
    );

    const response = await fetchWithTimeout('http://fast.test/', {}, 1000);

    expect(response.ok).toBe(false);
    expect(response.status).toBe(410);
    expect(response.headers.get('x-register')).toBe('address');
    expect(response.body).toBe('gone');
  });

  it('should pass headers through', async () => {
    const mockFetch = vi.fn((_url: string, _init?: RequestInit) => Promise.resolve(new Response('ok')));
    vi.stubGlobal('fetch', mockFetch);

    await fetchWithTimeout('http://fast.test/', { Accept: 'text/plain' }, 1000);

    expect(mockFetch.mock.calls[0]?.[1]?.headers).toEqual({ Accept: 'text/plain' });
  });
});

describe('hasLinkRelation()', () => {
  it('should be false without a header', () => {
    expect(hasLinkRelation(null, 'next')).toBe(false);
  });

  it('should find the relation among several links', () => {
    const header = '<http://r.test/?page=1>; rel="prev", <http://r.test/?page=3>; rel="next"';
    expect(hasLinkRelation(header, 'next')).toBe(true);
  });

  it('should find the relation in a space-separated list', () => {
    expect(hasLinkRelation('<http://r.test/?page=3>; rel="next last"', 'next')).toBe(true);
  });

  it('should accept an unquoted relation in any case', () => {
    expect(hasLinkRelation('<http://r.test/?page=3>; rel=NEXT', 'next')).toBe(true);
  });

  it('should not match other relations', () => {
    expect(hasLinkRelation('<http://r.test/?page=1>; rel="first", <http://r.test/?page=9>; rel="last"', 'next')).toBe(
      false,
    );
  });
});
