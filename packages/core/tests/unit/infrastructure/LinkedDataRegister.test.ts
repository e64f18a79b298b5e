import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LinkedDataRegister, extractPoint } from '../../../src/infrastructure/register/LinkedDataRegister.js';
import { FetchIdBatchError, FetchPointError } from '../../../src/domain/errors.js';

const mockFetch = vi.fn<(url: string, init?: RequestInit) => Promise<Response>>();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

const ENDPOINT = 'http://register.test/address/';

function listing(uris: string[], next: boolean): Response {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (next) headers['Link'] = '<http://register.test/address/?page=3>; rel="next"';
  return new Response(JSON.stringify({ register_items: uris.map((uri) => [uri, 'Address']) }), { headers });
}

describe('LinkedDataRegister', () => {
  describe('fetchPage()', () => {
    it('should request the page with page and per_page parameters', async () => {
      mockFetch.mockResolvedValue(listing(['http://register.test/address/1'], false));
      const register = new LinkedDataRegister({ endpoint: ENDPOINT });

      await register.fetchPage(2, 3);

      expect(mockFetch).toHaveBeenCalledWith('http://register.test/address/?page=2&per_page=3', {
        headers: { Accept: 'application/json' },
        signal: expect.any(AbortSignal),
      });
    });

    it('should return the entry URIs and continue while a next link is advertised', async () => {
      mockFetch.mockResolvedValue(listing(['http://register.test/address/1', 'http://register.test/address/2'], true));
      const register = new LinkedDataRegister({ endpoint: ENDPOINT });

      const page = await register.fetchPage(2, 2);

      expect(page).toEqual({
        identifiers: ['http://register.test/address/1', 'http://register.test/address/2'],
        hasMore: true,
      });
    });

    it('should report the last page when there is no next link', async () => {
      mockFetch.mockResolvedValue(listing(['http://register.test/address/9'], false));
      const register = new LinkedDataRegister({ endpoint: ENDPOINT });

      const page = await register.fetchPage(5, 2);

      expect(page.hasMore).toBe(false);
    });

    it('should fail the page on an HTTP error', async () => {
      mockFetch.mockResolvedValue(new Response('unavailable', { status: 503 }));
      const register = new LinkedDataRegister({ endpoint: ENDPOINT });

      const result = register.fetchPage(2, 3);

      await expect(result).rejects.toBeInstanceOf(FetchIdBatchError);
      await expect(result).rejects.toThrow(
        'Failed to fetch page 2 (size 3): HTTP 503 from http://register.test/address/?page=2&per_page=3',
      );
    });

    it('should fail the page on a network error', async () => {
      mockFetch.mockRejectedValue(new TypeError('fetch failed'));
      const register = new LinkedDataRegister({ endpoint: ENDPOINT });

      await expect(register.fetchPage(1, 10)).rejects.toThrow('Failed to fetch page 1 (size 10): fetch failed');
    });

    it('should fail the page when the body is not JSON', async () => {
      mockFetch.mockResolvedValue(new Response('<html></html>'));
      const register = new LinkedDataRegister({ endpoint: ENDPOINT });

      await expect(register.fetchPage(1, 10)).rejects.toThrow('Failed to fetch page 1 (size 10): response is not JSON');
    });

    it('should fail the page when the listing has an unexpected shape', async () => {
      mockFetch.mockResolvedValue(new Response(JSON.stringify({ items: [] })));
      const register = new LinkedDataRegister({ endpoint: ENDPOINT });

      await expect(register.fetchPage(1, 10)).rejects.toThrow('unexpected listing shape');
    });
  });

  describe('getPoint()', () => {
    it('should read the point literal from the entry document', async () => {
      mockFetch.mockResolvedValue(
        new Response(
          JSON.stringify({ geometry: '<http://www.opengis.net/def/crs/EPSG/0/4283> POINT(149.1234 -35.2809)' }),
        ),
      );
      const register = new LinkedDataRegister({ endpoint: ENDPOINT });

      const point = await register.getPoint('http://register.test/address/1');

      expect(point).toEqual({ longitude: '149.1234', latitude: '-35.2809' });
      expect(mockFetch.mock.calls[0]?.[0]).toBe('http://register.test/address/1');
    });

    it('should fail the record when the document has no point', async () => {
      mockFetch.mockResolvedValue(new Response(JSON.stringify({ label: 'no geometry' })));
      const register = new LinkedDataRegister({ endpoint: ENDPOINT });

      const result = register.getPoint('http://register.test/address/1');

      await expect(result).rejects.toBeInstanceOf(FetchPointError);
      await expect(result).rejects.toThrow(
        'Failed to fetch point for http://register.test/address/1: no POINT literal in response',
      );
    });

    it('should fail the record on an HTTP error', async () => {
      mockFetch.mockResolvedValue(new Response('gone', { status: 404 }));
      const register = new LinkedDataRegister({ endpoint: ENDPOINT });

      await expect(register.getPoint('http://register.test/address/2')).rejects.toThrow(
        'Failed to fetch point for http://register.test/address/2: HTTP 404',
      );
    });
  });
});

describe('extractPoint()', () => {
  it('should keep the coordinate text as written', () => {
    expect(extractPoint('POINT (150 -33.90)')).toEqual({ longitude: '150', latitude: '-33.90' });
  });

  it('should return null without a point literal', () => {
    expect(extractPoint('POLYGON((1 2, 3 4, 1 2))')).toBeNull();
  });
});
