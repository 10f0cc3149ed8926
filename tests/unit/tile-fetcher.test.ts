import { describe, it, expect, afterEach, vi } from 'vitest';
import { http, HttpResponse } from 'msw';
import { TileFetcher } from '@/lib/tile-fetcher';
import { server } from '../mocks/server';
import { pngTile, recordingTileServer, TEST_TILE_URL, TILE_SERVER } from '../mocks/handlers';

const TILE = { zoom: 7, x: 100, y: 63 };

function createFetcher(overrides: ConstructorParameters<typeof TileFetcher>[0] = {}): TileFetcher {
  return new TileFetcher({
    urlTemplate: TEST_TILE_URL,
    maxAttempts: 3,
    retryDelay: 1,
    jitter: 0,
    ...overrides,
  });
}

describe('TileFetcher', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('fetch', () => {
    it('should download a tile from the URL template', async () => {
      const { handler, requests } = recordingTileServer();
      server.use(handler);

      const result = await createFetcher().fetch(TILE);

      expect(result).toEqual({ ok: true, data: pngTile(TILE), attempts: 1 });
      expect(requests).toEqual(['7/100/63']);
    });

    it('should send the configured User-Agent', async () => {
      let userAgent: string | null = null;
      server.use(
        http.get(`${TILE_SERVER}/*`, ({ request }) => {
          userAgent = request.headers.get('user-agent');
          return HttpResponse.arrayBuffer(pngTile(TILE).buffer);
        })
      );

      await createFetcher({ userAgent: 'tile-bundler-test' }).fetch(TILE);

      expect(userAgent).toBe('tile-bundler-test');
    });

    it('should retry server errors until a success', async () => {
      const { handler, requests } = recordingTileServer((_address, count) =>
        count < 3 ? new HttpResponse(null, { status: 503, statusText: 'Service Unavailable' }) : undefined
      );
      server.use(handler);

      const result = await createFetcher().fetch(TILE);

      expect(result.ok).toBe(true);
      expect(result.attempts).toBe(3);
      expect(requests).toHaveLength(3);
    });

    it('should give up after maxAttempts', async () => {
      const { handler, requests } = recordingTileServer(() =>
        new HttpResponse(null, { status: 500, statusText: 'Internal Server Error' })
      );
      server.use(handler);

      const result = await createFetcher().fetch(TILE);

      expect(result).toEqual({ ok: false, reason: 'HTTP 500: Internal Server Error', attempts: 3, retriable: true });
      expect(requests).toHaveLength(3);
    });

    it('should not retry client errors', async () => {
      const { handler, requests } = recordingTileServer(() =>
        new HttpResponse(null, { status: 404, statusText: 'Not Found' })
      );
      server.use(handler);

      const result = await createFetcher().fetch(TILE);

      expect(result).toEqual({ ok: false, reason: 'HTTP 404: Not Found', attempts: 1, retriable: false });
      expect(requests).toHaveLength(1);
    });

    it('should treat rate limiting as permanent', async () => {
      const { handler, requests } = recordingTileServer(() =>
        new HttpResponse(null, { status: 429, statusText: 'Too Many Requests' })
      );
      server.use(handler);

      const result = await createFetcher().fetch(TILE);

      expect(result.ok).toBe(false);
      expect(result.attempts).toBe(1);
      expect(requests).toHaveLength(1);
    });

    it('should retry network errors', async () => {
      const { handler, requests } = recordingTileServer(() => HttpResponse.error());
      server.use(handler);

      const result = await createFetcher({ maxAttempts: 2 }).fetch(TILE);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.reason).toMatch(/^Network error: /);
        expect(result.retriable).toBe(true);
      }
      expect(result.attempts).toBe(2);
      expect(requests).toHaveLength(2);
    });

    it('should reject an empty body without retrying', async () => {
      const { handler, requests } = recordingTileServer(() => new HttpResponse(null, { status: 200 }));
      server.use(handler);

      const result = await createFetcher().fetch(TILE);

      expect(result).toEqual({ ok: false, reason: 'Empty response body', attempts: 1, retriable: false });
      expect(requests).toHaveLength(1);
    });

    it('should reject a body that is not an image', async () => {
      const { handler } = recordingTileServer(() => HttpResponse.text('<html>maintenance</html>'));
      server.use(handler);

      const result = await createFetcher().fetch(TILE);

      expect(result).toEqual({ ok: false, reason: 'Response is not an image', attempts: 1, retriable: false });
    });

    it('should time out a stalled request', async () => {
      vi.spyOn(globalThis, 'fetch').mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new DOMException('Aborted', 'AbortError')));
          })
      );

      const result = await createFetcher({ timeout: 20, maxAttempts: 1 }).fetch(TILE);

      expect(result).toEqual({ ok: false, reason: 'Timeout after 20ms', attempts: 1, retriable: true });
    });
  });

  describe('decide', () => {
    const fetcher = createFetcher({ retryDelay: 1000, jitter: 0 });
    const failure = { ok: false as const, reason: 'HTTP 503', retriable: true };

    it('should bump the attempt counter and back off', () => {
      expect(fetcher.decide({ address: TILE, attempt: 0 }, failure)).toEqual({
        action: 'retry',
        job: { address: TILE, attempt: 1 },
        delay: 1000,
      });
      expect(fetcher.decide({ address: TILE, attempt: 1 }, failure)).toEqual({
        action: 'retry',
        job: { address: TILE, attempt: 2 },
        delay: 2000,
      });
    });

    it('should stop at maxAttempts', () => {
      expect(fetcher.decide({ address: TILE, attempt: 2 }, failure)).toEqual({
        action: 'done',
        result: { ok: false, reason: 'HTTP 503', attempts: 3, retriable: true },
      });
    });

    it('should stop on a permanent failure', () => {
      const decision = fetcher.decide({ address: TILE, attempt: 0 }, { ok: false, reason: 'HTTP 404', retriable: false });

      expect(decision).toEqual({
        action: 'done',
        result: { ok: false, reason: 'HTTP 404', attempts: 1, retriable: false },
      });
    });
  });

  describe('buildUrl', () => {
    it('should fill the template', () => {
      expect(createFetcher().buildUrl(TILE)).toBe('https://tiles.test/7/100/63.png');
    });
  });
});
