import { afterEach, describe, expect, test, vi } from 'vitest';
import { DEFAULT_CONFIG } from './config';
import { createSilentLogger } from './logger';
import { buildReleaseUrl, fetchLatestRelease } from './release';
import { jsonResponse } from './testing';

const logger = createSilentLogger();
const config = {
  ...DEFAULT_CONFIG,
  apiEndpoint: 'https://releases.example.com/api/download',
};

describe('fetchLatestRelease', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test('builds the query from platform and release track', () => {
    expect(buildReleaseUrl(config)).toBe(
      'https://releases.example.com/api/download?platform=linux-x64&releaseTrack=latest',
    );
  });

  test('resolves the download location and derives the version', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({
        downloadUrl: 'https://downloads.example.com/cursor-0.43.1-x86_64.AppImage',
        version: '9.9.9',
      }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const result = await fetchLatestRelease(config, logger);

    expect(result).toEqual({
      ok: true,
      value: {
        downloadUrl: 'https://downloads.example.com/cursor-0.43.1-x86_64.AppImage',
        version: '0.43.1',
      },
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(buildReleaseUrl(config));
    expect(init.headers).toMatchObject({
      'User-Agent': 'Cursor-Version-Checker',
      'Cache-Control': 'no-cache',
    });
  });

  test('reports Unknown when the location carries no version', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        jsonResponse({ downloadUrl: 'https://downloads.example.com/cursor.AppImage' }),
      ),
    );

    const result = await fetchLatestRelease(config, logger);

    expect(result.ok && result.value.version).toBe('Unknown');
  });

  test('fails with RemoteProtocolError when downloadUrl is missing', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ url: 'x' })));

    const result = await fetchLatestRelease(config, logger);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.kind).toBe('RemoteProtocolError');
  });

  test('fails with RemoteProtocolError on a non-JSON body', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(new Response('<html>maintenance</html>', { status: 200 })),
    );

    const result = await fetchLatestRelease(config, logger);

    expect(!result.ok && result.error.kind).toBe('RemoteProtocolError');
  });

  test('fails with NetworkError on a non-2xx status', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        jsonResponse({}, { status: 503, statusText: 'Service Unavailable' }),
      ),
    );

    const result = await fetchLatestRelease(config, logger);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'NetworkError',
        message: 'Release endpoint returned 503 Service Unavailable',
        cause: undefined,
      },
    });
  });

  test('fails with NetworkError when the request rejects', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    const result = await fetchLatestRelease(config, logger);

    expect(!result.ok && result.error.message).toBe(
      'Could not reach release endpoint: fetch failed',
    );
  });

  test('times out after the configured limit', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn((_url: string, init: RequestInit) => {
        return new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
      }),
    );

    const result = await fetchLatestRelease({ ...config, requestTimeoutMs: 10 }, logger);

    expect(!result.ok && result.error).toMatchObject({
      kind: 'NetworkError',
      message: 'Release endpoint timed out after 10ms',
    });
  });

  test('reports an interruption', async () => {
    const controller = new AbortController();
    vi.stubGlobal(
      'fetch',
      vi.fn((_url: string, init: RequestInit) => {
        return new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          controller.abort();
        });
      }),
    );

    const result = await fetchLatestRelease(config, logger, controller.signal);

    expect(!result.ok && result.error.kind).toBe('Interrupted');
  });
});
