import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DeepLinking, DeepLinkingError, MemoryStorage } from '../src/index.js';
import type { DeepLinkData, JsonClipboard } from '../src/index.js';

const NOW = 1_700_000_000_000;
const HOUR = 60 * 60 * 1000;

function makeDeepLinkData(shortId: string): DeepLinkData {
  return {
    linkId: `link-${shortId}`,
    shortId,
    title: 'Invite',
    description: 'Join us',
    originalUrl: 'https://invite.example.com/?code=1',
    targetUrl: 'https://invite.example.com/join',
    appUrl: 'myapp://join',
    platform: 'ios',
    customParameters: [{ key: 'code', value: '1' }],
    utmTags: { source: 'email' },
    timestamp: NOW - HOUR,
  };
}

/** Answers GET /api/deferred-link/:shortId with data for that short id */
function serveDeepLinks(fetchMock: ReturnType<typeof vi.fn>) {
  fetchMock.mockImplementation(async (url: string) => {
    const shortId = decodeURIComponent(url.split('/api/deferred-link/')[1] ?? '');
    return new Response(JSON.stringify(makeDeepLinkData(shortId)), { status: 200 });
  });
}

describe('DeepLinking', () => {
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(Date, 'now').mockReturnValue(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  // -- Configuration --

  it('should fail createLink with notConfigured before configure() without a request', async () => {
    const sdk = new DeepLinking();

    await expect(sdk.createLink({ baseUrl: 'https://invite.example.com' })).rejects.toMatchObject({
      code: 'notConfigured',
      message: 'SDK not configured. Call configure() first.',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should reject an invalid base URL at configuration time', () => {
    const sdk = new DeepLinking();

    expect(() => sdk.configure({ baseUrl: 'links.example.com' })).toThrow(DeepLinkingError);
    expect(sdk.isConfigured).toBe(false);
  });

  it('should accept configuration in the constructor', () => {
    const sdk = new DeepLinking({ config: { baseUrl: 'https://links.example.com/', apiKey: 'test-key' } });
    expect(sdk.isConfigured).toBe(true);
  });

  // -- Immediate deep links --

  it('should resolve a link opened while running', async () => {
    serveDeepLinks(fetchMock);
    const sdk = new DeepLinking();
    sdk.configure({ baseUrl: 'https://links.example.com/', apiKey: 'test-key' });

    const data = await sdk.handleDeepLink('https://links.example.com/r/live1');

    expect(fetchMock.mock.calls[0][0]).toBe('https://links.example.com/api/deferred-link/live1');
    expect(data).toEqual(makeDeepLinkData('live1'));
  });

  it('should return null for a link without a short id', async () => {
    const sdk = new DeepLinking({ config: { baseUrl: 'https://links.example.com' } });

    expect(await sdk.handleDeepLink('https://links.example.com/help')).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should surface typed errors from handleDeepLink', async () => {
    fetchMock.mockResolvedValue(new Response('{"error":"nope"}', { status: 401 }));
    const sdk = new DeepLinking({ config: { baseUrl: 'https://links.example.com', apiKey: 'test-key' } });

    await expect(sdk.handleDeepLink('https://links.example.com/r/x')).rejects.toMatchObject({
      code: 'unauthorized',
    });
  });

  it('should not touch captured signals when handling a live link', async () => {
    serveDeepLinks(fetchMock);
    const storage = new MemoryStorage();
    const sdk = new DeepLinking({ config: { baseUrl: 'https://links.example.com' }, storage });
    await sdk.handleOpenUrl('myapp://open?shortId=pending1');

    await sdk.handleDeepLink('https://links.example.com/r/live1');

    expect(storage.getItem('pending_deferred_shortId')).toBe('pending1');
  });

  // -- Deferred deep links --

  it('should resolve a deferred link captured from a URL-scheme open', async () => {
    serveDeepLinks(fetchMock);
    const sdk = new DeepLinking({ config: { baseUrl: 'https://links.example.com' } });

    expect(await sdk.handleOpenUrl('myapp://open?shortId=deferred1')).toBe(true);
    const data = await sdk.checkForDeferredDeepLink();

    expect(data?.shortId).toBe('deferred1');
    expect(await sdk.checkForDeferredDeepLink()).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should resolve a deferred link captured at launch from a universal link', async () => {
    serveDeepLinks(fetchMock);
    const sdk = new DeepLinking({ config: { baseUrl: 'https://links.example.com' } });

    await sdk.handleLaunch({
      userActivity: { activityType: 'browsing-web', webpageUrl: 'https://links.example.com/r/ul1' },
    });

    expect((await sdk.checkForDeferredDeepLink())?.shortId).toBe('ul1');
  });

  it('should resolve a saved payload before a clipboard signal', async () => {
    serveDeepLinks(fetchMock);
    let clipboardJson: string | null = JSON.stringify({ shortId: 'clip1', timestamp: NOW - 1000 });
    const clipboard: JsonClipboard = {
      readJson: () => clipboardJson,
      clearJson: () => {
        clipboardJson = null;
      },
    };
    const sdk = new DeepLinking({ config: { baseUrl: 'https://links.example.com' }, clipboard });
    await sdk.saveDeferredPayload({ shortId: 'stored1', timestamp: NOW - 2 * HOUR });

    expect((await sdk.checkForDeferredDeepLink())?.shortId).toBe('stored1');
    expect((await sdk.checkForDeferredDeepLink())?.shortId).toBe('clip1');
    expect(clipboardJson).toBeNull();
  });

  it('should honour a custom payload max age', async () => {
    const sdk = new DeepLinking({
      config: { baseUrl: 'https://links.example.com' },
      payloadMaxAgeMs: HOUR,
    });
    await sdk.saveDeferredPayload({ shortId: 'stored1', timestamp: NOW - 2 * HOUR });

    expect(await sdk.checkForDeferredDeepLink()).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should resolve to null when unconfigured, consuming the signal', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const storage = new MemoryStorage();
    const sdk = new DeepLinking({ storage });
    await sdk.handleOpenUrl('https://links.example.com/r/early');

    expect(await sdk.checkForDeferredDeepLink()).toBeNull();
    expect(storage.getItem('pending_deferred_shortId')).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledOnce();
  });

  it('should resolve to null when the server fails', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    fetchMock.mockResolvedValue(new Response('{}', { status: 500 }));
    const sdk = new DeepLinking({ config: { baseUrl: 'https://links.example.com' } });
    await sdk.handleOpenUrl('https://links.example.com/r/broken');

    expect(await sdk.checkForDeferredDeepLink()).toBeNull();
  });

  it('should deliver null when a response body stalls, then resolve later links', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    serveDeepLinks(fetchMock);
    fetchMock.mockResolvedValueOnce(new Response(new ReadableStream({ start() {} }), { status: 200 }));
    const sdk = new DeepLinking({ config: { baseUrl: 'https://links.example.com' }, timeoutMs: 1000 });
    await sdk.handleOpenUrl('myapp://open?shortId=slow1');

    const pending = sdk.checkForDeferredDeepLink();
    await vi.advanceTimersByTimeAsync(1000);

    expect(await pending).toBeNull();
    expect(warnSpy).toHaveBeenCalledOnce();

    await sdk.handleOpenUrl('myapp://open?shortId=fast1');
    expect((await sdk.checkForDeferredDeepLink())?.shortId).toBe('fast1');
  });

  // -- Teardown --

  it('should abort in-flight requests on destroy()', async () => {
    fetchMock.mockImplementation((_url: string, init: RequestInit) => {
      return new Promise((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => {
          reject(new DOMException('The operation was aborted.', 'AbortError'));
        });
      });
    });
    const sdk = new DeepLinking({ config: { baseUrl: 'https://links.example.com', apiKey: 'test-key' } });

    const pending = sdk.getLinks();
    sdk.destroy();

    await expect(pending).rejects.toMatchObject({ code: 'networkError' });
  });
});
