import type { LinkResolver } from './resolver.js';
import type { AttributionSignalSource } from './signals.js';
import type { AttributionStore } from './storage.js';
import { BROWSING_WEB_ACTIVITY } from './types.js';
import type { DeepLinkData, LaunchOptions, PendingSignal, UserActivity } from './types.js';
import { extractShortId } from './url.js';

/**
 * Deferred deep link attribution.
 *
 * Lifecycle hooks record short ids into the attribution store as links are
 * opened. Later, checkForDeferredDeepLink() walks the signal sources in
 * priority order, consumes the first signal found and resolves its short id.
 */
export class DeferredLinks {
  private inFlight: Promise<DeepLinkData | null> | null = null;

  constructor(
    private resolver: LinkResolver,
    private store: AttributionStore,
    private sources: readonly AttributionSignalSource[],
  ) {}

  /**
   * Resolve the pending deferred deep link, if any. Concurrent callers share
   * one resolution pass and receive the same result. Never rejects: any
   * failure along the way yields null.
   */
  checkForDeferredDeepLink(): Promise<DeepLinkData | null> {
    if (!this.inFlight) {
      this.inFlight = this.resolvePending().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /** Record a short id from a URL-scheme open. Returns whether one was captured. */
  async handleOpenUrl(url: string | URL): Promise<boolean> {
    const shortId = extractShortId(url);
    if (!shortId) return false;
    try {
      await this.store.setPendingShortId(shortId);
      return true;
    } catch (err) {
      console.warn('[DeepLinking] Failed to store pending short id:', err);
      return false;
    }
  }

  /** Record a short id from a universal link continuation. Returns whether one was captured. */
  async handleUserActivity(activity: UserActivity): Promise<boolean> {
    if (activity.activityType !== BROWSING_WEB_ACTIVITY || !activity.webpageUrl) return false;
    const shortId = extractShortId(activity.webpageUrl);
    if (!shortId) return false;
    try {
      await this.store.setUniversalLinkShortId(shortId);
      return true;
    } catch (err) {
      console.warn('[DeepLinking] Failed to store universal link short id:', err);
      return false;
    }
  }

  /** Record whatever the app was launched with (a URL, a universal link, or both) */
  async handleLaunch(options: LaunchOptions = {}): Promise<boolean> {
    let captured = false;
    if (options.url) {
      captured = (await this.handleOpenUrl(options.url)) || captured;
    }
    if (options.userActivity) {
      captured = (await this.handleUserActivity(options.userActivity)) || captured;
    }
    return captured;
  }

  private async resolvePending(): Promise<DeepLinkData | null> {
    try {
      const signal = await this.findSignal();
      if (!signal) return null;
      return await this.resolver.fetch(signal.shortId);
    } catch (err) {
      console.warn('[DeepLinking] Deferred deep link check failed:', err);
      return null;
    }
  }

  /**
   * First signal in priority order. Later sources are not touched once one
   * hits. A source that throws counts as empty.
   */
  private async findSignal(): Promise<PendingSignal | null> {
    for (const source of this.sources) {
      let signal: PendingSignal | null;
      try {
        signal = await source.readAndClear();
      } catch (err) {
        console.warn(`[DeepLinking] ${source.name} signal check failed:`, err);
        continue;
      }
      if (signal) return signal;
    }
    return null;
  }
}
