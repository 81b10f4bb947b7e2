import { deferredLinkPayloadSchema } from './schemas.js';
import type { DeferredLinkPayload } from './types.js';

export const DEFERRED_LINK_KEY = 'deferred_deep_link';
export const DEFERRED_LINK_TIMESTAMP_KEY = 'deferred_deep_link_timestamp';
export const PENDING_SHORT_ID_KEY = 'pending_deferred_shortId';
export const UNIVERSAL_LINK_SHORT_ID_KEY = 'universal_link_shortId';

export type MaybePromise<T> = T | Promise<T>;

/**
 * Key-value persistence scoped to the app installation. Matches the shape of
 * localStorage and React Native's AsyncStorage, so either can be passed in.
 */
export interface KeyValueStorage {
  getItem(key: string): MaybePromise<string | null>;
  setItem(key: string, value: string): MaybePromise<void>;
  removeItem(key: string): MaybePromise<void>;
}

/** In-process storage. Used when the host does not provide one. */
export class MemoryStorage implements KeyValueStorage {
  private items = new Map<string, string>();

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value);
  }

  removeItem(key: string): void {
    this.items.delete(key);
  }
}

export class AttributionStore {
  constructor(private storage: KeyValueStorage) {}

  /** Persist a deferred link payload (written by the web flow or a native bridge) */
  async saveDeferredPayload(payload: DeferredLinkPayload): Promise<void> {
    await this.storage.setItem(DEFERRED_LINK_KEY, JSON.stringify(payload));
    await this.storage.setItem(DEFERRED_LINK_TIMESTAMP_KEY, String(payload.timestamp));
  }

  /**
   * Read the stored deferred link payload without consuming it. A malformed
   * entry is removed and reported as absent.
   */
  async getDeferredPayload(): Promise<DeferredLinkPayload | null> {
    const raw = await this.storage.getItem(DEFERRED_LINK_KEY);
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      console.warn('[DeepLinking] Discarding stored deferred link: not valid JSON');
      await this.clearDeferredPayload();
      return null;
    }

    const parsed = deferredLinkPayloadSchema.safeParse(json);
    if (!parsed.success) {
      console.warn('[DeepLinking] Discarding stored deferred link: missing shortId or timestamp');
      await this.clearDeferredPayload();
      return null;
    }
    return parsed.data;
  }

  async clearDeferredPayload(): Promise<void> {
    await this.storage.removeItem(DEFERRED_LINK_KEY);
    await this.storage.removeItem(DEFERRED_LINK_TIMESTAMP_KEY);
  }

  async setPendingShortId(shortId: string): Promise<void> {
    await this.storage.setItem(PENDING_SHORT_ID_KEY, shortId);
  }

  /** Read and remove the short id captured from a URL-scheme open */
  async takePendingShortId(): Promise<string | null> {
    return this.take(PENDING_SHORT_ID_KEY);
  }

  async setUniversalLinkShortId(shortId: string): Promise<void> {
    await this.storage.setItem(UNIVERSAL_LINK_SHORT_ID_KEY, shortId);
  }

  /** Read and remove the short id captured from a universal link */
  async takeUniversalLinkShortId(): Promise<string | null> {
    return this.take(UNIVERSAL_LINK_SHORT_ID_KEY);
  }

  private async take(key: string): Promise<string | null> {
    const value = await this.storage.getItem(key);
    if (value === null) return null;
    await this.storage.removeItem(key);
    // An empty string is not a usable short id, but it is still consumed
    return value || null;
  }
}
