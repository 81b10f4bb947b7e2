import type { HttpClient } from './client.js';
import { deepLinkDataSchema } from './schemas.js';
import type { DeepLinkData } from './types.js';

/** Best-effort lookup used by the deferred link pipeline */
export interface LinkResolver {
  fetch(shortId: string): Promise<DeepLinkData | null>;
}

export class DeepLinkResolver implements LinkResolver {
  constructor(private client: HttpClient) {}

  /** Resolve a short id, throwing a DeepLinkingError on any failure */
  async resolve(shortId: string): Promise<DeepLinkData> {
    return this.client.get(`/api/deferred-link/${encodeURIComponent(shortId)}`, deepLinkDataSchema);
  }

  /** Resolve a short id, returning null (and logging) on any failure */
  async fetch(shortId: string): Promise<DeepLinkData | null> {
    try {
      return await this.resolve(shortId);
    } catch (err) {
      console.warn(`[DeepLinking] Failed to resolve deep link "${shortId}":`, err);
      return null;
    }
  }
}
