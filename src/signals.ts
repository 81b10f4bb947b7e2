import type { AttributionStore } from './storage.js';
import type { ClipboardSignalReader } from './clipboard.js';
import type { PendingSignal, SignalSourceName } from './types.js';

export const DEFERRED_PAYLOAD_MAX_AGE_MS = 24 * 60 * 60 * 1000;

/**
 * One local attribution signal. `readAndClear` consumes the signal: once it
 * has returned a value, the same signal never yields again.
 */
export interface AttributionSignalSource {
  readonly name: SignalSourceName;
  readAndClear(): Promise<PendingSignal | null>;
}

/** Full payload persisted out-of-band. Cleared when read, expired or not. */
export class StoredPayloadSource implements AttributionSignalSource {
  readonly name = 'stored-payload';

  constructor(
    private store: AttributionStore,
    private maxAgeMs: number = DEFERRED_PAYLOAD_MAX_AGE_MS,
  ) {}

  async readAndClear(): Promise<PendingSignal | null> {
    const payload = await this.store.getDeferredPayload();
    if (!payload) return null;

    await this.store.clearDeferredPayload();
    if (Date.now() - payload.timestamp >= this.maxAgeMs) {
      return null;
    }
    return { source: this.name, shortId: payload.shortId, payload };
  }
}

export class ClipboardSource implements AttributionSignalSource {
  readonly name = 'clipboard';

  constructor(private reader: ClipboardSignalReader) {}

  async readAndClear(): Promise<PendingSignal | null> {
    const payload = await this.reader.readAndClear();
    if (!payload) return null;
    return { source: this.name, shortId: payload.shortId, timestamp: payload.timestamp };
  }
}

/** Short id captured when the app was opened through its URL scheme */
export class UrlSchemeSource implements AttributionSignalSource {
  readonly name = 'url-scheme';

  constructor(private store: AttributionStore) {}

  async readAndClear(): Promise<PendingSignal | null> {
    const shortId = await this.store.takePendingShortId();
    return shortId ? { source: this.name, shortId } : null;
  }
}

/** Short id captured from a universal link continuation */
export class UniversalLinkSource implements AttributionSignalSource {
  readonly name = 'universal-link';

  constructor(private store: AttributionStore) {}

  async readAndClear(): Promise<PendingSignal | null> {
    const shortId = await this.store.takeUniversalLinkShortId();
    return shortId ? { source: this.name, shortId } : null;
  }
}
