import { clipboardPayloadSchema } from './schemas.js';
import type { MaybePromise } from './storage.js';
import type { ClipboardPayload } from './types.js';

export const CLIPBOARD_MAX_AGE_MS = 5 * 60 * 1000;

/**
 * Access to the JSON-typed item of the system clipboard. Implemented by the
 * host (e.g. over a native clipboard module).
 */
export interface JsonClipboard {
  /** Raw JSON text of the clipboard's JSON item, or null when there is none */
  readJson(): MaybePromise<string | null>;
  /** Remove the JSON item. Other clipboard content is left in place. */
  clearJson(): MaybePromise<void>;
}

export interface ClipboardSignalReaderOptions {
  maxAgeMs?: number;
}

/**
 * Looks for a recent `{ shortId, timestamp }` JSON item left on the clipboard
 * by the web redirect page before the app was installed.
 */
export class ClipboardSignalReader {
  private readonly maxAgeMs: number;

  constructor(private clipboard: JsonClipboard, options: ClipboardSignalReaderOptions = {}) {
    this.maxAgeMs = options.maxAgeMs ?? CLIPBOARD_MAX_AGE_MS;
  }

  /**
   * Return the clipboard payload if it is younger than maxAgeMs, clearing the
   * JSON item so it is used only once. Stale or malformed items are left alone.
   */
  async readAndClear(): Promise<ClipboardPayload | null> {
    const raw = await this.clipboard.readJson();
    if (!raw) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      console.warn('[DeepLinking] Ignoring clipboard item: not valid JSON');
      return null;
    }

    const parsed = clipboardPayloadSchema.safeParse(json);
    if (!parsed.success) {
      console.warn('[DeepLinking] Ignoring clipboard item: missing shortId or timestamp');
      return null;
    }

    if (Date.now() - parsed.data.timestamp >= this.maxAgeMs) {
      return null;
    }

    await this.clipboard.clearJson();
    return parsed.data;
  }
}
