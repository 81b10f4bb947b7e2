import { HttpClient } from './client.js';
import { ClipboardSignalReader } from './clipboard.js';
import type { JsonClipboard } from './clipboard.js';
import { DeferredLinks } from './deferred.js';
import { Links } from './links.js';
import { DeepLinkResolver } from './resolver.js';
import {
  ClipboardSource,
  StoredPayloadSource,
  UniversalLinkSource,
  UrlSchemeSource,
} from './signals.js';
import type { AttributionSignalSource } from './signals.js';
import { AttributionStore, MemoryStorage } from './storage.js';
import type { KeyValueStorage } from './storage.js';
import type {
  CreateLinkOptions,
  CreatedLinkData,
  DeepLinkData,
  DeepLinkingConfig,
  DeferredLinkPayload,
  LaunchOptions,
  LinksResponse,
  UserActivity,
} from './types.js';
import { extractShortId } from './url.js';

export interface DeepLinkingOptions {
  /** Configure immediately. Otherwise call configure() before any network operation. */
  config?: DeepLinkingConfig;
  /** Persistent key-value storage. Defaults to an in-memory store. */
  storage?: KeyValueStorage;
  /** System clipboard access. Without it the clipboard probe is skipped. */
  clipboard?: JsonClipboard;
  /** Request timeout in milliseconds. Defaults to 10000. */
  timeoutMs?: number;
  userAgent?: string;
  /** How long a stored deferred link payload stays valid. Defaults to 24 hours. */
  payloadMaxAgeMs?: number;
  /** How long a clipboard payload stays valid. Defaults to 5 minutes. */
  clipboardMaxAgeMs?: number;
}

export class DeepLinking {
  private client: HttpClient;

  /** Link management: create and list links */
  readonly links: Links;
  /** Short id to deep link data lookups */
  readonly resolver: DeepLinkResolver;
  /** Deferred deep links: capture hooks and attribution check */
  readonly deferred: DeferredLinks;
  /** Locally persisted attribution signals */
  readonly store: AttributionStore;

  constructor(options: DeepLinkingOptions = {}) {
    this.client = new HttpClient(options.config, {
      timeoutMs: options.timeoutMs,
      userAgent: options.userAgent,
    });
    this.store = new AttributionStore(options.storage ?? new MemoryStorage());
    this.links = new Links(this.client);
    this.resolver = new DeepLinkResolver(this.client);

    const sources: AttributionSignalSource[] = [new StoredPayloadSource(this.store, options.payloadMaxAgeMs)];
    if (options.clipboard) {
      const reader = new ClipboardSignalReader(options.clipboard, { maxAgeMs: options.clipboardMaxAgeMs });
      sources.push(new ClipboardSource(reader));
    }
    sources.push(new UrlSchemeSource(this.store), new UniversalLinkSource(this.store));

    this.deferred = new DeferredLinks(this.resolver, this.store, sources);
  }

  /**
   * Set the service base URL and API key. Trailing slashes are stripped.
   * Throws a DeepLinkingError with code invalidURL for a malformed base URL.
   */
  configure(config: DeepLinkingConfig): void {
    this.client.configure(config);
  }

  get isConfigured(): boolean {
    return this.client.isConfigured;
  }

  /** Create a deep link. Requires a configured API key. */
  async createLink(options: CreateLinkOptions): Promise<CreatedLinkData> {
    return this.links.create(options);
  }

  /** List links created with the configured API key */
  async getLinks(page?: number, limit?: number): Promise<LinksResponse> {
    return this.links.list(page, limit);
  }

  /**
   * Resolve a link opened while the app is running. Returns null when the URL
   * carries no short id; request failures reject with a DeepLinkingError.
   */
  async handleDeepLink(url: string | URL): Promise<DeepLinkData | null> {
    const shortId = extractShortId(url);
    if (!shortId) return null;
    return this.resolver.resolve(shortId);
  }

  /** Check for a deferred deep link (call on app launch). Resolves to null when there is none. */
  async checkForDeferredDeepLink(): Promise<DeepLinkData | null> {
    return this.deferred.checkForDeferredDeepLink();
  }

  /** Forward the app's launch options */
  async handleLaunch(options: LaunchOptions): Promise<boolean> {
    return this.deferred.handleLaunch(options);
  }

  /** Forward a URL the app was asked to open */
  async handleOpenUrl(url: string | URL): Promise<boolean> {
    return this.deferred.handleOpenUrl(url);
  }

  /** Forward a continued user activity (universal link) */
  async handleUserActivity(activity: UserActivity): Promise<boolean> {
    return this.deferred.handleUserActivity(activity);
  }

  /** Store a deferred link payload received out-of-band (e.g. from a web view bridge) */
  async saveDeferredPayload(payload: DeferredLinkPayload): Promise<void> {
    return this.store.saveDeferredPayload(payload);
  }

  /** Cancel in-flight requests */
  destroy(): void {
    this.client.abort();
  }
}

export { HttpClient, DeepLinkingError, DEFAULT_TIMEOUT_MS } from './client.js';
export type { DeepLinkingErrorCode, HttpClientOptions } from './client.js';
export { ClipboardSignalReader, CLIPBOARD_MAX_AGE_MS } from './clipboard.js';
export type { JsonClipboard } from './clipboard.js';
export { DeferredLinks } from './deferred.js';
export { Links } from './links.js';
export { getCustomParameter, getParametersRecord } from './params.js';
export { DeepLinkResolver } from './resolver.js';
export type { LinkResolver } from './resolver.js';
export {
  ClipboardSource,
  StoredPayloadSource,
  UniversalLinkSource,
  UrlSchemeSource,
  DEFERRED_PAYLOAD_MAX_AGE_MS,
} from './signals.js';
export type { AttributionSignalSource } from './signals.js';
export { AttributionStore, MemoryStorage } from './storage.js';
export type { KeyValueStorage } from './storage.js';
export { extractShortId } from './url.js';
export { BROWSING_WEB_ACTIVITY } from './types.js';
export type {
  DeepLinkingConfig,
  CustomParameter,
  UTMTags,
  DeepLinkData,
  DeferredLinkPayload,
  ClipboardPayload,
  PendingSignal,
  SignalSourceName,
  UserActivity,
  LaunchOptions,
  CreateLinkOptions,
  CreatedLinkData,
  UsageInfo,
  CreateLinkResponse,
  LinkInfo,
  PaginationInfo,
  LinksResponse,
} from './types.js';
