/** Configuration for the deep linking service */
export interface DeepLinkingConfig {
  /** Base URL of your deep linking service, e.g. https://links.example.com */
  baseUrl: string;
  /** API key, sent as a bearer token. Required for link creation and listing. */
  apiKey?: string;
}

/** A custom key/value pair attached to a link. Keys may repeat. */
export interface CustomParameter {
  key: string;
  value: string;
}

export interface UTMTags {
  source?: string | null;
  medium?: string | null;
  campaign?: string | null;
  term?: string | null;
  content?: string | null;
}

/** Resolved deep link returned by GET /api/deferred-link/:shortId */
export interface DeepLinkData {
  linkId: string;
  shortId: string;
  title?: string | null;
  description?: string | null;
  originalUrl: string;
  targetUrl: string;
  appUrl: string;
  platform: string;
  customParameters: CustomParameter[];
  utmTags: UTMTags;
  /** Epoch milliseconds at which the attribution signal was recorded (not when it was resolved) */
  timestamp: number;
}

/**
 * Payload written out-of-band (e.g. by the web redirect page) to record that a
 * click happened before install. Extra fields are preserved.
 */
export interface DeferredLinkPayload {
  shortId: string;
  /** Epoch milliseconds */
  timestamp: number;
  [key: string]: unknown;
}

/** Clipboard item written by the web flow */
export interface ClipboardPayload {
  shortId: string;
  timestamp: number;
}

/** A local attribution signal that was read (and consumed) by a signal source */
export type PendingSignal =
  | { source: 'stored-payload'; shortId: string; payload: DeferredLinkPayload }
  | { source: 'clipboard'; shortId: string; timestamp: number }
  | { source: 'url-scheme'; shortId: string }
  | { source: 'universal-link'; shortId: string };

export type SignalSourceName = PendingSignal['source'];

/** Activity type for a web page continued into the app (universal link) */
export const BROWSING_WEB_ACTIVITY = 'browsing-web';

/** A user activity forwarded from the host app (e.g. a universal link continuation) */
export interface UserActivity {
  activityType: string;
  webpageUrl?: string | URL;
}

/** What the host app was launched with */
export interface LaunchOptions {
  url?: string | URL;
  userActivity?: UserActivity;
}

/** Options for creating a link */
export interface CreateLinkOptions {
  /** Base URL the link points at, e.g. https://invite.example.com */
  baseUrl: string;
  customParameters?: Record<string, string>;
  title?: string;
  description?: string;
}

/** Link returned after creation */
export interface CreatedLinkData {
  linkId: string;
  shortId: string;
  shortUrl: string;
  originalUrl: string;
  customParameters: Record<string, string>;
}

export interface UsageInfo {
  withinMonthlyLimit: boolean;
  withinAnnualLimit: boolean;
  monthlyUsage: number;
  monthlyLimit: number;
  annualUsage: number;
  annualLimit: number;
}

/** Response from POST /api/sdk/links */
export interface CreateLinkResponse {
  success: boolean;
  link: CreatedLinkData;
  usage: UsageInfo;
}

/** Link summary returned by GET /api/sdk/links */
export interface LinkInfo {
  linkId: string;
  shortId: string;
  shortUrl: string;
  title: string;
  description?: string | null;
  originalUrl: string;
  isActive: boolean;
  clickCount: number;
  createdAt: string;
  customParameters: CustomParameter[];
}

export interface PaginationInfo {
  page: number;
  limit: number;
  total: number;
  pages: number;
}

export interface LinksResponse {
  links: LinkInfo[];
  pagination: PaginationInfo;
  usage: UsageInfo;
}
