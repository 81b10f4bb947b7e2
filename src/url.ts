const SHORT_LINK_SEGMENT = 'r';

function parseUrlSafely(url: string | URL): URL | null {
  if (url instanceof URL) return url;
  try {
    return new URL(url);
  } catch {
    return null;
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Extract the short id from an inbound link.
 *
 * `https://links.example.com/r/abc123` yields `abc123`. Without an `/r/{id}`
 * path, the `shortId` query parameter is used, then `id`. Returns null when
 * neither is present or the URL cannot be parsed.
 */
export function extractShortId(url: string | URL): string | null {
  const parsed = parseUrlSafely(url);
  if (!parsed) return null;

  const segments = parsed.pathname
    .split('/')
    .filter(s => s.length > 0)
    .map(decodeSegment);

  const rIndex = segments.indexOf(SHORT_LINK_SEGMENT);
  if (rIndex !== -1 && rIndex + 1 < segments.length) {
    return segments[rIndex + 1];
  }

  const params = parsed.searchParams;
  return params.get('shortId') || params.get('id') || null;
}
