import type { DeepLinkData } from './types.js';

/** Value of the first custom parameter named `key`, or null */
export function getCustomParameter(link: DeepLinkData, key: string): string | null {
  const match = link.customParameters.find(p => p.key === key);
  return match ? match.value : null;
}

/**
 * Flatten UTM tags (as utm_*) and custom parameters into one record.
 * Custom parameters are applied after UTM tags, and later duplicates
 * overwrite earlier ones.
 */
export function getParametersRecord(link: DeepLinkData): Record<string, string> {
  const params: Record<string, string> = {};
  const { source, medium, campaign, term, content } = link.utmTags;

  if (source) params.utm_source = source;
  if (medium) params.utm_medium = medium;
  if (campaign) params.utm_campaign = campaign;
  if (term) params.utm_term = term;
  if (content) params.utm_content = content;

  for (const param of link.customParameters) {
    params[param.key] = param.value;
  }
  return params;
}
