import { URL } from 'node:url';

// Click and referral tags that career sites append to shared posting links.
const TRACKING_PARAM = /^(?:utm_[a-z]+|gclid|fbclid|msclkid|mc_cid|mc_eid|source|src)$/i;

function withScheme(raw: string): string {
  if (raw.startsWith('//')) {
    return `https:${raw}`;
  }
  return /^https?:\/\//i.test(raw) ? raw : `https://${raw}`;
}

export function toAbsoluteUrl(value: string, base: string): string {
  try {
    return new URL(value, base).toString();
  } catch {
    return value;
  }
}

/**
 * Canonical form used as the job key: scheme added, tracking parameters and
 * fragment removed, host lowercased, no trailing slash on the path.
 */
export function cleanUrl(rawUrl: string): string {
  const trimmed = rawUrl.trim();
  if (!trimmed) {
    return '';
  }

  let url: URL;
  try {
    url = new URL(withScheme(trimmed));
  } catch {
    return trimmed;
  }

  for (const key of [...url.searchParams.keys()]) {
    if (TRACKING_PARAM.test(key)) {
      url.searchParams.delete(key);
    }
  }
  url.hash = '';
  url.hostname = url.hostname.toLowerCase();
  if (url.pathname.length > 1 && url.pathname.endsWith('/')) {
    url.pathname = url.pathname.replace(/\/+$/, '') || '/';
  }
  return url.toString();
}

export function originOf(rawUrl: string): string | null {
  try {
    return new URL(rawUrl).origin;
  } catch {
    return null;
  }
}

/** Joins a base URL and a path with exactly one slash between them. */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
