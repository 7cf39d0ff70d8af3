/**
 * Inbound URL parsing and validation
 *
 * Routes:
 *   /{variant}/{origin-url}          variant = thumbnail | large | generic
 *   /magic/{variant}/{indirect-url}  origin answers text/plain naming the image URL
 *
 * The raw query string belongs to the origin URL and is carried over as-is.
 */

import { InvalidRequestError } from './errors';
import type { ParsedRequest, Variant } from './types';

const VARIANT_SLUGS: Readonly<Record<string, Variant>> = {
  thumbnail: 'Thumbnail',
  large: 'Large',
  generic: 'Generic',
};

export const MAGIC_PREFIX = 'magic';

/**
 * Map a route slug to its variant
 *
 * @throws InvalidRequestError on an unknown slug
 */
export function parseVariant(slug: string): Variant {
  const variant = Object.prototype.hasOwnProperty.call(VARIANT_SLUGS, slug) ? VARIANT_SLUGS[slug] : undefined;
  if (!variant) {
    throw new InvalidRequestError(`Unknown image variant: ${slug}`);
  }
  return variant;
}

/**
 * Turn the path remainder into an absolute http(s) URL
 *
 * Accepts "https://host/p", "https:/host/p" (slashes collapsed by a proxy),
 * a fully percent-encoded URL, and "host/p" (https assumed).
 *
 * @throws InvalidRequestError if the result is not an http(s) URL with a host
 */
export function normalizeOriginUrl(raw: string): string {
  let candidate = raw.trim();

  if (/^https?%3A/i.test(candidate)) {
    try {
      candidate = decodeURIComponent(candidate);
    } catch {
      throw new InvalidRequestError(`Invalid URL encoding: ${raw}`);
    }
  }

  const schemeMatch = /^([a-z][a-z0-9+.-]*):\/+/i.exec(candidate);
  if (schemeMatch) {
    const scheme = schemeMatch[1].toLowerCase();
    if (scheme !== 'http' && scheme !== 'https') {
      throw new InvalidRequestError(`Unsupported URL scheme: ${scheme}`);
    }
    candidate = `${scheme}://${candidate.substring(schemeMatch[0].length)}`;
  } else {
    candidate = `https://${candidate.replace(/^\/+/, '')}`;
  }

  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    throw new InvalidRequestError(`Invalid URL: ${raw}`);
  }
  if (!parsed.hostname) {
    throw new InvalidRequestError(`Invalid URL: ${raw}`);
  }

  return candidate;
}

/**
 * Parse an inbound request URL into variant and origin URL
 *
 * @throws InvalidRequestError
 */
export function parseRequest(url: URL): ParsedRequest {
  const path = url.pathname.replace(/^\/+/, '');
  let slash = path.indexOf('/');
  if (slash === -1) {
    throw new InvalidRequestError('Invalid URL format: /{variant}/{image-url}');
  }

  let slug = path.substring(0, slash);
  let rest = path.substring(slash + 1);
  let indirect = false;

  if (slug === MAGIC_PREFIX) {
    indirect = true;
    slash = rest.indexOf('/');
    if (slash === -1) {
      throw new InvalidRequestError('Invalid URL format: /magic/{variant}/{image-url}');
    }
    slug = rest.substring(0, slash);
    rest = rest.substring(slash + 1);
  }

  const variant = parseVariant(slug);
  if (rest === '') {
    throw new InvalidRequestError('Missing image URL');
  }

  const sourceUrl = normalizeOriginUrl(rest) + url.search;
  return { variant, sourceUrl, indirect };
}

/**
 * Check if content type is an image
 */
export function isImageContentType(contentType: string): boolean {
  if (!contentType) return false;

  const imageTypes = [
    'image/jpeg', 'image/jpg', 'image/png', 'image/gif',
    'image/webp', 'image/avif', 'image/svg+xml',
    'image/bmp', 'image/tiff', 'image/x-icon',
    'image/heic', 'image/heif', 'image/jxl'
  ];

  return imageTypes.some(type => contentType.toLowerCase().includes(type));
}

export function isTextContentType(contentType: string): boolean {
  return contentType.toLowerCase().startsWith('text/plain');
}
