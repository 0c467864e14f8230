import type { Maybe, PageCursor } from '../../types';

/**
 * Parses an RFC 8288 `Link` header into a map of relation to URL
 *
 * @example
 * ```typescript
 * parseLinkHeader('<https://api.github.com/user/repos?page=2>; rel="next"');
 * // { next: 'https://api.github.com/user/repos?page=2' }
 * ```
 */
export function parseLinkHeader(header: Maybe<string> | undefined): Record<string, string> {
  const links: Record<string, string> = {};
  if (!header) return links;

  for (const part of header.split(',')) {
    const match = /<([^>]*)>(.*)/.exec(part.trim());
    if (!match) continue;
    const [, url, params] = match;
    const rel = /;\s*rel="?([^";]+)"?/i.exec(params);
    if (!rel) continue;
    // A link may carry several space separated relations, e.g. rel="next last"
    for (const name of rel[1].trim().split(/\s+/)) {
      links[name.toLowerCase()] = url;
    }
  }
  return links;
}

/**
 * Extracts the next-page cursor from a listing response
 *
 * @returns The cursor, or null when the response is the last page
 */
export function nextPageCursor(headers: Headers): Maybe<PageCursor> {
  const next = parseLinkHeader(headers.get('link')).next;
  return next ? toPageCursor(next) : null;
}

export function toPageCursor(url: string): PageCursor {
  return url as PageCursor;
}
