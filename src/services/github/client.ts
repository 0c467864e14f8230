import type { FetchLike } from '../../types';
import { requireToken, type GitHubConfig } from '../../config/config';
import { GITHUB_API } from '../../config/constants';
import { ConfigurationError } from '../../lib/errors';
import { logger } from '../../lib/logger';

export type HttpMethod = 'GET' | 'PATCH';

export interface RestRequest {
  method?: HttpMethod;
  query?: Record<string, string | number>;
  body?: unknown;
}

/**
 * Thin GitHub REST client bound to one configuration
 *
 * Every request re-reads the token from the frozen configuration and checks
 * it before anything leaves the process. Status handling is left to callers:
 * list operations fail on non-2xx, updates report the status as-is.
 */
export class GitHubRestClient {
  private readonly fetchImpl: FetchLike;

  constructor(
    readonly config: GitHubConfig,
    fetchImpl?: FetchLike
  ) {
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * Resolves an API path (`user/repos`) or an absolute URL previously handed
   * out by GitHub (a pagination link) against the configured base URL
   *
   * @throws {ConfigurationError} If an absolute URL points at another origin,
   * so the token is never sent elsewhere
   */
  resolveUrl(pathOrUrl: string, query?: RestRequest['query']): string {
    const base = new URL(`${this.config.apiBaseUrl}/`);
    const url = /^https?:\/\//i.test(pathOrUrl)
      ? new URL(pathOrUrl)
      : new URL(pathOrUrl.replace(/^\/+/, ''), base);

    if (url.origin !== base.origin) {
      throw new ConfigurationError(`Refusing to send credentials to ${url.origin}`);
    }
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  /**
   * Issues one authenticated request
   *
   * @throws {ConfigurationError} If no token is configured (before any request)
   * @throws Whatever the underlying fetch throws on transport failure
   */
  async request(pathOrUrl: string, options: RestRequest = {}): Promise<Response> {
    const token = requireToken(this.config.token);
    const url = this.resolveUrl(pathOrUrl, options.query);
    const method = options.method ?? 'GET';

    const headers: Record<string, string> = {
      'Authorization': `token ${token}`,
      'Accept': GITHUB_API.ACCEPT,
      'X-GitHub-Api-Version': GITHUB_API.API_VERSION,
      'User-Agent': this.config.userAgent
    };
    const init: RequestInit = { method, headers };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(options.body);
    }

    logger.debug('GitHub REST request', { method, url });
    const res = await this.fetchImpl(url, init);
    logger.debug('GitHub REST response', { method, url, status: res.status });
    return res;
  }
}

/**
 * Reads GitHub's `message` field from an error body, if there is one
 */
export async function readErrorMessage(res: Response): Promise<string | undefined> {
  try {
    const body: unknown = await res.json();
    if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
      return body.message;
    }
  } catch (error) {
    logger.debug('GitHub error body is not JSON', { status: res.status, error });
  }
  return undefined;
}
