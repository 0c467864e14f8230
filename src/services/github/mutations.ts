import { InvalidPayloadError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { GitHubRestClient } from './client';
import { parseRepositoryRef, parseRepositoryUpdate, type RepositoryUpdate } from './payload';

/**
 * Updates repository attributes through `PATCH /repos/{owner}/{repo}`
 *
 * Results are raw HTTP status codes: 200 on success, and GitHub's 403, 404 or
 * 422 are handed back unchanged for the caller to interpret. Only transport
 * failures (the request never got a response) are thrown.
 */
export class RepositoryMutator {
  constructor(private readonly client: GitHubRestClient) {}

  /**
   * Applies a partial attribute update to one repository
   *
   * @param owner - Repository owner username or organization name
   * @param name - Repository name (without owner prefix)
   * @param payload - Attributes to change; unknown keys are rejected
   * @returns HTTP status code of the update request
   * @throws {InvalidPayloadError} If the reference or payload is invalid (no request is made)
   * @throws {ConfigurationError} If no token is configured (no request is made)
   * @example
   * ```typescript
   * const status = await mutator.update('acme', 'widgets', { visibility: 'private' });
   * if (status !== 200) console.log(`GitHub answered ${status}`);
   * ```
   */
  async update(owner: string, name: string, payload: RepositoryUpdate): Promise<number> {
    const ref = parseRepositoryRef(owner, name);
    const body = parseRepositoryUpdate(payload);
    const url = this.repositoryUrl(ref.owner, ref.name);

    logger.info('Updating repository', {
      owner: ref.owner,
      repo: ref.name,
      attributes: Object.keys(body)
    });

    let res: Response;
    try {
      res = await this.client.request(url, { method: 'PATCH', body });
    } catch (error) {
      logger.error('Repository update request failed', {
        owner: ref.owner,
        repo: ref.name,
        error
      });
      throw error;
    }

    const log = res.ok ? logger.info.bind(logger) : logger.warn.bind(logger);
    log('Repository update completed', {
      owner: ref.owner,
      repo: ref.name,
      status: res.status
    });
    return res.status;
  }

  /**
   * Resolves `repos/{owner}/{repo}` and checks the result still addresses a
   * repository under the configured API base
   *
   * @throws {InvalidPayloadError} If the resolved path escapes `repos/`
   */
  private repositoryUrl(owner: string, name: string): string {
    const url = this.client.resolveUrl(`repos/${encodeURIComponent(owner)}/${encodeURIComponent(name)}`);
    const prefix = `${new URL(`${this.client.config.apiBaseUrl}/`).pathname}repos/`;
    const { pathname } = new URL(url);
    if (!pathname.startsWith(prefix) || pathname.slice(prefix.length).split('/').length !== 2) {
      throw new InvalidPayloadError(
        [{ code: 'custom', path: [], message: `${owner}/${name} does not address a repository` }],
        'repository reference'
      );
    }
    return url;
  }

  /**
   * Sets a repository's visibility to private
   */
  setPrivate(owner: string, name: string): Promise<number> {
    return this.update(owner, name, { visibility: 'private' });
  }

  /**
   * Archives (read-only) or unarchives a repository
   */
  setArchived(owner: string, name: string, archived = true): Promise<number> {
    return this.update(owner, name, { archived });
  }

  archive(owner: string, name: string): Promise<number> {
    return this.setArchived(owner, name, true);
  }

  unarchive(owner: string, name: string): Promise<number> {
    return this.setArchived(owner, name, false);
  }
}
