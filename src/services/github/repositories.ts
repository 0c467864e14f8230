import { z } from 'zod';
import type {
  Maybe,
  PageCursor,
  RepositoryFlag,
  RepositoryPage,
  RepositoryRecord,
  RepositoryVisibility
} from '../../types';
import { GITHUB_API } from '../../config/constants';
import { GitHubRequestError, RepositoryMappingError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import { readErrorMessage, type GitHubRestClient } from './client';
import { nextPageCursor } from './pagination';

/**
 * Fields read from a `GET /user/repos` item. Everything else GitHub sends is ignored.
 */
const RawRepositorySchema = z.object({
  name: z.string().min(1),
  description: z.string().nullable().optional(),
  html_url: z.string().min(1),
  visibility: z.enum(['public', 'private']).optional(),
  private: z.boolean().optional(),
  fork: z.boolean(),
  archived: z.boolean()
});

export type RawRepository = z.input<typeof RawRepositorySchema>;

/**
 * Observer for progress messages emitted while listing
 */
export type ProgressReporter = (message: string) => Promise<void> | void;

/**
 * Maps one raw GitHub repository object to a frozen RepositoryRecord
 *
 * When `visibility` is absent the `private` flag decides it; when both are
 * absent the record is rejected.
 *
 * @param raw - Item from the `GET /user/repos` response array
 * @param position - Zero-based index within the whole listing, used in error messages
 * @throws {RepositoryMappingError} If a required field is missing or has the wrong type
 * @example
 * ```typescript
 * const record = toRepositoryRecord({
 *   name: 'widgets',
 *   html_url: 'https://github.com/acme/widgets',
 *   visibility: 'public',
 *   fork: false,
 *   archived: false
 * });
 * ```
 */
export function toRepositoryRecord(raw: unknown, position = 0): RepositoryRecord {
  const parsed = RawRepositorySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RepositoryMappingError(position, issue.path.join('.') || '(record)', issue.message);
  }

  const repo = parsed.data;
  let visibility: RepositoryVisibility;
  if (repo.visibility) {
    visibility = repo.visibility;
  } else if (repo.private !== undefined) {
    visibility = repo.private ? 'private' : 'public';
  } else {
    throw new RepositoryMappingError(position, 'visibility', 'Required');
  }

  return Object.freeze({
    name: repo.name,
    description: repo.description ?? null,
    url: repo.html_url,
    visibility,
    fork: repo.fork,
    archived: repo.archived
  });
}

/**
 * Keeps the records whose boolean attribute is true, in their original order
 */
export function filterRepositories(
  repositories: readonly RepositoryRecord[],
  flag: RepositoryFlag
): RepositoryRecord[] {
  return repositories.filter(repo => repo[flag]);
}

/**
 * Lists the repositories owned by the authenticated account
 *
 * Pages are fetched strictly one after another, each following the cursor
 * returned by the previous one. Any failure aborts the listing and discards
 * what was fetched so far.
 */
export class RepositoryLister {
  constructor(private readonly client: GitHubRestClient) {}

  /**
   * Fetches a single page of repositories
   *
   * @param cursor - Cursor from a previous page, or null for the first page
   * @param offset - Records already listed before this page, so error positions
   * count across the whole listing
   * @throws {GitHubRequestError} On a non-2xx response
   * @throws {RepositoryMappingError} If any record on the page cannot be mapped
   */
  async fetchPage(cursor: Maybe<PageCursor>, offset = 0): Promise<RepositoryPage> {
    const res = cursor
      ? await this.client.request(cursor)
      : await this.client.request('user/repos', {
          query: {
            per_page: GITHUB_API.REPOS_PAGE_SIZE,
            sort: GITHUB_API.REPOS_SORT,
            direction: GITHUB_API.REPOS_DIRECTION
          }
        });

    if (!res.ok) {
      const detail = await readErrorMessage(res);
      const error = new GitHubRequestError('list repositories', res.status, res.url || String(cursor ?? 'user/repos'), detail);
      logger.error('Failed to list repositories', {
        status: res.status,
        error: error.message
      });
      throw error;
    }

    const body: unknown = await res.json();
    if (!Array.isArray(body)) {
      throw new RepositoryMappingError(offset, '(page)', 'expected an array of repositories');
    }

    return {
      repositories: body.map((raw, index) => toRepositoryRecord(raw, offset + index)),
      nextCursor: nextPageCursor(res.headers)
    };
  }

  /**
   * Fetches every repository, oldest first
   *
   * @example
   * ```typescript
   * const lister = new RepositoryLister(new GitHubRestClient(config.github));
   * const repos = await lister.listAll();
   * console.log(`${repos.length} repositories`);
   * ```
   */
  async listAll(report?: ProgressReporter): Promise<RepositoryRecord[]> {
    const repositories: RepositoryRecord[] = [];
    let cursor: Maybe<PageCursor> = null;
    let pages = 0;

    logger.info('Listing repositories');
    do {
      const page: RepositoryPage = await this.fetchPage(cursor, repositories.length);
      pages++;
      repositories.push(...page.repositories);
      await report?.(`Fetched page ${pages} (${page.repositories.length} repositories)`);
      cursor = page.nextCursor;
    } while (cursor);

    logger.info('Successfully listed repositories', {
      pages,
      count: repositories.length
    });
    return repositories;
  }

  /**
   * Repositories created by forking another repository
   */
  async listForked(report?: ProgressReporter): Promise<RepositoryRecord[]> {
    return filterRepositories(await this.listAll(report), 'fork');
  }

  /**
   * Archived (read-only) repositories
   */
  async listArchived(report?: ProgressReporter): Promise<RepositoryRecord[]> {
    return filterRepositories(await this.listAll(report), 'archived');
  }
}
