/**
 * GitHub Service API - Public Interface
 *
 * REST client, repository listing and repository updates.
 *
 * @module services/github
 */

export { GitHubRestClient, readErrorMessage, type RestRequest, type HttpMethod } from './client';

export { parseLinkHeader, nextPageCursor, toPageCursor } from './pagination';

export {
  RepositoryLister,
  toRepositoryRecord,
  filterRepositories,
  type RawRepository,
  type ProgressReporter
} from './repositories';

export { RepositoryMutator } from './mutations';

export {
  RepositoryUpdateSchema,
  RepositoryRefSchema,
  parseRepositoryUpdate,
  parseRepositoryRef,
  type RepositoryUpdate
} from './payload';
