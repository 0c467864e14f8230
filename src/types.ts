/**
 * Core type definitions for repo-tool-server
 *
 * @module types
 */

/**
 * Utility type representing a value that may be null
 */
export type Maybe<T> = T | null;

/**
 * Brand type for creating nominal types
 *
 * Prevents accidental mixing of semantically different strings by adding
 * a compile-time brand to the type.
 *
 * @template T - Base type to brand (usually string)
 * @template TBrand - Brand identifier string
 */
declare const brand: unique symbol;
export type Brand<T, TBrand extends string> = T & { readonly [brand]: TBrand };

/**
 * Opaque pagination cursor for the repository listing
 *
 * Holds the `rel="next"` URL from a GitHub `Link` header. Callers pass it
 * back unchanged to fetch the following page.
 */
export type PageCursor = Brand<string, 'PageCursor'>;

export type RepositoryVisibility = 'public' | 'private';

/**
 * Normalized view of one repository owned by the authenticated account
 *
 * Produced per request, frozen, and discarded once the response is sent.
 */
export interface RepositoryRecord {
  readonly name: string;
  readonly description: Maybe<string>;
  /** Canonical web URL (`html_url`) */
  readonly url: string;
  readonly visibility: RepositoryVisibility;
  readonly fork: boolean;
  readonly archived: boolean;
}

/**
 * One page of the repository listing
 */
export interface RepositoryPage {
  repositories: RepositoryRecord[];
  nextCursor: Maybe<PageCursor>;
}

/**
 * Boolean repository attributes the listing can be filtered by
 */
export type RepositoryFlag = 'fork' | 'archived';

/**
 * Minimal fetch signature used by the REST client, injectable for tests
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
