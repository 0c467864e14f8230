import { vi } from 'vitest';
import type { GitHubConfig } from '../../../config/config';
import type { FetchLike } from '../../../types';
import type { RawRepository } from '../repositories';

export const API = 'https://api.github.com';

export const testConfig: GitHubConfig = {
  token: 'test-token',
  apiBaseUrl: API,
  userAgent: 'repo-tool-server/test'
};

export function createMockRepo(name: string, overrides?: Partial<RawRepository>): RawRepository {
  return {
    name,
    description: `Description for ${name}`,
    html_url: `https://github.com/testuser/${name}`,
    visibility: 'public',
    fork: false,
    archived: false,
    ...overrides
  };
}

export function jsonResponse(body: unknown, init: { status?: number; link?: string } = {}): Response {
  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (init.link) headers.link = init.link;
  return new Response(JSON.stringify(body), { status: init.status ?? 200, headers });
}

export function nextLink(page: number): string {
  return `<${API}/user/repos?per_page=100&sort=created&direction=asc&page=${page}>; rel="next", ` +
    `<${API}/user/repos?per_page=100&sort=created&direction=asc&page=9>; rel="last"`;
}

export function mockFetch() {
  return vi.fn<FetchLike>();
}
