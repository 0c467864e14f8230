import { describe, it, expect } from 'vitest';
import { nextPageCursor, parseLinkHeader } from '../pagination';

describe('parseLinkHeader', () => {
  it('should parse the relations GitHub sends', () => {
    const header =
      '<https://api.github.com/user/repos?page=2>; rel="next", ' +
      '<https://api.github.com/user/repos?page=5>; rel="last"';

    expect(parseLinkHeader(header)).toEqual({
      next: 'https://api.github.com/user/repos?page=2',
      last: 'https://api.github.com/user/repos?page=5',
    });
  });

  it('should return an empty map for a missing header', () => {
    expect(parseLinkHeader(null)).toEqual({});
    expect(parseLinkHeader(undefined)).toEqual({});
    expect(parseLinkHeader('')).toEqual({});
  });

  it('should accept unquoted and multi-valued relations', () => {
    expect(parseLinkHeader('<https://a.example/2>; rel=next')).toEqual({ next: 'https://a.example/2' });
    expect(parseLinkHeader('<https://a.example/3>; rel="next last"')).toEqual({
      next: 'https://a.example/3',
      last: 'https://a.example/3',
    });
  });

  it('should skip malformed entries', () => {
    expect(parseLinkHeader('garbage, <https://a.example/2>; title="x"')).toEqual({});
  });
});

describe('nextPageCursor', () => {
  it('should return the next link as a cursor', () => {
    const headers = new Headers({ link: '<https://api.github.com/user/repos?page=3>; rel="next"' });
    expect(nextPageCursor(headers)).toBe('https://api.github.com/user/repos?page=3');
  });

  it('should return null on the last page', () => {
    const headers = new Headers({ link: '<https://api.github.com/user/repos?page=1>; rel="first"' });
    expect(nextPageCursor(headers)).toBeNull();
    expect(nextPageCursor(new Headers())).toBeNull();
  });
});
