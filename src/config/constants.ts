/**
 * Application identity
 * Used for the MCP server handshake, the User-Agent header and env-paths directories
 */
export const APP_NAME = 'repo-tool-server';
export const APP_VERSION = '0.1.0';

/**
 * GitHub REST API configuration
 */
export const GITHUB_API = {
  BASE_URL: 'https://api.github.com',
  ACCEPT: 'application/vnd.github+json',
  API_VERSION: '2022-11-28',

  // Listing parameters for GET /user/repos
  // 100 is the largest page size GitHub accepts
  REPOS_PAGE_SIZE: 100,
  REPOS_SORT: 'created',
  REPOS_DIRECTION: 'asc'
} as const;

// HTTP server
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8000;
export const MAX_REQUEST_BODY = '1mb';

// Time tools
export const DEFAULT_TIME_ZONE = 'America/Chicago';

// Logging
export const MAX_LOG_FILE_SIZE = 5 * 1024 * 1024; // 5MB
export const MAX_LOG_FILES = 5;
export const LOG_FILE_NAME = 'app.log';
