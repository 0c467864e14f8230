import type { ZodIssue } from 'zod';

/**
 * Base class for every error raised by repo-tool-server
 *
 * `type` is a stable identifier surfaced in HTTP error bodies.
 */
export class RepoToolsError extends Error {
  readonly type: string = 'repo_tools_error';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid configuration, raised before any network activity
 */
export class ConfigurationError extends RepoToolsError {
  override readonly type = 'configuration_error';
}

/**
 * Non-success response from a GitHub REST read operation
 */
export class GitHubRequestError extends RepoToolsError {
  override readonly type = 'github_request_error';

  constructor(
    readonly operation: string,
    readonly status: number,
    readonly url: string,
    detail?: string
  ) {
    super(`GitHub REST ${operation} failed (status ${status})${detail ? `: ${detail}` : ''}`);
  }
}

/**
 * Raw repository record that cannot be mapped to a RepositoryRecord
 */
export class RepositoryMappingError extends RepoToolsError {
  override readonly type = 'repository_mapping_error';

  constructor(
    readonly position: number,
    readonly field: string,
    reason: string
  ) {
    super(`Repository record at position ${position} has an invalid "${field}" field: ${reason}`);
  }
}

/**
 * Tool arguments or update payload rejected by validation
 */
export class InvalidPayloadError extends RepoToolsError {
  override readonly type = 'invalid_payload';

  constructor(
    readonly issues: ZodIssue[],
    subject = 'payload'
  ) {
    super(`Invalid ${subject}: ${formatIssues(issues)}`);
  }
}

export class InvalidTimeZoneError extends RepoToolsError {
  override readonly type = 'invalid_time_zone';

  constructor(readonly timeZone: string) {
    super(`Unknown time zone "${timeZone}"`);
  }
}

export class UnknownToolError extends RepoToolsError {
  override readonly type = 'unknown_tool';

  constructor(readonly toolName: string, readonly toolset: string) {
    super(`Tool "${toolName}" is not part of the ${toolset} toolset`);
  }
}

/**
 * Renders zod issues as `path: message` pairs joined by semicolons
 */
export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
