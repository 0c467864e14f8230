import { z } from 'zod';
import { InvalidPayloadError } from '../../lib/errors';

/**
 * Attributes accepted by `PATCH /repos/{owner}/{repo}`
 *
 * Strict: unknown keys are rejected rather than forwarded to GitHub.
 */
export const RepositoryUpdateSchema = z
  .object({
    name: z.string().min(1).describe('New repository name'),
    description: z.string().nullable().describe('Short description of the repository'),
    homepage: z.string().nullable().describe('URL with more information about the repository'),
    visibility: z.enum(['public', 'private']).describe('Repository visibility'),
    archived: z.boolean().describe('Whether the repository is archived (read-only)'),
    default_branch: z.string().min(1).describe('Name of the default branch'),
    has_issues: z.boolean().describe('Enable or disable issues'),
    has_projects: z.boolean().describe('Enable or disable projects'),
    has_wiki: z.boolean().describe('Enable or disable the wiki'),
    is_template: z.boolean().describe('Make the repository available as a template')
  })
  .partial()
  .strict()
  .refine(payload => Object.keys(payload).length > 0, {
    message: 'payload must change at least one attribute'
  });

export type RepositoryUpdate = z.infer<typeof RepositoryUpdateSchema>;

const segment = z
  .string()
  .trim()
  .min(1, 'must not be empty')
  .regex(/^[A-Za-z0-9._-]+$/, 'may only contain letters, digits, ".", "_" and "-"')
  .refine(value => value !== '.' && value !== '..', 'must not be "." or ".."');

export const RepositoryRefSchema = z.object({
  owner: segment.describe('GitHub username or organization that owns the repository'),
  name: segment.describe('Repository name')
});

/**
 * Validates an update payload before it is sent
 *
 * @throws {InvalidPayloadError} On unknown keys, wrong types, or an empty payload
 * @example
 * ```typescript
 * parseRepositoryUpdate({ visibility: 'private' }); // ok
 * parseRepositoryUpdate({ stars: 10 });             // throws
 * ```
 */
export function parseRepositoryUpdate(payload: unknown): RepositoryUpdate {
  const result = RepositoryUpdateSchema.safeParse(payload);
  if (!result.success) {
    throw new InvalidPayloadError(result.error.issues);
  }
  return result.data;
}

/**
 * Validates the owner/name pair addressing a repository
 *
 * @throws {InvalidPayloadError} If either part is empty, is a dot segment, or has
 * characters GitHub does not allow in names
 */
export function parseRepositoryRef(owner: string, name: string): { owner: string; name: string } {
  const result = RepositoryRefSchema.safeParse({ owner, name });
  if (!result.success) {
    throw new InvalidPayloadError(result.error.issues, 'repository reference');
  }
  return result.data;
}
