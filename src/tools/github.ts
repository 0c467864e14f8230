import { z } from 'zod';
import { RepositoryRefSchema, RepositoryUpdateSchema } from '../services/github/payload';
import type { RepositoryLister } from '../services/github/repositories';
import type { RepositoryMutator } from '../services/github/mutations';
import { defineTool, type Tool } from './define';

const RepositoryRecordSchema = z.object({
  name: z.string(),
  description: z.string().nullable(),
  url: z.string(),
  visibility: z.enum(['public', 'private']),
  fork: z.boolean(),
  archived: z.boolean()
});

const RepositoryListSchema = z.array(RepositoryRecordSchema);
const StatusSchema = z.number().int().describe('HTTP status code returned by GitHub');

const listAnnotations = { readOnlyHint: true, idempotentHint: true, openWorldHint: true };
const updateAnnotations = { readOnlyHint: false, destructiveHint: false, idempotentHint: true, openWorldHint: true };

export interface GitHubToolDeps {
  lister: RepositoryLister;
  mutator: RepositoryMutator;
}

/**
 * Builds the GitHub repository toolset
 */
export function createGitHubTools({ lister, mutator }: GitHubToolDeps): Tool[] {
  const refShape = RepositoryRefSchema.shape;

  return [
    defineTool({
      name: 'get_repos',
      title: 'List GitHub Repositories',
      description:
        'Fetches all repositories owned by the authenticated GitHub user, oldest first. ' +
        'Each entry has name, description, url, visibility, fork and archived.',
      annotations: listAnnotations,
      input: {},
      resultKey: 'repositories',
      result: RepositoryListSchema,
      run: async (_args, ctx) => {
        await ctx.info('Listing repositories');
        return lister.listAll(message => ctx.info(message));
      }
    }),

    defineTool({
      name: 'get_archived_repos',
      title: 'List Archived GitHub Repositories',
      description: 'Fetches the archived (read-only) repositories owned by the authenticated GitHub user.',
      annotations: listAnnotations,
      input: {},
      resultKey: 'repositories',
      result: RepositoryListSchema,
      run: async (_args, ctx) => {
        await ctx.info('Listing archived repositories');
        return lister.listArchived(message => ctx.info(message));
      }
    }),

    defineTool({
      name: 'get_forked_repos',
      title: 'List Forked GitHub Repositories',
      description: 'Fetches the forked repositories owned by the authenticated GitHub user.',
      annotations: listAnnotations,
      input: {},
      resultKey: 'repositories',
      result: RepositoryListSchema,
      run: async (_args, ctx) => {
        await ctx.info('Listing forked repositories');
        return lister.listForked(message => ctx.info(message));
      }
    }),

    defineTool({
      name: 'update_repo',
      title: 'Update Repository',
      description:
        'Updates attributes of a GitHub repository owned by the authenticated user, such as ' +
        'visibility or archived state. Returns the HTTP status code GitHub answered with.',
      annotations: updateAnnotations,
      input: {
        ...refShape,
        payload: RepositoryUpdateSchema.describe('Attributes to change, e.g. {"visibility": "private"}')
      },
      resultKey: 'status',
      result: StatusSchema,
      run: async ({ owner, name, payload }, ctx) => {
        await ctx.info(`Updating ${owner}/${name}`);
        return mutator.update(owner, name, payload);
      }
    }),

    defineTool({
      name: 'make_repo_private',
      title: 'Make Repository Private',
      description: "Sets a GitHub repository's visibility to private. Equivalent to update_repo with {\"visibility\": \"private\"}.",
      annotations: updateAnnotations,
      input: refShape,
      resultKey: 'status',
      result: StatusSchema,
      run: async ({ owner, name }, ctx) => {
        await ctx.info(`Updating ${owner}/${name} to be private`);
        return mutator.setPrivate(owner, name);
      }
    }),

    defineTool({
      name: 'archive_repo',
      title: 'Archive GitHub Repository',
      description: 'Archives a GitHub repository, making it read-only. Equivalent to update_repo with {"archived": true}.',
      annotations: updateAnnotations,
      input: refShape,
      resultKey: 'status',
      result: StatusSchema,
      run: async ({ owner, name }, ctx) => {
        await ctx.info(`Archiving ${owner}/${name}`);
        return mutator.archive(owner, name);
      }
    }),

    defineTool({
      name: 'unarchive_repo',
      title: 'Unarchive GitHub Repository',
      description: 'Unarchives a previously archived GitHub repository. Equivalent to update_repo with {"archived": false}.',
      annotations: updateAnnotations,
      input: refShape,
      resultKey: 'status',
      result: StatusSchema,
      run: async ({ owner, name }, ctx) => {
        await ctx.info(`Unarchiving ${owner}/${name}`);
        return mutator.unarchive(owner, name);
      }
    })
  ];
}
