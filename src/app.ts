import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppConfig } from './config/config';
import { APP_NAME } from './config/constants';
import type { FetchLike } from './types';
import { GitHubRestClient, RepositoryLister, RepositoryMutator } from './services/github';
import { createGitHubTools } from './tools/github';
import { createTimeTools } from './tools/time';
import { registerGreetingPrompt } from './prompts/greeting';
import { createToolServer } from './server/mcp';
import type { Toolset } from './server/http';

export interface AppDeps {
  /** Replaces the global fetch for GitHub requests */
  fetch?: FetchLike;
  clock?: () => Date;
}

/**
 * Wires the GitHub and time toolsets from one frozen configuration
 */
export function createToolsets(config: AppConfig, deps: AppDeps = {}): Toolset[] {
  const client = new GitHubRestClient(config.github, deps.fetch);
  const githubTools = createGitHubTools({
    lister: new RepositoryLister(client),
    mutator: new RepositoryMutator(client)
  });
  const timeTools = createTimeTools(config.time.defaultTimeZone, deps.clock);

  return [
    {
      mount: 'github',
      tools: githubTools,
      createServer: () =>
        createToolServer({ name: 'GitHub Tools', tools: githubTools, extend: registerGreetingPrompt })
    },
    {
      mount: 'time',
      tools: timeTools,
      createServer: () => createToolServer({ name: 'Time Tools', tools: timeTools })
    }
  ];
}

/**
 * Single MCP server carrying every tool, for the stdio transport
 */
export function createCombinedServer(toolsets: readonly Toolset[]): McpServer {
  return createToolServer({
    name: APP_NAME,
    tools: toolsets.flatMap(toolset => toolset.tools),
    extend: registerGreetingPrompt
  });
}
