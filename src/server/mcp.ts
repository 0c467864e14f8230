import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { APP_VERSION } from '../config/constants';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import type { Tool, ToolContext } from '../tools/define';

export interface ToolServerOptions {
  name: string;
  tools: readonly Tool[];
  /** Extra registrations (prompts, resources) applied after the tools */
  extend?: (server: McpServer) => void;
}

function textResponse(text: string) {
  return { content: [{ type: 'text' as const, text }] };
}

function errorResponse(prefix: string, error: unknown): CallToolResult {
  return {
    ...textResponse(`${prefix}: ${errorMessage(error)}`),
    isError: true
  };
}

/**
 * Registers one tool on an MCP server
 *
 * Arguments are checked against the tool's strict schema, so unknown keys
 * are refused before the handler runs. The result is returned both as JSON
 * text and as structured content under the tool's result key. Progress messages go to the log file and to the
 * client as `notifications/message`.
 */
export function registerTool(server: McpServer, tool: Tool) {
  const registered = server.registerTool(
    tool.name,
    {
      title: tool.title,
      description: tool.description,
      inputSchema: tool.input,
      outputSchema: { [tool.resultKey]: tool.result },
      annotations: tool.annotations
    },
    async (args: unknown, extra): Promise<CallToolResult> => {
      const ctx: ToolContext = {
        async info(message) {
          logger.info(message, { tool: tool.name });
          await extra.sendNotification({
            method: 'notifications/message',
            params: { level: 'info', logger: tool.name, data: message }
          });
        }
      };

      try {
        const value = await tool.invoke(args, ctx);
        return {
          ...textResponse(JSON.stringify(value, null, 2)),
          structuredContent: { [tool.resultKey]: value }
        };
      } catch (error) {
        logger.error('Tool call failed', { tool: tool.name, error });
        return errorResponse(`${tool.title} failed`, error);
      }
    }
  );
  // The SDK wraps a bare shape in a stripping object; unknown keys must fail instead
  registered.inputSchema = tool.schema;
}

/**
 * Creates an MCP server exposing the given tools
 *
 * @example
 * ```typescript
 * const server = createToolServer({ name: 'time-tools', tools: createTimeTools('UTC') });
 * await server.connect(new StdioServerTransport());
 * ```
 */
export function createToolServer(options: ToolServerOptions): McpServer {
  const server = new McpServer(
    { name: options.name, version: APP_VERSION },
    { capabilities: { logging: {} } }
  );

  for (const tool of options.tools) {
    registerTool(server, tool);
  }
  options.extend?.(server);

  return server;
}
