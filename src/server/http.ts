import express, { type NextFunction, type Request, type Response } from 'express';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { APP_NAME, APP_VERSION, MAX_REQUEST_BODY } from '../config/constants';
import {
  ConfigurationError,
  GitHubRequestError,
  InvalidPayloadError,
  InvalidTimeZoneError,
  RepoToolsError,
  RepositoryMappingError,
  UnknownToolError,
  errorMessage
} from '../lib/errors';
import { logger } from '../lib/logger';
import { logOnlyContext, type Tool } from '../tools/define';

/**
 * A group of tools served under one path prefix
 */
export interface Toolset {
  /** Path segment, e.g. `github` → `/github/mcp`, `/github/get_repos` */
  mount: string;
  tools: readonly Tool[];
  /** Builds a fresh MCP server for one stateless request */
  createServer(): McpServer;
}

function statusFor(error: unknown): number {
  if (error instanceof UnknownToolError) return 404;
  if (error instanceof InvalidPayloadError || error instanceof InvalidTimeZoneError) return 400;
  if (error instanceof GitHubRequestError || error instanceof RepositoryMappingError) return 502;
  if (error instanceof ConfigurationError) return 500;
  // body-parser failures (malformed JSON, oversized body) carry their own 4xx status
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    if (error.status >= 400 && error.status < 500) return error.status;
  }
  return 500;
}

function errorBody(error: unknown) {
  return {
    error: {
      type: error instanceof RepoToolsError ? error.type : 'internal_error',
      message: errorMessage(error)
    }
  };
}

function methodNotAllowed(_req: Request, res: Response) {
  res.status(405).json({
    jsonrpc: '2.0',
    error: { code: -32000, message: 'Method not allowed.' },
    id: null
  });
}

/**
 * Routes for one toolset: MCP over Streamable HTTP plus plain JSON invocation
 */
export function createToolsetRouter(toolset: Toolset) {
  const router = express.Router();
  const byName = new Map(toolset.tools.map(tool => [tool.name, tool]));

  router.post('/mcp', async (req, res) => {
    const server = toolset.createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true
    });
    res.on('close', () => {
      transport.close().catch(error => logger.warn('Failed to close MCP transport', { error }));
      server.close().catch(error => logger.warn('Failed to close MCP server', { error }));
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('MCP request failed', { toolset: toolset.mount, error });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null
        });
      }
    }
  });
  router.get('/mcp', methodNotAllowed);
  router.delete('/mcp', methodNotAllowed);

  router.post('/:tool', async (req, res, next) => {
    const tool = byName.get(req.params.tool);
    if (!tool) {
      next(new UnknownToolError(req.params.tool, toolset.mount));
      return;
    }

    const started = Date.now();
    try {
      const ctx = logOnlyContext(message => logger.info(message, { tool: tool.name }));
      const result = await tool.invoke(req.body ?? {}, ctx);
      logger.debug('Tool call completed', { tool: tool.name, ms: Date.now() - started });
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

/**
 * Builds the express application serving every toolset
 *
 * @example
 * ```typescript
 * const app = createHttpApp([githubToolset, timeToolset]);
 * app.listen(8000);
 * ```
 */
export function createHttpApp(toolsets: readonly Toolset[]) {
  const app = express();
  app.use(express.json({ limit: MAX_REQUEST_BODY }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      name: APP_NAME,
      version: APP_VERSION,
      toolsets: toolsets.map(toolset => ({
        mount: toolset.mount,
        tools: toolset.tools.map(tool => tool.name)
      }))
    });
  });

  for (const toolset of toolsets) {
    app.use(`/${toolset.mount}`, createToolsetRouter(toolset));
  }

  // express recognises error handlers by their four parameters
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusFor(error);
    const log = status >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log('Request failed', { method: req.method, path: req.path, status, error });
    res.status(status).json(errorBody(error));
  });

  return app;
}
