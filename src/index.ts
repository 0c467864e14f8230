import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/config';
import { APP_NAME, APP_VERSION } from './config/constants';
import { errorMessage } from './lib/errors';
import { logger } from './lib/logger';
import { createCombinedServer, createToolsets } from './app';
import { createHttpApp } from './server/http';

async function main(argv: string[]) {
  const config = loadConfig();
  const toolsets = createToolsets(config);

  if (!config.github.token) {
    logger.warn('No GitHub token configured; GitHub tools will reject every call');
  }

  if (argv.includes('--stdio')) {
    const server = createCombinedServer(toolsets);
    await server.connect(new StdioServerTransport());
    logger.info('Serving MCP over stdio', { version: APP_VERSION });
    return;
  }

  const app = createHttpApp(toolsets);
  const { host, port } = config.server;
  const httpServer = app.listen(port, host, () => {
    logger.info('HTTP server listening', { host, port, version: APP_VERSION });
    process.stderr.write(`${APP_NAME} ${APP_VERSION} listening on http://${host}:${port}\n`);
    for (const toolset of toolsets) {
      process.stderr.write(`  /${toolset.mount}/mcp  (${toolset.tools.length} tools)\n`);
    }
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    httpServer.close(error => {
      if (error) {
        logger.error('Error while closing HTTP server', { error });
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main(process.argv.slice(2)).catch(error => {
  logger.error('Failed to start', { error });
  process.stderr.write(`❌ ${errorMessage(error)}\n`);
  process.exit(1);
});
