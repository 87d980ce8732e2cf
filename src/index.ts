#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { createServer } from './server.js';
import { errorMessage, logger } from './utils/index.js';

async function main() {
  const config = await loadConfig();
  const { server, store } = createServer(config);

  await store.init();

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('contact-curator server running on stdio');
}

main().catch((err: unknown) => {
  logger.error('Fatal error:', errorMessage(err));
  process.exit(1);
});
