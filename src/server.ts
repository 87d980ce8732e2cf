import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { GitContactStore } from './store/index.js';
import { ContactOrganizer } from './organizer.js';
import { registerAllTools } from './tools/index.js';
import { registerAllResources } from './resources/index.js';
import type { AppConfig } from './config.js';
import { logger } from './utils/index.js';

export interface ServerContext {
  store: GitContactStore;
  organizer: ContactOrganizer;
}

export function createServer(config: AppConfig): { server: McpServer } & ServerContext {
  const server = new McpServer({
    name: 'contact-curator',
    version: '0.1.0',
  });

  const store = new GitContactStore(config.storePath, { defaultCountry: config.defaultCountry });
  const organizer = new ContactOrganizer(store, {
    autoRefresh: config.autoRefresh,
    detection: { ...config.detection, defaultCountry: config.defaultCountry },
  });

  registerAllTools(server, { store, organizer });
  registerAllResources(server, { store, organizer });

  logger.info('MCP server created, store path:', config.storePath);

  return { server, store, organizer };
}
