import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../server.js';
import { registerSearchTool } from './search.js';
import { registerGetTool } from './get.js';
import { registerCreateTool } from './create.js';
import { registerDuplicatesTool } from './duplicates.js';
import { registerReviewTool } from './review.js';
import { registerMergeTool } from './merge.js';
import { registerCleanupTool } from './cleanup.js';
import { registerUndoTools } from './undo.js';
import { registerHistoryTool } from './history.js';

export function registerAllTools(server: McpServer, context: ServerContext): void {
  registerSearchTool(server, context);
  registerGetTool(server, context);
  registerCreateTool(server, context);
  registerDuplicatesTool(server, context);
  registerReviewTool(server, context);
  registerMergeTool(server, context);
  registerCleanupTool(server, context);
  registerUndoTools(server, context);
  registerHistoryTool(server, context);
}
