import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../server.js';
import { errorMessage } from '../utils/index.js';

export function registerHistoryTool(server: McpServer, { store, organizer }: ServerContext): void {
  server.registerTool('history', {
    description: 'Show the undo/redo stacks for this session and the store change history '
      + 'for one contact or globally.',
    inputSchema: {
      contactId: z.string().optional().describe('Show store history for a specific contact (omit for global history)'),
      limit: z.number().int().positive().optional().default(20).describe('Max store entries to return'),
    },
  }, async ({ contactId, limit }) => {
    try {
      const session = await organizer.history();
      const entries = await store.getHistory(limit, contactId);

      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({
            undo: session.undo,
            redo: session.redo,
            scope: contactId ? `contact:${contactId}` : 'global',
            entries,
          }, null, 2),
        }],
      };
    } catch (err) {
      return {
        content: [{ type: 'text' as const, text: `Error: ${errorMessage(err)}` }],
        isError: true,
      };
    }
  });
}
