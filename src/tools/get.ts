import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../server.js';
import { errorMessage } from '../utils/index.js';

export function registerGetTool(server: McpServer, { store }: ServerContext): void {
  server.registerTool('get_contact', {
    description: 'Get full details of a contact by ID, including groups and metadata.',
    inputSchema: {
      id: z.string().describe('Contact ID'),
    },
  }, async ({ id }) => {
    try {
      const contact = await store.get(id);
      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify(contact, null, 2),
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
