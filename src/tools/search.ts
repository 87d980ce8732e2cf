import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../server.js';
import { searchContacts } from '../contacts/index.js';
import { errorMessage } from '../utils/index.js';

export function registerSearchTool(server: McpServer, { store }: ServerContext): void {
  server.registerTool('search_contacts', {
    description: 'Find contacts to review or clean up. Fuzzy-matches name, email, phone, organization and group; '
      + 'each result lists its issues (missingName, noContactInfo, missingPhone, missingEmail). '
      + 'A blank query lists the contacts with the most issues first.',
    inputSchema: {
      query: z.string().optional().default('').describe('Search text (name, email, phone, org, group)'),
      issue: z.enum(['missingName', 'noContactInfo', 'missingPhone', 'missingEmail']).optional()
        .describe('Only contacts with this issue'),
      group: z.string().optional().describe('Only members of this group, e.g. "Needs Phone Follow-Up"'),
      limit: z.number().int().positive().optional().default(20).describe('Maximum results to return'),
      includeArchived: z.boolean().optional().default(false).describe('Include contacts in the archive group'),
    },
  }, async ({ query, issue, group, limit, includeArchived }) => {
    try {
      const contacts = await store.list(true);
      const results = searchContacts(contacts, { query, issue, group, includeArchived, limit });
      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify(results, null, 2),
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
