import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../server.js';
import { errorMessage } from '../utils/index.js';

export function registerDuplicatesTool(server: McpServer, { organizer }: ServerContext): void {
  server.registerTool('find_duplicates', {
    description: 'Scan active contacts for likely duplicates. Returns groups with a match type, '
      + 'a confidence score and a group ID to pass to review_merge or merge_duplicates.',
    inputSchema: {
      minConfidence: z.number().min(0).max(1).optional().default(0)
        .describe('Only report groups at or above this confidence (0-1)'),
      limit: z.number().int().positive().optional().default(50).describe('Max groups to return'),
    },
  }, async ({ minConfidence, limit }) => {
    try {
      const result = await organizer.analyze();
      if (!result) {
        return {
          content: [{ type: 'text' as const, text: 'Analysis already in progress; try again shortly.' }],
        };
      }

      const groups = result.groups
        .filter(g => g.confidence >= minConfidence)
        .slice(0, limit)
        .map(g => ({
          id: g.id,
          matchType: g.matchType,
          confidence: g.confidence,
          contacts: g.contacts.map(c => ({ id: c.id, fullName: c.fullName, organization: c.organization })),
        }));

      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({
            totalContacts: result.totalContacts,
            analysis: result.analysis,
            groups,
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
