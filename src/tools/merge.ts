import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../server.js';
import { toSummary } from '../types/index.js';
import { errorMessage } from '../utils/index.js';

export function registerMergeTool(server: McpServer, { organizer }: ServerContext): void {
  server.registerTool('merge_duplicates', {
    description: 'Merge a duplicate group into one contact. The primary contact is kept and the others '
      + 'are deleted. Omitted choices keep the plan shown by review_merge. Can be undone with undo.',
    inputSchema: {
      groupId: z.string().describe('Group ID from find_duplicates'),
      primaryContactId: z.string().optional().describe('Contact to keep (default: the most complete one)'),
      nameFrom: z.string().optional().describe('Contact ID whose name is kept'),
      organizationFrom: z.string().optional().describe('Contact ID whose organization is kept'),
      photoFrom: z.string().optional().describe('Contact ID whose photo is kept'),
      excludePhoneNumbers: z.array(z.string()).optional().describe('Phone numbers to leave out'),
      excludeEmailAddresses: z.array(z.string()).optional().describe('Email addresses to leave out'),
    },
  }, async (args) => {
    try {
      const outcome = await organizer.mergeGroup(args.groupId, {
        primaryContactId: args.primaryContactId,
        preferredNameContactId: args.nameFrom,
        preferredOrganizationContactId: args.organizationFrom,
        preferredPhotoContactId: args.photoFrom,
        excludedPhoneNumbers: args.excludePhoneNumbers,
        excludedEmailAddresses: args.excludeEmailAddresses,
      });

      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({
            mergedContact: toSummary(outcome.contact),
            deletedContactIds: outcome.deletedContactIds,
            message: outcome.description,
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
