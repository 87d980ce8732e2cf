import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../server.js';
import type { MergeValueOption } from '../types/index.js';
import { errorMessage } from '../utils/index.js';

function describeOptions(options: MergeValueOption[], selected: Set<string>) {
  return options.map(o => ({
    value: o.value,
    selected: selected.has(o.value),
    contactIds: o.owners.map(c => c.id),
  }));
}

export function registerReviewTool(server: McpServer, { organizer }: ServerContext): void {
  server.registerTool('review_merge', {
    description: 'Show the default merge plan for a duplicate group: which contact supplies the name, '
      + 'organization and photo, and every phone number and email with the contacts that carry it.',
    inputSchema: {
      groupId: z.string().describe('Group ID from find_duplicates'),
    },
  }, async ({ groupId }) => {
    try {
      const { group, plan, phoneNumbers, emailAddresses } = organizer.planMerge(groupId);

      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({
            groupId: group.id,
            matchType: group.matchType,
            confidence: group.confidence,
            contacts: group.contacts,
            preferredNameContactId: plan.preferredNameContactId,
            preferredOrganizationContactId: plan.preferredOrganizationContactId,
            preferredPhotoContactId: plan.preferredPhotoContactId ?? null,
            phoneNumbers: describeOptions(phoneNumbers, plan.selectedPhoneNumbers),
            emailAddresses: describeOptions(emailAddresses, plan.selectedEmailAddresses),
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
