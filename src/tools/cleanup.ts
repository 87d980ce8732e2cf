import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../server.js';
import { markReviewedAction, requiresInput, type CleanupAction } from '../actions/index.js';
import { describeEffect } from '../undo/index.js';
import { errorMessage } from '../utils/index.js';

const actionNames = ['addPhone', 'addEmail', 'addToGroup', 'archive', 'updateName', 'markReviewed'] as const;

function toCleanupAction(name: typeof actionNames[number], groupName: string | undefined): CleanupAction {
  switch (name) {
    case 'addToGroup':
      if (!groupName?.trim()) throw new Error('addToGroup needs a groupName');
      return { type: 'addToGroup', groupName: groupName.trim() };
    case 'markReviewed':
      return markReviewedAction;
    default:
      return { type: name };
  }
}

export function registerCleanupTool(server: McpServer, { organizer }: ServerContext): void {
  server.registerTool('apply_cleanup_action', {
    description: 'Apply one cleanup action to a contact: add a phone or email, add to a group, archive, '
      + 'rename, or mark as reviewed. Successful actions can be undone with undo.',
    inputSchema: {
      contactId: z.string().describe('Contact ID'),
      action: z.enum(actionNames).describe('Action to apply'),
      value: z.string().optional().describe('Phone number, email address or new name, for actions that need one'),
      groupName: z.string().optional().describe('Group for addToGroup'),
    },
  }, async ({ contactId, action, value, groupName }) => {
    try {
      const cleanupAction = toCleanupAction(action, groupName);
      if (requiresInput(cleanupAction) && !value?.trim()) {
        throw new Error(`${action} needs a value`);
      }

      const result = await organizer.performAction(cleanupAction, contactId, value);
      if (!result.success) {
        return {
          content: [{ type: 'text' as const, text: `Error: ${action} failed for contact ${contactId}` }],
          isError: true,
        };
      }
      if (result.effect) await organizer.notifyChanged();

      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({
            contactId,
            action,
            applied: result.effect ? describeEffect(result.effect) : 'Already applied; nothing to undo',
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
