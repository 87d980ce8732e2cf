import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../server.js';
import type { HistoryStepResult } from '../undo/index.js';
import type { ContactOrganizer } from '../organizer.js';
import { errorMessage } from '../utils/index.js';

function stepText(direction: 'undo' | 'redo', result: HistoryStepResult): string {
  switch (result.status) {
    case 'completed': return `${direction === 'undo' ? 'Undid' : 'Redid'}: ${result.description}`;
    case 'failed': return `Could not ${direction} "${result.description}"; it is still in the history and can be retried`;
    case 'noop': return `Nothing to ${direction}`;
  }
}

function registerStepTool(
  server: McpServer,
  organizer: ContactOrganizer,
  direction: 'undo' | 'redo',
  description: string,
): void {
  server.registerTool(direction, { description }, async () => {
    try {
      const result = direction === 'undo' ? await organizer.undo() : await organizer.redo();
      if (result.status === 'completed') await organizer.notifyChanged();
      return {
        content: [{ type: 'text' as const, text: stepText(direction, result) }],
        isError: result.status === 'failed',
      };
    } catch (err) {
      return {
        content: [{ type: 'text' as const, text: `Error: ${errorMessage(err)}` }],
        isError: true,
      };
    }
  });
}

export function registerUndoTools(server: McpServer, { organizer }: ServerContext): void {
  registerStepTool(server, organizer, 'undo', 'Undo the most recent merge or cleanup action.');
  registerStepTool(server, organizer, 'redo', 'Redo the most recently undone merge or cleanup action.');
}
