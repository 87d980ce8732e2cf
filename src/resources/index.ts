import { ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../server.js';

export function registerAllResources(server: McpServer, { store, organizer }: ServerContext): void {
  // contacts://all - summary list of all active contacts
  server.registerResource('all-contacts', 'contacts://all', {
    title: 'All Contacts',
    description: 'Summary list of all active contacts',
    mimeType: 'application/json',
  }, async (uri) => {
    const summaries = await store.listSummaries(false);
    return {
      contents: [{
        uri: uri.href,
        text: JSON.stringify(summaries, null, 2),
        mimeType: 'application/json',
      }],
    };
  });

  // contacts://{id} - individual contact detail
  server.registerResource('contact-detail',
    new ResourceTemplate('contacts://{id}', {
      list: async () => {
        const summaries = await store.listSummaries(false);
        return {
          resources: summaries.map(s => ({
            uri: `contacts://${s.id}`,
            name: s.fullName,
            mimeType: 'application/json',
          })),
        };
      },
    }),
    {
      title: 'Contact Detail',
      description: 'Full details for a specific contact',
      mimeType: 'application/json',
    },
    async (uri, variables) => {
      const id = Array.isArray(variables.id) ? variables.id[0] : variables.id;
      const contact = await store.get(id);
      return {
        contents: [{
          uri: uri.href,
          text: JSON.stringify(contact, null, 2),
          mimeType: 'application/json',
        }],
      };
    },
  );

  // contacts://duplicates - groups from the latest analysis, running one if needed
  server.registerResource('duplicates', 'contacts://duplicates', {
    title: 'Duplicate Groups',
    description: 'Likely duplicate contact groups with match type and confidence',
    mimeType: 'application/json',
  }, async (uri) => {
    const result = organizer.lastAnalysis ?? await organizer.analyze();
    return {
      contents: [{
        uri: uri.href,
        text: JSON.stringify(result?.groups ?? [], null, 2),
        mimeType: 'application/json',
      }],
    };
  });

  // contacts://undo-history - undo and redo stacks, most recent first
  server.registerResource('undo-history', 'contacts://undo-history', {
    title: 'Undo History',
    description: 'Actions that can be undone or redone in this session',
    mimeType: 'application/json',
  }, async (uri) => {
    const history = await organizer.history();
    return {
      contents: [{
        uri: uri.href,
        text: JSON.stringify(history, null, 2),
        mimeType: 'application/json',
      }],
    };
  });
}
