import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../server.js';
import { errorMessage } from '../utils/index.js';

const emailSchema = z.object({
  value: z.string().min(1),
  type: z.enum(['home', 'work', 'other']).optional(),
});

const phoneSchema = z.object({
  value: z.string().min(1),
  type: z.enum(['home', 'work', 'mobile', 'fax', 'other']).optional(),
});

const addressSchema = z.object({
  street: z.string().optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  postalCode: z.string().optional(),
  country: z.string().optional(),
  type: z.enum(['home', 'work', 'other']).optional(),
});

export function registerCreateTool(server: McpServer, { store, organizer }: ServerContext): void {
  server.registerTool('create_contact', {
    description: 'Create a new contact. At minimum, provide a full name. Returns the new contact ID.',
    inputSchema: {
      fullName: z.string().min(1).describe('Full display name'),
      givenName: z.string().optional(),
      familyName: z.string().optional(),
      emails: z.array(emailSchema).optional(),
      phones: z.array(phoneSchema).optional(),
      addresses: z.array(addressSchema).optional(),
      organization: z.object({
        name: z.string().optional(),
        title: z.string().optional(),
        department: z.string().optional(),
      }).optional(),
      birthday: z.string().optional().describe('YYYY-MM-DD format'),
      notes: z.string().optional(),
      groups: z.array(z.string()).optional().describe('Group names the contact belongs to'),
      photo: z.string().optional().describe('Photo as a data URI'),
    },
  }, async (args) => {
    try {
      const contact = await store.create({
        fullName: args.fullName,
        name: {
          givenName: args.givenName,
          familyName: args.familyName,
        },
        emails: args.emails,
        phones: args.phones,
        addresses: args.addresses,
        organization: args.organization,
        birthday: args.birthday,
        notes: args.notes,
        groups: args.groups,
        photo: args.photo,
      });
      await organizer.notifyChanged();

      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({ id: contact.id, fullName: contact.fullName, message: 'Contact created successfully' }, null, 2),
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
