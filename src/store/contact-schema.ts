import { z } from 'zod';
import type { Contact } from '../types/index.js';

const emailSchema = z.object({
  value: z.string(),
  type: z.enum(['home', 'work', 'other']).optional(),
});

const phoneSchema = z.object({
  value: z.string(),
  originalValue: z.string().optional(),
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

const urlSchema = z.object({
  value: z.string(),
  type: z.enum(['home', 'work', 'blog', 'profile', 'other']).optional(),
});

/** Shape of a contact file on disk. */
export const contactSchema: z.ZodType<Contact> = z.object({
  id: z.string().min(1),
  fullName: z.string(),
  name: z.object({
    prefix: z.string().optional(),
    givenName: z.string().optional(),
    middleName: z.string().optional(),
    familyName: z.string().optional(),
    suffix: z.string().optional(),
  }),
  emails: z.array(emailSchema),
  phones: z.array(phoneSchema),
  addresses: z.array(addressSchema),
  organization: z.object({
    name: z.string().optional(),
    department: z.string().optional(),
    title: z.string().optional(),
  }).optional(),
  birthday: z.string().optional(),
  urls: z.array(urlSchema),
  notes: z.string().optional(),
  groups: z.array(z.string()),
  photo: z.string().optional(),
  metadata: z.object({
    created: z.string(),
    modified: z.string(),
  }),
});

export const mergeLogSchema = z.array(z.object({
  timestamp: z.string(),
  primaryId: z.string(),
  secondaryIds: z.array(z.string()),
}));

export type MergeLogEntry = z.infer<typeof mergeLogSchema>[number];
