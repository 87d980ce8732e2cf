import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { GitContactStore } from '../src/store/git-store.js';
import { createContact, parseName, type ContactFields } from '../src/contacts/model.js';
import { normalizeEmail, normalizePhone } from '../src/contacts/normalize.js';
import {
  ARCHIVE_GROUP_NAME,
  toRecord,
  type ChangeOutcome,
  type Contact,
  type ContactActionPerforming,
  type ContactGateway,
  type ContactRecord,
  type EmailLabel,
  type NameComponents,
  type PhoneLabel,
} from '../src/types/index.js';

/** Create a temp directory with an initialized GitContactStore for testing. */
export async function createTestStore(): Promise<{ store: GitContactStore; storePath: string; cleanup: () => Promise<void> }> {
  const storePath = await fs.mkdtemp(path.join(os.tmpdir(), 'contact-curator-test-'));
  const store = new GitContactStore(storePath);
  await store.init();
  return {
    store,
    storePath,
    cleanup: async () => {
      await fs.rm(storePath, { recursive: true, force: true });
    },
  };
}

/** Build an analysis snapshot with sensible empty defaults. */
export function makeRecord(id: string, fullName: string, overrides: Partial<ContactRecord> = {}): ContactRecord {
  return {
    id,
    fullName,
    phoneNumbers: [],
    emailAddresses: [],
    hasPhoto: false,
    ...overrides,
  };
}

/** Build a stored contact with a fixed id and creation date. */
export function makeContact(id: string, fields: ContactFields): Contact {
  return createContact({
    metadata: { created: '2024-01-01T00:00:00.000Z', modified: '2024-01-01T00:00:00.000Z' },
    ...fields,
    id,
  });
}

/**
 * In-memory gateway for orchestration tests. Follows the store's capability
 * contract (`changed`, `unchanged` or `failed`) and records every capability
 * call in `calls`.
 */
export class FakeGateway implements ContactGateway {
  readonly contacts = new Map<string, Contact>();
  readonly calls: string[] = [];
  /** Capability calls report `failed` while this is set. */
  failing = false;

  constructor(contacts: Contact[] = []) {
    for (const contact of contacts) this.contacts.set(contact.id, structuredClone(contact));
  }

  async get(id: string): Promise<Contact> {
    const contact = this.contacts.get(id);
    if (!contact) throw new Error(`Contact not found: ${id}`);
    return structuredClone(contact);
  }

  async list(includeArchived: boolean = false): Promise<Contact[]> {
    return [...this.contacts.values()]
      .filter(c => includeArchived || !c.groups.includes(ARCHIVE_GROUP_NAME))
      .map(c => structuredClone(c));
  }

  async records(includeArchived: boolean = false): Promise<ContactRecord[]> {
    return (await this.list(includeArchived)).map(toRecord);
  }

  async applyMerge(merged: Contact, deletedContactIds: string[]): Promise<void> {
    this.calls.push(`applyMerge:${merged.id}`);
    for (const id of deletedContactIds) this.contacts.delete(id);
    this.contacts.set(merged.id, structuredClone(merged));
  }

  async restore(contacts: Contact[], removeIds: string[]): Promise<void> {
    this.calls.push(`restore:${contacts.map(c => c.id).join(',')}`);
    for (const id of removeIds) this.contacts.delete(id);
    for (const contact of contacts) this.contacts.set(contact.id, structuredClone(contact));
  }

  async addPhoneNumber(value: string, label: PhoneLabel, contactId: string): Promise<ChangeOutcome> {
    return this.change(`addPhone:${value}`, contactId, c => {
      if (c.phones.some(p => normalizePhone(p.value) === normalizePhone(value))) return false;
      c.phones.push({ value, type: label });
      return true;
    });
  }

  async removePhoneNumber(value: string, contactId: string): Promise<ChangeOutcome> {
    return this.change(`removePhone:${value}`, contactId, c => {
      const remaining = c.phones.filter(p => normalizePhone(p.value) !== normalizePhone(value));
      if (remaining.length === c.phones.length) return false;
      c.phones = remaining;
      return true;
    });
  }

  async addEmailAddress(value: string, label: EmailLabel, contactId: string): Promise<ChangeOutcome> {
    return this.change(`addEmail:${value}`, contactId, c => {
      if (c.emails.some(e => normalizeEmail(e.value) === normalizeEmail(value))) return false;
      c.emails.push({ value, type: label });
      return true;
    });
  }

  async removeEmailAddress(value: string, contactId: string): Promise<ChangeOutcome> {
    return this.change(`removeEmail:${value}`, contactId, c => {
      const remaining = c.emails.filter(e => normalizeEmail(e.value) !== normalizeEmail(value));
      if (remaining.length === c.emails.length) return false;
      c.emails = remaining;
      return true;
    });
  }

  async addContact(contactId: string, groupName: string): Promise<ChangeOutcome> {
    return this.change(`addToGroup:${groupName}`, contactId, c => {
      if (c.groups.includes(groupName)) return false;
      c.groups.push(groupName);
      return true;
    });
  }

  async removeContact(contactId: string, groupName: string): Promise<ChangeOutcome> {
    return this.change(`removeFromGroup:${groupName}`, contactId, c => {
      if (!c.groups.includes(groupName)) return false;
      c.groups = c.groups.filter(g => g !== groupName);
      return true;
    });
  }

  async archiveContact(contactId: string): Promise<ChangeOutcome> {
    return this.addContact(contactId, ARCHIVE_GROUP_NAME);
  }

  async updateFullName(contactId: string, fullName: string): Promise<ChangeOutcome> {
    const trimmed = fullName.trim();
    return this.change(`rename:${trimmed}`, contactId, c => {
      if (c.fullName === trimmed) return false;
      c.fullName = trimmed;
      c.name = parseName(trimmed);
      return true;
    });
  }

  async fetchNameComponents(contactId: string): Promise<NameComponents | null> {
    const contact = this.contacts.get(contactId);
    if (!contact) return null;
    return { given: contact.name.givenName ?? '', family: contact.name.familyName ?? '' };
  }

  /** `apply` returns false when the contact is already in the requested state. */
  private change(call: string, contactId: string, apply: (contact: Contact) => boolean): ChangeOutcome {
    this.calls.push(call);
    const contact = this.contacts.get(contactId);
    if (this.failing || !contact) return 'failed';
    return apply(contact) ? 'changed' : 'unchanged';
  }
}

export interface RecordedCall {
  method: keyof ContactActionPerforming;
  contactId: string;
  value?: string;
  label?: string;
}

/** Performer that only records calls; every call resolves to `result`. */
export class RecordingPerformer implements ContactActionPerforming {
  readonly calls: RecordedCall[] = [];
  readonly nameLookup = new Map<string, NameComponents>();
  result: ChangeOutcome = 'changed';

  callsTo(method: keyof ContactActionPerforming): RecordedCall[] {
    return this.calls.filter(c => c.method === method);
  }

  async addPhoneNumber(value: string, label: PhoneLabel, contactId: string): Promise<ChangeOutcome> {
    return this.record({ method: 'addPhoneNumber', contactId, value, label });
  }

  async removePhoneNumber(value: string, contactId: string): Promise<ChangeOutcome> {
    return this.record({ method: 'removePhoneNumber', contactId, value });
  }

  async addEmailAddress(value: string, label: EmailLabel, contactId: string): Promise<ChangeOutcome> {
    return this.record({ method: 'addEmailAddress', contactId, value, label });
  }

  async removeEmailAddress(value: string, contactId: string): Promise<ChangeOutcome> {
    return this.record({ method: 'removeEmailAddress', contactId, value });
  }

  async addContact(contactId: string, groupName: string): Promise<ChangeOutcome> {
    return this.record({ method: 'addContact', contactId, value: groupName });
  }

  async removeContact(contactId: string, groupName: string): Promise<ChangeOutcome> {
    return this.record({ method: 'removeContact', contactId, value: groupName });
  }

  async archiveContact(contactId: string): Promise<ChangeOutcome> {
    return this.record({ method: 'archiveContact', contactId });
  }

  async updateFullName(contactId: string, fullName: string): Promise<ChangeOutcome> {
    return this.record({ method: 'updateFullName', contactId, value: fullName });
  }

  async fetchNameComponents(contactId: string): Promise<NameComponents | null> {
    this.calls.push({ method: 'fetchNameComponents', contactId });
    return this.nameLookup.get(contactId) ?? null;
  }

  private record(call: RecordedCall): ChangeOutcome {
    this.calls.push(call);
    return this.result;
  }
}
