import type { Contact, ContactRecord } from './contact.js';
import type { ContactActionPerforming } from './effect.js';

export interface CommitInfo {
  hash: string;
  message: string;
  date: string;
  author: string;
}

export interface HistoryEntry {
  commit: CommitInfo;
  contactId?: string;
  operation: 'create' | 'update' | 'delete' | 'merge' | 'restore' | 'group';
  summary: string;
}

/** What the organizer needs from a contact store beyond the undoable actions. */
export interface ContactGateway extends ContactActionPerforming {
  get(id: string): Promise<Contact>;
  list(includeArchived?: boolean): Promise<Contact[]>;
  records(includeArchived?: boolean): Promise<ContactRecord[]>;
  applyMerge(merged: Contact, deletedContactIds: string[]): Promise<void>;
  restore(contacts: Contact[], removeIds: string[]): Promise<void>;
}
