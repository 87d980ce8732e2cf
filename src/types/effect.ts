import type { EmailLabel, PhoneLabel } from './contact.js';

/** A reversible mutation that has already been applied to the store. */
export type Effect =
  | { kind: 'addedPhone'; contactId: string; value: string }
  | { kind: 'addedEmail'; contactId: string; value: string }
  | { kind: 'addedToGroup'; contactId: string; groupName: string }
  | { kind: 'archivedContact'; contactId: string }
  | {
    kind: 'updatedName';
    contactId: string;
    previousGiven: string;
    previousFamily: string;
    newValue: string;
  };

export interface NameComponents {
  given: string;
  family: string;
}

/**
 * Outcome of one capability call. `unchanged` means the contact was already
 * in the requested state and nothing was written.
 */
export type ChangeOutcome = 'changed' | 'unchanged' | 'failed';

/** The slice of the contact store that undo/redo and cleanup actions need. */
export interface ContactActionPerforming {
  addPhoneNumber(value: string, label: PhoneLabel, contactId: string): Promise<ChangeOutcome>;
  removePhoneNumber(value: string, contactId: string): Promise<ChangeOutcome>;
  addEmailAddress(value: string, label: EmailLabel, contactId: string): Promise<ChangeOutcome>;
  removeEmailAddress(value: string, contactId: string): Promise<ChangeOutcome>;
  addContact(contactId: string, groupName: string): Promise<ChangeOutcome>;
  removeContact(contactId: string, groupName: string): Promise<ChangeOutcome>;
  archiveContact(contactId: string): Promise<ChangeOutcome>;
  /** A blank name clears the contact's name. */
  updateFullName(contactId: string, fullName: string): Promise<ChangeOutcome>;
  fetchNameComponents(contactId: string): Promise<NameComponents | null>;
}
