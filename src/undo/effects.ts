import type { ChangeOutcome, ContactActionPerforming, Effect, EmailLabel, PhoneLabel } from '../types/index.js';
import { ARCHIVE_GROUP_NAME } from '../types/index.js';

export const ADDED_PHONE_LABEL: PhoneLabel = 'mobile';
export const ADDED_EMAIL_LABEL: EmailLabel = 'work';

/** Resolves to `true` when the step was applied; `false` or a rejection is a failure. */
export type UndoOperation = () => Promise<boolean> | boolean;

export interface EffectOperations {
  undo: UndoOperation;
  redo: UndoOperation;
}

/** Name to restore when undoing a rename: the previous components joined by one space. */
export function previousFullName(previousGiven: string, previousFamily: string): string {
  return [previousGiven.trim(), previousFamily.trim()].filter(Boolean).join(' ');
}

// A step that finds the contact already in the target state has still succeeded.
async function applied(outcome: Promise<ChangeOutcome>): Promise<boolean> {
  return (await outcome) !== 'failed';
}

/** Translate an effect into the store calls that reverse and re-apply it. */
export function effectOperations(effect: Effect, performer: ContactActionPerforming): EffectOperations {
  switch (effect.kind) {
    case 'addedPhone':
      return {
        undo: () => applied(performer.removePhoneNumber(effect.value, effect.contactId)),
        redo: () => applied(performer.addPhoneNumber(effect.value, ADDED_PHONE_LABEL, effect.contactId)),
      };
    case 'addedEmail':
      return {
        undo: () => applied(performer.removeEmailAddress(effect.value, effect.contactId)),
        redo: () => applied(performer.addEmailAddress(effect.value, ADDED_EMAIL_LABEL, effect.contactId)),
      };
    case 'addedToGroup':
      return {
        undo: () => applied(performer.removeContact(effect.contactId, effect.groupName)),
        redo: () => applied(performer.addContact(effect.contactId, effect.groupName)),
      };
    case 'archivedContact':
      return {
        undo: () => applied(performer.removeContact(effect.contactId, ARCHIVE_GROUP_NAME)),
        redo: () => applied(performer.archiveContact(effect.contactId)),
      };
    case 'updatedName':
      return {
        undo: () => applied(performer.updateFullName(
          effect.contactId,
          previousFullName(effect.previousGiven, effect.previousFamily),
        )),
        redo: () => applied(performer.updateFullName(effect.contactId, effect.newValue)),
      };
    default: {
      const unhandled: never = effect;
      throw new Error(`Unhandled effect: ${JSON.stringify(unhandled)}`);
    }
  }
}

export function describeEffect(effect: Effect): string {
  switch (effect.kind) {
    case 'addedPhone': return `Add phone ${effect.value}`;
    case 'addedEmail': return `Add email ${effect.value}`;
    case 'addedToGroup': return `Add to ${effect.groupName}`;
    case 'archivedContact': return 'Archive contact';
    case 'updatedName': return `Rename to ${effect.newValue}`;
  }
}
