import type { ChangeOutcome, ContactActionPerforming, Effect } from '../types/index.js';
import { ADDED_EMAIL_LABEL, ADDED_PHONE_LABEL } from '../undo/index.js';
import type { CleanupAction } from './catalog.js';

export interface ActionResult {
  success: boolean;
  /** Present only when the action changed the store. */
  effect?: Effect;
}

/** Runs a single cleanup action against the store and reports the effect to record for undo. */
export class ActionExecutor {
  constructor(private readonly performer: ContactActionPerforming) {}

  async execute(action: CleanupAction, contactId: string, input?: string): Promise<ActionResult> {
    switch (action.type) {
      case 'addPhone': {
        const value = sanitize(input);
        if (!value) return { success: false };
        const outcome = await this.performer.addPhoneNumber(value, ADDED_PHONE_LABEL, contactId);
        return toResult(outcome, { kind: 'addedPhone', contactId, value });
      }

      case 'addEmail': {
        const value = sanitize(input);
        if (!value) return { success: false };
        const outcome = await this.performer.addEmailAddress(value, ADDED_EMAIL_LABEL, contactId);
        return toResult(outcome, { kind: 'addedEmail', contactId, value });
      }

      case 'addToGroup': {
        const outcome = await this.performer.addContact(contactId, action.groupName);
        return toResult(outcome, { kind: 'addedToGroup', contactId, groupName: action.groupName });
      }

      case 'archive': {
        const outcome = await this.performer.archiveContact(contactId);
        return toResult(outcome, { kind: 'archivedContact', contactId });
      }

      case 'updateName': {
        const value = sanitize(input);
        if (!value) return { success: false };
        const previous = await this.performer.fetchNameComponents(contactId);
        if (!previous) return { success: false };
        const outcome = await this.performer.updateFullName(contactId, value);
        return toResult(outcome, {
          kind: 'updatedName',
          contactId,
          previousGiven: previous.given,
          previousFamily: previous.family,
          newValue: value,
        });
      }
    }
  }
}

// Only a write that actually happened is recorded for undo.
function toResult(outcome: ChangeOutcome, effect: Effect): ActionResult {
  switch (outcome) {
    case 'changed': return { success: true, effect };
    case 'unchanged': return { success: true };
    case 'failed': return { success: false };
  }
}

function sanitize(input: string | undefined): string | undefined {
  const trimmed = input?.trim();
  return trimmed ? trimmed : undefined;
}
