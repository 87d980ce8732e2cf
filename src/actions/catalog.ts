import { ARCHIVE_GROUP_NAME } from '../types/index.js';

export const PHONE_FOLLOW_UP_GROUP_NAME = 'Needs Phone Follow-Up';
export const EMAIL_FOLLOW_UP_GROUP_NAME = 'Needs Email Follow-Up';
export const GENERAL_FOLLOW_UP_GROUP_NAME = 'Needs Contact Cleanup';
export const REVIEWED_GROUP_NAME = 'Reviewed Health Issues';
export { ARCHIVE_GROUP_NAME };

export type CleanupAction =
  | { type: 'addPhone' }
  | { type: 'addEmail' }
  | { type: 'addToGroup'; groupName: string }
  | { type: 'archive' }
  | { type: 'updateName' };

export function requiresInput(action: CleanupAction): boolean {
  switch (action.type) {
    case 'addPhone':
    case 'addEmail':
    case 'updateName':
      return true;
    case 'addToGroup':
    case 'archive':
      return false;
  }
}

export function actionTitle(action: CleanupAction): string {
  switch (action.type) {
    case 'addPhone': return 'Add Phone Number';
    case 'addEmail': return 'Add Email Address';
    case 'addToGroup': return `Add to ${action.groupName}`;
    case 'archive': return 'Archive Contact';
    case 'updateName': return 'Update Name';
  }
}

export const markReviewedAction: CleanupAction = { type: 'addToGroup', groupName: REVIEWED_GROUP_NAME };
