export { ActionExecutor, type ActionResult } from './executor.js';
export {
  actionTitle,
  requiresInput,
  markReviewedAction,
  ARCHIVE_GROUP_NAME,
  EMAIL_FOLLOW_UP_GROUP_NAME,
  GENERAL_FOLLOW_UP_GROUP_NAME,
  PHONE_FOLLOW_UP_GROUP_NAME,
  REVIEWED_GROUP_NAME,
  type CleanupAction,
} from './catalog.js';
