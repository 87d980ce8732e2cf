export {
  UndoManager,
  type Transaction,
  type HistoryStepResult,
  type HistoryStepStatus,
  type UndoHistory,
} from './undo-manager.js';
export {
  effectOperations,
  describeEffect,
  previousFullName,
  ADDED_EMAIL_LABEL,
  ADDED_PHONE_LABEL,
  type EffectOperations,
  type UndoOperation,
} from './effects.js';
