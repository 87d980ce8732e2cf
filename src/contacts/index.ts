export { NO_NAME, createContact, displayName, parseName, type ContactFields } from './model.js';
export { normalizeContact, normalizeEmail, normalizeName, normalizePhone, phoneKey } from './normalize.js';
export { levenshtein, nameSimilarity } from './similarity.js';
export {
  contactIssues,
  searchContacts,
  type CleanupCandidate,
  type ContactIssue,
  type SearchOptions,
} from './search.js';
export { findDuplicates, primaryContact, analyzeDuplicates, type DedupOptions } from './dedup.js';
export {
  initialMergePlan,
  mergeConfiguration,
  setPhoneNumberSelected,
  setEmailAddressSelected,
  sourceContactIds,
  uniqueValues,
} from './merge-plan.js';
export { mergedContact } from './merge.js';
