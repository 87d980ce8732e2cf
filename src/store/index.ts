export { GitContactStore, type GitContactStoreOptions } from './git-store.js';
export { GitOps } from './git-ops.js';
export { contactSchema, mergeLogSchema, type MergeLogEntry } from './contact-schema.js';
