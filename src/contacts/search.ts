import Fuse, { type IFuseOptions } from 'fuse.js';
import type { Contact, ContactSummary } from '../types/index.js';
import { isArchived, toSummary } from '../types/index.js';

/** Gaps a cleanup action can fill. */
export type ContactIssue = 'missingName' | 'noContactInfo' | 'missingPhone' | 'missingEmail';

export interface CleanupCandidate extends ContactSummary {
  issues: ContactIssue[];
}

export interface SearchOptions {
  /** Fuzzy text; blank lists contacts with the most issues first. */
  query?: string;
  /** Keep only contacts that have this issue. */
  issue?: ContactIssue;
  /** Keep only members of this group. */
  group?: string;
  includeArchived?: boolean;
  limit?: number;
}

interface Entry {
  contact: Contact;
  issues: ContactIssue[];
}

const FUSE_OPTIONS: IFuseOptions<Entry> = {
  keys: [
    { name: 'contact.fullName', weight: 0.4 },
    { name: 'contact.emails.value', weight: 0.2 },
    { name: 'contact.phones.value', weight: 0.1 },
    { name: 'contact.phones.originalValue', weight: 0.1 },
    { name: 'contact.organization.name', weight: 0.1 },
    { name: 'contact.groups', weight: 0.1 },
  ],
  threshold: 0.4,
  ignoreLocation: true,
  minMatchCharLength: 2,
};

export function contactIssues(contact: Contact): ContactIssue[] {
  const issues: ContactIssue[] = [];
  if (!contact.fullName.trim()) issues.push('missingName');

  const hasPhone = contact.phones.length > 0;
  const hasEmail = contact.emails.length > 0;
  if (!hasPhone && !hasEmail) {
    issues.push('noContactInfo');
  } else if (!hasPhone) {
    issues.push('missingPhone');
  } else if (!hasEmail) {
    issues.push('missingEmail');
  }
  return issues;
}

/** Find contacts to review or clean up, filtered by issue, group and archive state. */
export function searchContacts(contacts: Contact[], options: SearchOptions = {}): CleanupCandidate[] {
  const { query = '', issue, group, includeArchived = false, limit = 20 } = options;

  const entries = contacts
    .filter(c => includeArchived || !isArchived(c))
    .filter(c => group === undefined || c.groups.includes(group))
    .map(contact => ({ contact, issues: contactIssues(contact) }))
    .filter(e => issue === undefined || e.issues.includes(issue));

  if (!query.trim()) {
    return entries
      .sort((a, b) => b.issues.length - a.issues.length || a.contact.fullName.localeCompare(b.contact.fullName))
      .slice(0, limit)
      .map(toCandidate);
  }

  const fuse = new Fuse(entries, FUSE_OPTIONS);
  return fuse.search(query, { limit }).map(r => toCandidate(r.item));
}

function toCandidate({ contact, issues }: Entry): CleanupCandidate {
  return { ...toSummary(contact), issues };
}
