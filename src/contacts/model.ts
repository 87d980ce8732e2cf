import type { Contact, ContactName } from '../types/index.js';
import { generateId } from '../utils/index.js';

export type ContactFields = Partial<Contact> & { fullName: string };

/** Label for a contact that has nothing else to be called by. */
export const NO_NAME = 'No Name';

const PREFIXES = new Set(['mr', 'mrs', 'ms', 'miss', 'mx', 'dr', 'prof', 'rev', 'sir']);
const SUFFIXES = new Set(['jr', 'sr', 'ii', 'iii', 'iv', 'phd', 'md', 'esq']);

export function createContact(fields: ContactFields): Contact {
  const now = new Date().toISOString();
  const fullName = fields.fullName.trim();
  return {
    id: fields.id ?? generateId(),
    fullName,
    name: resolveName(fullName, fields.name),
    emails: fields.emails ?? [],
    phones: fields.phones ?? [],
    addresses: fields.addresses ?? [],
    organization: fields.organization,
    birthday: fields.birthday,
    urls: fields.urls ?? [],
    notes: fields.notes,
    groups: [...new Set(fields.groups ?? [])],
    photo: fields.photo,
    metadata: fields.metadata ?? {
      created: now,
      modified: now,
    },
  };
}

// Explicit given/family names win; otherwise derive them and keep any explicit honorific.
function resolveName(fullName: string, provided: ContactName | undefined): ContactName {
  if (provided?.givenName || provided?.familyName) return { ...provided };
  const name = parseName(fullName);
  if (provided?.prefix) name.prefix = provided.prefix;
  if (provided?.suffix) name.suffix = provided.suffix;
  return name;
}

/**
 * Split a full name into components. Recognizes a leading honorific, trailing
 * suffixes ("Jr.", "PhD") and the "Family, Given" order of address book exports.
 */
export function parseName(fullName: string): ContactName {
  const segments = fullName.split(',').map(s => s.trim()).filter(Boolean);
  const suffixes: string[] = [];
  while (segments.length > 1 && isSuffix(segments[segments.length - 1])) {
    suffixes.unshift(...segments.splice(-1));
  }
  if (segments.length === 0) return {};

  const familyFirst = segments.length > 1;
  const words = (familyFirst ? segments.slice(1) : segments).join(' ').split(/\s+/);
  const name: ContactName = {};

  if (words.length > 1 && isPrefix(words[0])) name.prefix = words.shift();
  while (words.length > 1 && isSuffix(words[words.length - 1])) {
    suffixes.unshift(...words.splice(-1));
  }
  if (suffixes.length > 0) name.suffix = suffixes.join(' ');
  if (familyFirst) words.push(segments[0]);

  name.givenName = words[0];
  if (words.length > 2) name.middleName = words.slice(1, -1).join(' ');
  if (words.length > 1) name.familyName = words[words.length - 1];
  return name;
}

/** The name to show in history and messages; nameless contacts fall back to other details. */
export function displayName(contact: Pick<Contact, 'fullName' | 'organization' | 'emails' | 'phones'>): string {
  return contact.fullName.trim()
    || contact.organization?.name?.trim()
    || contact.emails[0]?.value
    || contact.phones[0]?.value
    || NO_NAME;
}

function bare(word: string): string {
  return word.replace(/\./g, '').toLowerCase();
}

function isPrefix(word: string): boolean {
  return PREFIXES.has(bare(word));
}

function isSuffix(word: string): boolean {
  return SUFFIXES.has(bare(word));
}
