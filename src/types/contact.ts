export type PhoneLabel = 'home' | 'work' | 'mobile' | 'fax' | 'other';
export type EmailLabel = 'home' | 'work' | 'other';

export interface ContactEmail {
  value: string;
  type?: EmailLabel;
}

export interface ContactPhone {
  value: string;
  originalValue?: string;
  type?: PhoneLabel;
}

export interface ContactAddress {
  street?: string;
  city?: string;
  state?: string;
  postalCode?: string;
  country?: string;
  type?: 'home' | 'work' | 'other';
}

export interface ContactOrganization {
  name?: string;
  department?: string;
  title?: string;
}

export interface ContactName {
  prefix?: string;
  givenName?: string;
  middleName?: string;
  familyName?: string;
  suffix?: string;
}

export interface ContactUrl {
  value: string;
  type?: 'home' | 'work' | 'blog' | 'profile' | 'other';
}

export interface ContactMetadata {
  created: string;
  modified: string;
}

/** A contact as the store keeps it. */
export interface Contact {
  id: string;
  fullName: string;
  name: ContactName;
  emails: ContactEmail[];
  phones: ContactPhone[];
  addresses: ContactAddress[];
  organization?: ContactOrganization;
  birthday?: string;
  urls: ContactUrl[];
  notes?: string;
  groups: string[];
  photo?: string;
  metadata: ContactMetadata;
}

/**
 * Read-only snapshot of the fields duplicate detection and merge review look at.
 * Taken once per analysis; changes always go back through the store.
 */
export interface ContactRecord {
  readonly id: string;
  readonly fullName: string;
  readonly organization?: string;
  readonly phoneNumbers: readonly string[];
  readonly emailAddresses: readonly string[];
  readonly hasPhoto: boolean;
  readonly createdAt?: string;
  readonly modifiedAt?: string;
}

export interface ContactSummary {
  id: string;
  fullName: string;
  primaryEmail?: string;
  primaryPhone?: string;
  organization?: string;
  groups: string[];
  archived: boolean;
}

export const ARCHIVE_GROUP_NAME = 'Archive - Needs Info';

export function isArchived(contact: Contact): boolean {
  return contact.groups.includes(ARCHIVE_GROUP_NAME);
}

export function toSummary(contact: Contact): ContactSummary {
  return {
    id: contact.id,
    fullName: contact.fullName,
    primaryEmail: contact.emails[0]?.value,
    primaryPhone: contact.phones[0]?.value,
    organization: contact.organization?.name,
    groups: [...contact.groups],
    archived: isArchived(contact),
  };
}

export function toRecord(contact: Contact): ContactRecord {
  const organization = contact.organization?.name?.trim();
  return {
    id: contact.id,
    fullName: contact.fullName,
    organization: organization ? organization : undefined,
    phoneNumbers: contact.phones.map(p => p.value),
    emailAddresses: contact.emails.map(e => e.value),
    hasPhoto: !!contact.photo,
    createdAt: contact.metadata.created || undefined,
    modifiedAt: contact.metadata.modified || undefined,
  };
}
