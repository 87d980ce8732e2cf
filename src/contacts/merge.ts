import type {
  Contact,
  ContactAddress,
  ContactEmail,
  ContactPhone,
  MergeConfiguration,
  MergedRecord,
} from '../types/index.js';
import { sourceContactIds } from './merge-plan.js';

/**
 * Combine a destination contact and its duplicates according to a merge configuration.
 *
 * Pure: nothing is saved or deleted here. The merged contact keeps the
 * destination's id; `deletedContactIds` lists every other participant.
 */
export function mergedContact(
  configuration: MergeConfiguration,
  destination: Contact,
  sources: Contact[],
): MergedRecord {
  const all = [destination, ...sources];
  const byId = (id: string | undefined) => (id === undefined ? undefined : all.find(c => c.id === id));
  const merged = structuredClone(destination);

  // Name falls back to the destination when the preferred source is unknown or blank
  const nameSource = byId(configuration.preferredNameSourceId);
  if (nameSource && nameSource.fullName.trim()) {
    merged.fullName = nameSource.fullName;
    merged.name = { ...nameSource.name };
  }

  const organizationSource = byId(configuration.preferredOrganizationSourceId);
  if (organizationSource?.organization?.name) {
    merged.organization = { ...organizationSource.organization };
  }

  const photoSource = byId(configuration.preferredPhotoSourceId);
  if (photoSource?.photo) {
    merged.photo = photoSource.photo;
  }

  merged.phones = filterAllowed<ContactPhone>(all.flatMap(c => c.phones), configuration.includedPhoneNumbers);
  merged.emails = filterAllowed<ContactEmail>(all.flatMap(c => c.emails), configuration.includedEmailAddresses);

  for (const source of sources) {
    for (const address of source.addresses) {
      if (!merged.addresses.some(existing => sameAddress(existing, address))) {
        merged.addresses.push({ ...address });
      }
    }

    const urls = new Set(merged.urls.map(u => u.value));
    for (const url of source.urls) {
      if (!urls.has(url.value)) {
        merged.urls.push({ ...url });
        urls.add(url.value);
      }
    }

    for (const group of source.groups) {
      if (!merged.groups.includes(group)) merged.groups.push(group);
    }

    if (!merged.birthday && source.birthday) {
      merged.birthday = source.birthday;
    }

    if (source.notes && source.notes !== merged.notes && !merged.notes?.includes(source.notes)) {
      merged.notes = [merged.notes, source.notes].filter(Boolean).join('\n---\n');
    }

    if (source.metadata.created && source.metadata.created < merged.metadata.created) {
      merged.metadata.created = source.metadata.created;
    }
  }

  return {
    contact: merged,
    deletedContactIds: sourceContactIds(configuration),
  };
}

/** Keep entries whose literal value is allowed, first occurrence wins. */
function filterAllowed<T extends { value: string }>(entries: T[], allowed: ReadonlySet<string>): T[] {
  const seen = new Set<string>();
  const result: T[] = [];
  for (const entry of entries) {
    if (!allowed.has(entry.value) || seen.has(entry.value)) continue;
    seen.add(entry.value);
    result.push({ ...entry });
  }
  return result;
}

function sameAddress(a: ContactAddress, b: ContactAddress): boolean {
  return a.street === b.street && a.city === b.city && a.postalCode === b.postalCode;
}
