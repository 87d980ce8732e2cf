import type {
  ContactRecord,
  DuplicateGroup,
  MergeConfiguration,
  MergePlan,
  MergeValueOption,
} from '../types/index.js';
import { MergeError } from '../utils/index.js';
import { primaryContact } from './dedup.js';

/**
 * Starting point for a merge review: name and organization from the primary
 * contact, no photo preference, and every phone and email of every member.
 */
export function initialMergePlan(group: DuplicateGroup): MergePlan {
  const primary = primaryContact(group);
  return {
    groupId: group.id,
    preferredNameContactId: primary.id,
    preferredOrganizationContactId: primary.id,
    preferredPhotoContactId: undefined,
    selectedPhoneNumbers: new Set(group.contacts.flatMap(c => c.phoneNumbers)),
    selectedEmailAddresses: new Set(group.contacts.flatMap(c => c.emailAddresses)),
  };
}

export function setPhoneNumberSelected(plan: MergePlan, value: string, selected: boolean): void {
  if (selected) {
    plan.selectedPhoneNumbers.add(value);
  } else {
    plan.selectedPhoneNumbers.delete(value);
  }
}

export function setEmailAddressSelected(plan: MergePlan, value: string, selected: boolean): void {
  if (selected) {
    plan.selectedEmailAddresses.add(value);
  } else {
    plan.selectedEmailAddresses.delete(value);
  }
}

/** Freeze a plan into the instruction the merge engine consumes. */
export function mergeConfiguration(
  plan: MergePlan,
  primaryContactId: string,
  group: DuplicateGroup,
): MergeConfiguration {
  const mergingContactIds = group.contacts.map(c => c.id);
  if (!mergingContactIds.includes(primaryContactId)) {
    throw new MergeError(`Primary contact ${primaryContactId} is not a member of group ${group.id}`);
  }

  return {
    primaryContactId,
    mergingContactIds,
    preferredNameSourceId: plan.preferredNameContactId,
    preferredOrganizationSourceId: plan.preferredOrganizationContactId,
    preferredPhotoSourceId: plan.preferredPhotoContactId,
    includedPhoneNumbers: new Set(plan.selectedPhoneNumbers),
    includedEmailAddresses: new Set(plan.selectedEmailAddresses),
  };
}

export function sourceContactIds(configuration: MergeConfiguration): string[] {
  return configuration.mergingContactIds.filter(id => id !== configuration.primaryContactId);
}

/** Each distinct value of a field with the records that carry it, for side-by-side review. */
export function uniqueValues(
  records: readonly ContactRecord[],
  field: 'phoneNumbers' | 'emailAddresses',
): MergeValueOption[] {
  const owners = new Map<string, ContactRecord[]>();
  for (const record of records) {
    for (const value of new Set(record[field])) {
      const list = owners.get(value) ?? [];
      list.push(record);
      owners.set(value, list);
    }
  }

  return [...owners.entries()]
    .map(([value, list]) => ({ value, owners: list }))
    .sort((a, b) => {
      if (a.value === '') return -1;
      if (b.value === '') return 1;
      return a.value.localeCompare(b.value, undefined, { sensitivity: 'base' });
    });
}
