import type { Contact, ContactRecord } from './contact.js';

/** Staging state for one merge review. Mutated while the user picks values, consumed once. */
export interface MergePlan {
  groupId: string;
  preferredNameContactId: string;
  preferredOrganizationContactId: string;
  preferredPhotoContactId?: string;
  selectedPhoneNumbers: Set<string>;
  selectedEmailAddresses: Set<string>;
}

export interface MergeConfiguration {
  readonly primaryContactId: string;
  /** Every member of the group, primary included. */
  readonly mergingContactIds: readonly string[];
  readonly preferredNameSourceId: string;
  readonly preferredOrganizationSourceId: string;
  readonly preferredPhotoSourceId?: string;
  readonly includedPhoneNumbers: ReadonlySet<string>;
  readonly includedEmailAddresses: ReadonlySet<string>;
}

export interface MergedRecord {
  contact: Contact;
  /** Ids the store should delete once the merged contact is saved. */
  deletedContactIds: string[];
}

export interface MergeValueOption {
  value: string;
  owners: ContactRecord[];
}
