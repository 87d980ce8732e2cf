import { parsePhoneNumberFromString, type CountryCode } from 'libphonenumber-js';
import type { Contact } from '../types/index.js';

export const DEFAULT_COUNTRY: CountryCode = 'US';

/** Normalize a phone number to E.164 format. Returns the stripped input if parsing fails. */
export function normalizePhone(raw: string, defaultCountry: CountryCode = DEFAULT_COUNTRY): string {
  const parsed = parsePhoneNumberFromString(raw, defaultCountry);
  if (parsed && (parsed.isValid() || parsed.isPossible())) {
    return parsed.format('E.164');
  }
  const stripped = raw.replace(/[\s\-().]/g, '');
  return stripped || raw;
}

/** Digits-only key used to index phones, so "+1 (555) 123-4567" and "5551234567" collide. */
export function phoneKey(raw: string, defaultCountry: CountryCode = DEFAULT_COUNTRY): string {
  return normalizePhone(raw, defaultCountry).replace(/\D/g, '');
}

/** Normalize an email address (lowercase, trim). */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/** Lowercase, trim and collapse inner whitespace. */
export function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** Normalize all phone numbers and emails on a contact in-place and return it. */
export function normalizeContact(contact: Contact, defaultCountry: CountryCode = DEFAULT_COUNTRY): Contact {
  for (const email of contact.emails) {
    email.value = normalizeEmail(email.value);
  }

  for (const phone of contact.phones) {
    const normalized = normalizePhone(phone.value, defaultCountry);
    if (normalized !== phone.value) {
      phone.originalValue = phone.originalValue ?? phone.value;
      phone.value = normalized;
    }
  }

  contact.fullName = contact.fullName.trim();
  if (contact.name.givenName) contact.name.givenName = contact.name.givenName.trim();
  if (contact.name.familyName) contact.name.familyName = contact.name.familyName.trim();
  if (contact.name.middleName) contact.name.middleName = contact.name.middleName.trim();

  contact.groups = [...new Set(contact.groups.map(g => g.trim()).filter(Boolean))];

  return contact;
}
