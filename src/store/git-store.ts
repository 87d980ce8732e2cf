import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { CountryCode } from 'libphonenumber-js';
import type { LogResult } from 'simple-git';
import type {
  ChangeOutcome,
  CommitInfo,
  Contact,
  ContactGateway,
  ContactRecord,
  ContactSummary,
  EmailLabel,
  HistoryEntry,
  NameComponents,
  PhoneLabel,
} from '../types/index.js';
import { ARCHIVE_GROUP_NAME, isArchived, toRecord, toSummary } from '../types/index.js';
import { createContact, displayName, parseName, type ContactFields } from '../contacts/model.js';
import { DEFAULT_COUNTRY, normalizeContact, normalizeEmail, normalizePhone } from '../contacts/normalize.js';
import {
  ContactNotFoundError,
  StoreError,
  errorMessage,
  isErrnoCode,
  logger,
} from '../utils/index.js';
import { GitOps } from './git-ops.js';
import { contactSchema, mergeLogSchema, type MergeLogEntry } from './contact-schema.js';
import { CONTACTS_DIR, contactPath, metadataPath, relativeContactPath } from './file-layout.js';

const LOCK_STALE_MS = 30_000;

export interface GitContactStoreOptions {
  defaultCountry?: CountryCode;
}

/**
 * Contact store kept as one JSON file per contact in a git repository.
 * Every write is a commit, so the history tool can show what changed and when.
 */
export class GitContactStore implements ContactGateway {
  private git: GitOps;
  private storePath: string;
  private lockFile: string;
  private defaultCountry: CountryCode;

  constructor(storePath: string, options: GitContactStoreOptions = {}) {
    this.storePath = storePath;
    this.git = new GitOps(storePath);
    this.lockFile = path.join(storePath, '.lock');
    this.defaultCountry = options.defaultCountry ?? DEFAULT_COUNTRY;
  }

  async init(): Promise<void> {
    await this.git.init();
  }

  // --- Locking ---

  private async acquireLock(): Promise<void> {
    try {
      await fs.writeFile(this.lockFile, process.pid.toString(), { flag: 'wx' });
    } catch (err) {
      if (!isErrnoCode(err, 'EEXIST')) throw err;

      const stat = await fs.stat(this.lockFile).catch(() => undefined);
      if (stat && Date.now() - stat.mtimeMs > LOCK_STALE_MS) {
        logger.warn('Removing stale store lock at', this.lockFile);
        await fs.rm(this.lockFile, { force: true });
        await fs.writeFile(this.lockFile, process.pid.toString(), { flag: 'wx' });
        return;
      }
      throw new StoreError('Store is locked by another operation');
    }
  }

  private async releaseLock(): Promise<void> {
    await fs.rm(this.lockFile, { force: true });
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquireLock();
    try {
      return await fn();
    } finally {
      await this.releaseLock();
    }
  }

  // --- Files ---

  private async readContact(id: string): Promise<Contact> {
    let raw: string;
    try {
      raw = await fs.readFile(contactPath(this.storePath, id), 'utf-8');
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) throw new ContactNotFoundError(id);
      throw err;
    }
    return this.parseContact(raw, id);
  }

  private parseContact(raw: string, source: string): Contact {
    const parsed = contactSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new StoreError(`Invalid contact file ${source}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async writeContact(contact: Contact): Promise<void> {
    const filePath = contactPath(this.storePath, contact.id);
    // git rm drops the directory once its last file is gone
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(contact, null, 2) + '\n', 'utf-8');
  }

  // --- CRUD ---

  async create(fields: ContactFields): Promise<Contact> {
    return this.withLock(async () => {
      const contact = normalizeContact(createContact(fields), this.defaultCountry);

      await this.writeContact(contact);
      await this.git.add(relativeContactPath(contact.id));
      await this.git.commit(`Create contact: ${displayName(contact)} (${contact.id})`);

      logger.info('Created contact:', contact.id, contact.fullName);
      return contact;
    });
  }

  async get(id: string): Promise<Contact> {
    return this.readContact(id);
  }

  async list(includeArchived: boolean = false): Promise<Contact[]> {
    const contactsDir = path.join(this.storePath, CONTACTS_DIR);
    let files: string[];
    try {
      files = await fs.readdir(contactsDir);
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return [];
      throw err;
    }

    const contacts: Contact[] = [];
    for (const file of files.sort()) {
      if (!file.endsWith('.json')) continue;
      const raw = await fs.readFile(path.join(contactsDir, file), 'utf-8');
      const contact = this.parseContact(raw, file);
      if (includeArchived || !isArchived(contact)) contacts.push(contact);
    }
    return contacts;
  }

  async listSummaries(includeArchived: boolean = false): Promise<ContactSummary[]> {
    const contacts = await this.list(includeArchived);
    return contacts.map(toSummary);
  }

  /** Snapshots for duplicate detection. */
  async records(includeArchived: boolean = false): Promise<ContactRecord[]> {
    const contacts = await this.list(includeArchived);
    return contacts.map(toRecord);
  }

  // --- Merge support ---

  /** Save the merged contact and delete the merged-away duplicates in one commit. */
  async applyMerge(merged: Contact, deletedContactIds: string[]): Promise<void> {
    return this.withLock(async () => {
      const contact = normalizeContact(structuredClone(merged), this.defaultCountry);
      contact.metadata.modified = new Date().toISOString();
      await this.writeContact(contact);
      await this.git.add(relativeContactPath(contact.id));

      for (const id of deletedContactIds) {
        if (id === contact.id) continue;
        try {
          await this.git.remove(relativeContactPath(id));
        } catch (err) {
          throw new StoreError(`Could not delete merged contact ${id}: ${errorMessage(err)}`);
        }
      }

      await this.git.commit(`Merge contacts: ${[contact.id, ...deletedContactIds].join(' + ')} -> ${displayName(contact)}`);
      await this.appendMergeLog({
        timestamp: new Date().toISOString(),
        primaryId: contact.id,
        secondaryIds: deletedContactIds,
      });

      logger.info('Merged contacts:', contact.id, '+', deletedContactIds.join(', '));
    });
  }

  /** Write contacts back exactly as given and delete `removeIds`; used to reverse a merge. */
  async restore(contacts: Contact[], removeIds: string[] = []): Promise<void> {
    return this.withLock(async () => {
      const paths: string[] = [];
      for (const contact of contacts) {
        await this.writeContact(contact);
        paths.push(relativeContactPath(contact.id));
      }
      await this.git.addMultiple(paths);

      for (const id of removeIds) {
        await this.git.remove(relativeContactPath(id));
      }

      await this.git.commit(`Restore contacts: ${contacts.map(c => c.id).join(', ')}`);
      logger.info('Restored contacts:', contacts.map(c => c.id).join(', '));
    });
  }

  private async appendMergeLog(entry: MergeLogEntry): Promise<void> {
    const logPath = metadataPath(this.storePath, 'merge-log.json');
    let log: MergeLogEntry[] = [];
    try {
      const parsed = mergeLogSchema.safeParse(JSON.parse(await fs.readFile(logPath, 'utf-8')));
      if (parsed.success) {
        log = parsed.data;
      } else {
        logger.warn('Merge log is malformed, starting a new one');
      }
    } catch (err) {
      if (!isErrnoCode(err, 'ENOENT')) throw err;
    }

    log.push(entry);
    await fs.writeFile(logPath, JSON.stringify(log, null, 2), 'utf-8');
  }

  // --- Undoable actions ---

  /**
   * Apply one change to one contact and commit it. `change` returns false when
   * the contact is already in the requested state; nothing is written then.
   * Failures are logged and reported as `failed`, never thrown.
   */
  private async modify(
    contactId: string,
    summary: string,
    change: (contact: Contact) => boolean,
  ): Promise<ChangeOutcome> {
    try {
      return await this.withLock(async (): Promise<ChangeOutcome> => {
        const contact = await this.readContact(contactId);
        if (!change(contact)) return 'unchanged';

        contact.metadata.modified = new Date().toISOString();
        await this.writeContact(normalizeContact(contact, this.defaultCountry));
        await this.git.add(relativeContactPath(contactId));
        await this.git.commit(`Update contact: ${displayName(contact)} (${contactId}) - ${summary}`);
        logger.info('Updated contact:', contactId, summary);
        return 'changed';
      });
    } catch (err) {
      logger.warn(`Could not ${summary} on ${contactId}:`, errorMessage(err));
      return 'failed';
    }
  }

  async addPhoneNumber(value: string, label: PhoneLabel, contactId: string): Promise<ChangeOutcome> {
    const normalized = normalizePhone(value, this.defaultCountry);
    return this.modify(contactId, `add phone ${value}`, contact => {
      if (contact.phones.some(p => normalizePhone(p.value, this.defaultCountry) === normalized)) return false;
      contact.phones.push({ value, type: label });
      return true;
    });
  }

  async removePhoneNumber(value: string, contactId: string): Promise<ChangeOutcome> {
    const normalized = normalizePhone(value, this.defaultCountry);
    return this.modify(contactId, `remove phone ${value}`, contact => {
      const remaining = contact.phones.filter(p => normalizePhone(p.value, this.defaultCountry) !== normalized);
      if (remaining.length === contact.phones.length) return false;
      contact.phones = remaining;
      return true;
    });
  }

  async addEmailAddress(value: string, label: EmailLabel, contactId: string): Promise<ChangeOutcome> {
    const normalized = normalizeEmail(value);
    return this.modify(contactId, `add email ${normalized}`, contact => {
      if (contact.emails.some(e => normalizeEmail(e.value) === normalized)) return false;
      contact.emails.push({ value: normalized, type: label });
      return true;
    });
  }

  async removeEmailAddress(value: string, contactId: string): Promise<ChangeOutcome> {
    const normalized = normalizeEmail(value);
    return this.modify(contactId, `remove email ${normalized}`, contact => {
      const remaining = contact.emails.filter(e => normalizeEmail(e.value) !== normalized);
      if (remaining.length === contact.emails.length) return false;
      contact.emails = remaining;
      return true;
    });
  }

  async addContact(contactId: string, groupName: string): Promise<ChangeOutcome> {
    return this.modify(contactId, `add to group ${groupName}`, contact => {
      if (contact.groups.includes(groupName)) return false;
      contact.groups.push(groupName);
      return true;
    });
  }

  async removeContact(contactId: string, groupName: string): Promise<ChangeOutcome> {
    return this.modify(contactId, `remove from group ${groupName}`, contact => {
      if (!contact.groups.includes(groupName)) return false;
      contact.groups = contact.groups.filter(g => g !== groupName);
      return true;
    });
  }

  async archiveContact(contactId: string): Promise<ChangeOutcome> {
    return this.addContact(contactId, ARCHIVE_GROUP_NAME);
  }

  async updateFullName(contactId: string, fullName: string): Promise<ChangeOutcome> {
    const trimmed = fullName.trim();
    const summary = trimmed ? `rename to ${trimmed}` : 'clear name';
    return this.modify(contactId, summary, contact => {
      if (contact.fullName === trimmed) return false;
      contact.fullName = trimmed;
      contact.name = parseName(trimmed);
      return true;
    });
  }

  async fetchNameComponents(contactId: string): Promise<NameComponents | null> {
    try {
      const contact = await this.readContact(contactId);
      const fallback = parseName(contact.fullName);
      return {
        given: contact.name.givenName ?? fallback.givenName ?? '',
        family: contact.name.familyName ?? fallback.familyName ?? '',
      };
    } catch (err) {
      logger.warn('Could not read name of', contactId, errorMessage(err));
      return null;
    }
  }

  // --- History ---

  async getHistory(limit: number = 20, contactId?: string): Promise<HistoryEntry[]> {
    const file = contactId ? relativeContactPath(contactId) : undefined;

    let logResult: LogResult;
    try {
      logResult = await this.git.log({ file, maxCount: limit });
    } catch (err) {
      logger.warn('Could not read store history:', errorMessage(err));
      return [];
    }

    return logResult.all.map(entry => {
      const commit: CommitInfo = {
        hash: entry.hash,
        message: entry.message,
        date: entry.date,
        author: entry.author_name,
      };

      return {
        commit,
        contactId: contactId ?? extractContactIdFromMessage(entry.message),
        operation: parseOperation(entry.message),
        summary: entry.message,
      };
    });
  }
}

// --- Helpers ---

function parseOperation(message: string): HistoryEntry['operation'] {
  const lower = message.toLowerCase();
  if (lower.startsWith('create')) return 'create';
  if (lower.startsWith('merge')) return 'merge';
  if (lower.startsWith('restore')) return 'restore';
  if (lower.includes(' - add to group') || lower.includes(' - remove from group')) return 'group';
  if (lower.startsWith('delete')) return 'delete';
  return 'update';
}

function extractContactIdFromMessage(message: string): string | undefined {
  const match = message.match(/\(([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})\)/);
  return match?.[1];
}
