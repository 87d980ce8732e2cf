import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ContactOrganizer } from '../src/organizer.js';
import type { GitContactStore } from '../src/store/git-store.js';
import { FakeGateway, createTestStore, makeContact } from './helpers.js';

function seeded(): FakeGateway {
  return new FakeGateway([
    makeContact('a', { fullName: 'Jon Smith', phones: [{ value: '+15550000002' }] }),
    makeContact('b', {
      fullName: 'John Smith',
      phones: [{ value: '+15550000001' }, { value: '+15550000002' }],
      emails: [{ value: 'john@example.com' }],
      organization: { name: 'Acme' },
    }),
    makeContact('c', { fullName: 'Mary Jones', emails: [{ value: 'mary@example.com' }] }),
  ]);
}

describe('ContactOrganizer', () => {
  describe('analyze', () => {
    it('should detect groups and cache them by id', async () => {
      const organizer = new ContactOrganizer(seeded());
      const result = await organizer.analyze();

      expect(result?.totalContacts).toBe(3);
      expect(result?.groups).toHaveLength(1);
      const [group] = result?.groups ?? [];
      expect(group.matchType).toBe('multipleMatches');
      expect(organizer.getGroup(group.id)).toBe(group);
    });

    it('should fold a request made during an analysis into one re-run', async () => {
      const gateway = seeded();
      let loads = 0;
      const records = gateway.records.bind(gateway);
      gateway.records = async (includeArchived?: boolean) => {
        loads++;
        return records(includeArchived);
      };
      const organizer = new ContactOrganizer(gateway);

      const first = organizer.analyze();
      const second = organizer.analyze();
      const third = organizer.analyze();

      expect(await second).toBeUndefined();
      expect(await third).toBeUndefined();
      await first;
      expect(loads).toBe(2);
    });

    it('should refresh on change only when auto-refresh is on and an analysis exists', async () => {
      const off = new ContactOrganizer(seeded(), { autoRefresh: false });
      expect(await off.notifyChanged()).toBeUndefined();
      const initial = await off.analyze();
      expect(await off.notifyChanged()).toBe(initial);

      const gateway = seeded();
      const on = new ContactOrganizer(gateway);
      expect(await on.notifyChanged()).toBeUndefined();
      await on.analyze();
      gateway.contacts.delete('a');
      expect((await on.notifyChanged())?.groups).toEqual([]);
    });

    it('should apply detection options', async () => {
      const organizer = new ContactOrganizer(seeded(), { detection: { limit: 0 } });
      expect((await organizer.analyze())?.groups).toEqual([]);
    });
  });

  describe('planMerge', () => {
    it('should reject an unknown group', () => {
      const organizer = new ContactOrganizer(seeded());
      expect(() => organizer.planMerge('dup-unknown')).toThrow('Duplicate group not found: dup-unknown');
    });

    it('should return the initial plan and value options', async () => {
      const organizer = new ContactOrganizer(seeded());
      const [group] = (await organizer.analyze())?.groups ?? [];

      const review = organizer.planMerge(group.id);
      expect(review.plan.preferredNameContactId).toBe('b');
      expect(review.phoneNumbers.map(o => [o.value, o.owners.map(r => r.id)])).toEqual([
        ['+15550000001', ['b']],
        ['+15550000002', ['a', 'b']],
      ]);
      expect(review.emailAddresses.map(o => o.value)).toEqual(['john@example.com']);
    });
  });

  describe('mergeGroup', () => {
    it('should merge into the primary, drop the group and support undo and redo', async () => {
      const gateway = seeded();
      const organizer = new ContactOrganizer(gateway);
      const [group] = (await organizer.analyze())?.groups ?? [];

      const outcome = await organizer.mergeGroup(group.id, { excludedPhoneNumbers: ['+15550000001'] });

      expect(outcome.contact.id).toBe('b');
      expect(outcome.deletedContactIds).toEqual(['a']);
      expect(outcome.description).toBe('Merge 2 contacts into John Smith');
      expect(gateway.contacts.has('a')).toBe(false);
      expect(gateway.contacts.get('b')?.phones.map(p => p.value)).toEqual(['+15550000002']);
      expect(() => organizer.getGroup(group.id)).toThrow('Duplicate group not found');
      expect(organizer.lastAnalysis?.groups).toEqual([]);

      expect(await organizer.undo()).toEqual({ status: 'completed', description: outcome.description });
      expect(gateway.contacts.get('a')?.fullName).toBe('Jon Smith');
      expect(gateway.contacts.get('b')?.phones.map(p => p.value)).toEqual(['+15550000001', '+15550000002']);

      expect((await organizer.redo()).status).toBe('completed');
      expect(gateway.contacts.has('a')).toBe(false);
      expect(gateway.calls).toEqual(['applyMerge:b', 'restore:a,b', 'applyMerge:b']);
    });

    it('should honour an explicit primary and name source', async () => {
      const gateway = seeded();
      const organizer = new ContactOrganizer(gateway);
      const [group] = (await organizer.analyze())?.groups ?? [];

      const outcome = await organizer.mergeGroup(group.id, { primaryContactId: 'a', preferredNameContactId: 'a' });

      expect(outcome.contact.id).toBe('a');
      expect(outcome.contact.fullName).toBe('Jon Smith');
      expect(outcome.contact.organization?.name).toBe('Acme');
      expect(outcome.deletedContactIds).toEqual(['b']);
    });

    it('should reject choices outside the group', async () => {
      const organizer = new ContactOrganizer(seeded());
      const [group] = (await organizer.analyze())?.groups ?? [];

      await expect(organizer.mergeGroup(group.id, { preferredPhotoContactId: 'c' }))
        .rejects.toThrow(`Photo contact c is not a member of group ${group.id}`);
      await expect(organizer.mergeGroup(group.id, { primaryContactId: 'c' }))
        .rejects.toThrow(`Primary contact c is not a member of group ${group.id}`);
    });
  });

  describe('performAction', () => {
    it('should make a successful action undoable', async () => {
      const gateway = seeded();
      const organizer = new ContactOrganizer(gateway);

      const result = await organizer.performAction({ type: 'addEmail' }, 'a', ' jon@example.com ');
      expect(result.success).toBe(true);
      expect(gateway.contacts.get('a')?.emails).toEqual([{ value: 'jon@example.com', type: 'work' }]);
      expect(await organizer.history()).toEqual({ undo: ['Add Email Address'], redo: [] });

      await organizer.undo();
      expect(gateway.contacts.get('a')?.emails).toEqual([]);
      expect(await organizer.history()).toEqual({ undo: [], redo: ['Add Email Address'] });
    });

    it('should restore the old name when a rename is undone', async () => {
      const gateway = seeded();
      const organizer = new ContactOrganizer(gateway);

      await organizer.performAction({ type: 'updateName' }, 'c', 'Mary Jones-Park');
      expect(gateway.contacts.get('c')?.fullName).toBe('Mary Jones-Park');

      await organizer.undo();
      expect(gateway.contacts.get('c')?.fullName).toBe('Mary Jones');
    });

    it('should record nothing when the action fails', async () => {
      const gateway = seeded();
      gateway.failing = true;
      const organizer = new ContactOrganizer(gateway);

      expect(await organizer.performAction({ type: 'archive' }, 'a')).toEqual({ success: false });
      expect(organizer.undoManager.canUndo).toBe(false);
    });

    it('should record nothing when the contact already has the value', async () => {
      const gateway = seeded();
      const organizer = new ContactOrganizer(gateway);

      expect(await organizer.performAction({ type: 'addPhone' }, 'a', '+15550000002')).toEqual({ success: true });
      expect(organizer.undoManager.canUndo).toBe(false);
      expect((await organizer.undo()).status).toBe('noop');
      expect(gateway.contacts.get('a')?.phones.map(p => p.value)).toEqual(['+15550000002']);
    });

    it('should keep a failed undo for retry', async () => {
      const gateway = seeded();
      const organizer = new ContactOrganizer(gateway);
      await organizer.performAction({ type: 'archive' }, 'a');

      gateway.failing = true;
      expect((await organizer.undo()).status).toBe('failed');
      gateway.failing = false;
      expect((await organizer.undo()).status).toBe('completed');
      expect(gateway.contacts.get('a')?.groups).toEqual([]);
    });
  });
});

describe('ContactOrganizer with the git store', () => {
  let store: GitContactStore;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ store, cleanup } = await createTestStore());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should not undo away a phone or group the contact already had', async () => {
    const contact = await store.create({
      fullName: 'Dana Reyes',
      phones: [{ value: '+15551234567', type: 'home' }],
      groups: ['Family'],
    });
    const organizer = new ContactOrganizer(store);

    expect(await organizer.performAction({ type: 'addPhone' }, contact.id, '555-123-4567')).toEqual({ success: true });
    expect(await organizer.performAction({ type: 'addToGroup', groupName: 'Family' }, contact.id))
      .toEqual({ success: true });

    expect((await organizer.undo()).status).toBe('noop');
    expect((await organizer.undo()).status).toBe('noop');

    const stored = await store.get(contact.id);
    expect(stored.phones.map(p => p.value)).toEqual(['+15551234567']);
    expect(stored.groups).toEqual(['Family']);
  });

  it('should undo a rename of a nameless contact and reach older entries', async () => {
    const contact = await store.create({ fullName: 'Placeholder' });
    expect(await store.updateFullName(contact.id, '')).toBe('changed');
    const organizer = new ContactOrganizer(store);

    await organizer.performAction({ type: 'addEmail' }, contact.id, 'dana@example.com');
    await organizer.performAction({ type: 'updateName' }, contact.id, 'Real Name');
    expect((await store.get(contact.id)).fullName).toBe('Real Name');

    expect(await organizer.undo()).toEqual({ status: 'completed', description: 'Update Name' });
    expect((await store.get(contact.id)).fullName).toBe('');

    expect(await organizer.undo()).toEqual({ status: 'completed', description: 'Add Email Address' });
    expect((await store.get(contact.id)).emails).toEqual([]);
    expect(await organizer.history()).toEqual({ undo: [], redo: ['Add Email Address', 'Update Name'] });
  });
});
