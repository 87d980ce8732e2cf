import { describe, it, expect } from 'vitest';
import { analyzeDuplicates, findDuplicates, primaryContact } from '../../src/contacts/dedup.js';
import type { DuplicateGroup } from '../../src/types/index.js';
import { makeRecord } from '../helpers.js';

describe('findDuplicates', () => {
  it('should return nothing for fewer than two records', () => {
    expect(findDuplicates([])).toEqual([]);
    expect(findDuplicates([makeRecord('a', 'John Smith')])).toEqual([]);
  });

  it('should return nothing when no records share a name, phone or email', () => {
    expect(findDuplicates([
      makeRecord('a', 'Alice Archer', { phoneNumbers: ['+15550000001'], emailAddresses: ['alice@example.com'] }),
      makeRecord('b', 'Bob Baker', { phoneNumbers: ['+15550000002'], emailAddresses: ['bob@example.com'] }),
      makeRecord('c', 'Zed Young'),
    ])).toEqual([]);
  });

  it('should group exact name matches ignoring case and whitespace', () => {
    const groups = findDuplicates([
      makeRecord('a', 'John Smith'),
      makeRecord('b', '  john   SMITH '),
    ]);

    expect(groups).toHaveLength(1);
    expect(groups[0].matchType).toBe('exactName');
    expect(groups[0].confidence).toBe(1);
    expect(groups[0].contacts.map(c => c.id)).toEqual(['a', 'b']);
  });

  it('should match phones written in different formats', () => {
    const groups = findDuplicates([
      makeRecord('a', 'Alice Archer', { phoneNumbers: ['(555) 123-4567'] }),
      makeRecord('b', 'Bob Baker', { phoneNumbers: ['+1 555-123-4567'] }),
    ]);

    expect(groups).toHaveLength(1);
    expect(groups[0].matchType).toBe('samePhone');
    expect(groups[0].confidence).toBe(0.95);
  });

  it('should match emails case-insensitively', () => {
    const groups = findDuplicates([
      makeRecord('a', 'Carol Xu', { emailAddresses: ['CAROL@Example.com'] }),
      makeRecord('b', 'C. Xu', { emailAddresses: ['carol@example.com'] }),
    ]);

    expect(groups).toHaveLength(1);
    expect(groups[0].matchType).toBe('sameEmail');
    expect(groups[0].confidence).toBe(0.95);
  });

  it('should match similar names at the default threshold', () => {
    const groups = findDuplicates([
      makeRecord('a', 'Jon Smith'),
      makeRecord('b', 'John Smith'),
    ]);

    expect(groups).toHaveLength(1);
    expect(groups[0].matchType).toBe('similarName');
    expect(groups[0].confidence).toBe(0.9);
  });

  it('should accept a lower name similarity only when the organization matches', () => {
    const apart = findDuplicates([
      makeRecord('a', 'Jonathan Smyth'),
      makeRecord('b', 'Jonathon Smith'),
    ]);
    expect(apart).toEqual([]);

    const together = findDuplicates([
      makeRecord('a', 'Jonathan Smyth', { organization: 'Acme' }),
      makeRecord('b', 'Jonathon Smith', { organization: ' ACME ' }),
    ]);
    expect(together).toHaveLength(1);
    expect(together[0].matchType).toBe('similarName');
    expect(together[0].confidence).toBe(0.86);
  });

  it('should only compare names within the length window', () => {
    const records = [makeRecord('a', 'Ann Lee'), makeRecord('b', 'Annabelle Lee')];

    expect(findDuplicates(records, { similarNameThreshold: 0.5 })).toEqual([]);

    const widened = findDuplicates(records, { similarNameThreshold: 0.5, maxNameLengthDifference: 10 });
    expect(widened).toHaveLength(1);
    expect(widened[0].confidence).toBe(0.54);
  });

  it('should join overlapping matches into one group', () => {
    const groups = findDuplicates([
      makeRecord('a', 'Dana Scully', { phoneNumbers: ['555-010-0001'] }),
      makeRecord('b', 'D. Scully', { phoneNumbers: ['(555) 010-0001'], emailAddresses: ['ds@example.com'] }),
      makeRecord('c', 'Agent Scully', { emailAddresses: ['DS@example.com'] }),
    ]);

    expect(groups).toHaveLength(1);
    expect(groups[0].contacts.map(c => c.id)).toEqual(['a', 'b', 'c']);
    expect(groups[0].matchType).toBe('multipleMatches');
    expect(groups[0].confidence).toBe(0.95);
  });

  it('should report multipleMatches with the highest confidence when signals overlap on one pair', () => {
    const groups = findDuplicates([
      makeRecord('a', 'John Smith', { phoneNumbers: ['+15551234567'] }),
      makeRecord('b', 'John Smith', { phoneNumbers: ['555-123-4567'] }),
    ]);

    expect(groups[0].matchType).toBe('multipleMatches');
    expect(groups[0].confidence).toBe(1);
  });

  it('should sort groups by confidence, then by first appearance', () => {
    const groups = findDuplicates([
      makeRecord('p1', 'Alice Archer', { phoneNumbers: ['+15550000001'] }),
      makeRecord('p2', 'Bob Baker', { phoneNumbers: ['+15550000001'] }),
      makeRecord('n1', 'Zed Zimmer'),
      makeRecord('n2', 'zed zimmer'),
      makeRecord('e1', 'Mia Moss', { emailAddresses: ['mia@example.com'] }),
      makeRecord('e2', 'Noor Nash', { emailAddresses: ['mia@example.com'] }),
    ]);

    expect(groups.map(g => g.contacts[0].id)).toEqual(['n1', 'p1', 'e1']);
  });

  it('should not group blank names', () => {
    expect(findDuplicates([makeRecord('a', ''), makeRecord('b', '   ')])).toEqual([]);
  });

  it('should give a group the same id regardless of member order', () => {
    const a = makeRecord('a', 'John Smith');
    const b = makeRecord('b', 'John Smith');

    const forward = findDuplicates([a, b]);
    const backward = findDuplicates([b, a]);

    expect(forward[0].id).toMatch(/^dup-[0-9a-f]{12}$/);
    expect(backward[0].id).toBe(forward[0].id);
  });

  it('should respect the limit option', () => {
    const groups = findDuplicates([
      makeRecord('a', 'John Smith'),
      makeRecord('b', 'John Smith'),
      makeRecord('c', 'Mary Jones'),
      makeRecord('d', 'Mary Jones'),
    ], { limit: 1 });

    expect(groups).toHaveLength(1);
    expect(groups[0].contacts[0].id).toBe('a');
  });
});

describe('primaryContact', () => {
  const group = (contacts: DuplicateGroup['contacts']): DuplicateGroup => ({
    id: 'g', contacts, matchType: 'exactName', confidence: 1,
  });

  it('should pick the member with the most phones, emails and organization', () => {
    const richer = makeRecord('b', 'John Smith', { phoneNumbers: ['+15550000001'], organization: 'Acme' });
    expect(primaryContact(group([makeRecord('a', 'John Smith'), richer])).id).toBe('b');
  });

  it('should keep the earlier member on a tie', () => {
    const first = makeRecord('a', 'John Smith', { emailAddresses: ['a@example.com'] });
    const second = makeRecord('b', 'John Smith', { phoneNumbers: ['+15550000001'] });
    expect(primaryContact(group([first, second])).id).toBe('a');
  });
});

describe('analyzeDuplicates', () => {
  it('should count groups by confidence band and match type', () => {
    const groups: DuplicateGroup[] = [
      { id: '1', contacts: [makeRecord('a', 'A'), makeRecord('b', 'A')], matchType: 'exactName', confidence: 1 },
      { id: '2', contacts: [makeRecord('c', 'C'), makeRecord('d', 'D'), makeRecord('e', 'E')], matchType: 'similarName', confidence: 0.9 },
      { id: '3', contacts: [makeRecord('f', 'F'), makeRecord('g', 'G')], matchType: 'similarName', confidence: 0.6 },
    ];

    expect(analyzeDuplicates(groups)).toEqual({
      totalGroups: 3,
      totalDuplicateContacts: 7,
      highConfidenceGroups: 1,
      mediumConfidenceGroups: 1,
      lowConfidenceGroups: 1,
      matchTypeCounts: {
        exactName: 1,
        similarName: 2,
        samePhone: 0,
        sameEmail: 0,
        multipleMatches: 0,
      },
    });
  });
});
