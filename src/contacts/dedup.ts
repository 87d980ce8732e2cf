import type { CountryCode } from 'libphonenumber-js';
import type {
  ContactRecord,
  DuplicateAnalysis,
  DuplicateGroup,
  MatchSignal,
  MatchType,
} from '../types/index.js';
import { logger, stableId } from '../utils/index.js';
import { DEFAULT_COUNTRY, normalizeEmail, normalizeName, phoneKey } from './normalize.js';
import { normalizedSimilarity } from './similarity.js';

/** Confidence assigned to a pair found through an exact index match. */
export const SIGNAL_CONFIDENCE = {
  exactName: 1.0,
  samePhone: 0.95,
  sameEmail: 0.95,
} as const satisfies Record<Exclude<MatchSignal, 'similarName'>, number>;

export const DEFAULT_SIMILAR_NAME_THRESHOLD = 0.9;
export const DEFAULT_SHARED_ORGANIZATION_THRESHOLD = 0.85;
export const DEFAULT_MAX_NAME_LENGTH_DIFFERENCE = 3;
/** Names sharing this many leading characters are compared for similarity. */
const SIMILARITY_PREFIX_LENGTH = 2;

export interface DedupOptions {
  defaultCountry?: CountryCode;
  /** Similarity at or above which two names match on their own. */
  similarNameThreshold?: number;
  /** Similarity above which two names match when both records share an organization. */
  sharedOrganizationThreshold?: number;
  maxNameLengthDifference?: number;
  limit?: number;
}

interface Edge {
  a: number;
  b: number;
  signal: MatchSignal;
  confidence: number;
}

class UnionFind {
  private parent: number[];
  private rank: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
    this.rank = new Array<number>(size).fill(0);
  }

  find(x: number): number {
    let root = x;
    while (this.parent[root] !== root) root = this.parent[root];
    // Path compression
    while (this.parent[x] !== root) {
      const next = this.parent[x];
      this.parent[x] = root;
      x = next;
    }
    return root;
  }

  union(x: number, y: number): void {
    const rootX = this.find(x);
    const rootY = this.find(y);
    if (rootX === rootY) return;

    if (this.rank[rootX] < this.rank[rootY]) {
      this.parent[rootX] = rootY;
    } else if (this.rank[rootX] > this.rank[rootY]) {
      this.parent[rootY] = rootX;
    } else {
      this.parent[rootY] = rootX;
      this.rank[rootX]++;
    }
  }
}

/**
 * Cluster records that look like the same person.
 *
 * Exact signals (name, phone, email) come from one pass over hash indexes.
 * Similar names are only compared inside small prefix buckets, inside a
 * length window, so the whole run stays close to linear. Overlapping pairs are
 * joined transitively: A~B by phone and B~C by email form one group of three.
 */
export function findDuplicates(
  records: readonly ContactRecord[],
  options: DedupOptions = {},
): DuplicateGroup[] {
  if (records.length < 2) return [];

  const startTime = Date.now();
  const defaultCountry = options.defaultCountry ?? DEFAULT_COUNTRY;
  const edges: Edge[] = [];

  const names = records.map(r => normalizeName(r.fullName));

  const nameIndex = new Map<string, number[]>();
  const phoneIndex = new Map<string, number[]>();
  const emailIndex = new Map<string, number[]>();

  records.forEach((record, i) => {
    addToIndex(nameIndex, [names[i]], i);
    addToIndex(phoneIndex, record.phoneNumbers.map(p => phoneKey(p, defaultCountry)), i);
    addToIndex(emailIndex, record.emailAddresses.map(normalizeEmail), i);
  });

  collectBucketEdges(nameIndex, 'exactName', SIGNAL_CONFIDENCE.exactName, edges);
  collectBucketEdges(phoneIndex, 'samePhone', SIGNAL_CONFIDENCE.samePhone, edges);
  collectBucketEdges(emailIndex, 'sameEmail', SIGNAL_CONFIDENCE.sameEmail, edges);
  collectSimilarNameEdges(records, names, options, edges);

  const uf = new UnionFind(records.length);
  for (const edge of edges) uf.union(edge.a, edge.b);

  const signalsByRoot = new Map<number, { signals: Set<MatchSignal>; confidence: number }>();
  for (const edge of edges) {
    const root = uf.find(edge.a);
    const entry = signalsByRoot.get(root) ?? { signals: new Set<MatchSignal>(), confidence: 0 };
    entry.signals.add(edge.signal);
    entry.confidence = Math.max(entry.confidence, edge.confidence);
    signalsByRoot.set(root, entry);
  }

  // Map iteration keeps insertion order, so members stay in input order
  const membersByRoot = new Map<number, number[]>();
  records.forEach((_, i) => {
    const root = uf.find(i);
    if (!signalsByRoot.has(root)) return;
    const members = membersByRoot.get(root) ?? [];
    members.push(i);
    membersByRoot.set(root, members);
  });

  const groups: { group: DuplicateGroup; firstIndex: number }[] = [];
  for (const [root, members] of membersByRoot) {
    const entry = signalsByRoot.get(root);
    if (!entry || members.length < 2) continue;

    const contacts = members.map(i => records[i]);
    groups.push({
      firstIndex: members[0],
      group: {
        id: stableId('dup', contacts.map(c => c.id)),
        contacts,
        matchType: resolveMatchType(entry.signals),
        confidence: entry.confidence,
      },
    });
  }

  groups.sort((x, y) => y.group.confidence - x.group.confidence || x.firstIndex - y.firstIndex);
  const result = groups.map(g => g.group);

  logger.debug(
    `Duplicate detection: ${records.length} contacts, ${result.length} groups in ${Date.now() - startTime}ms`,
  );

  return options.limit !== undefined ? result.slice(0, options.limit) : result;
}

/** The member with the most phones + emails + organization; ties go to the earlier member. */
export function primaryContact(group: DuplicateGroup): ContactRecord {
  let best = group.contacts[0];
  let bestScore = completenessScore(best);
  for (const contact of group.contacts.slice(1)) {
    const score = completenessScore(contact);
    if (score > bestScore) {
      best = contact;
      bestScore = score;
    }
  }
  return best;
}

export function analyzeDuplicates(groups: readonly DuplicateGroup[]): DuplicateAnalysis {
  const matchTypeCounts: Record<MatchType, number> = {
    exactName: 0,
    similarName: 0,
    samePhone: 0,
    sameEmail: 0,
    multipleMatches: 0,
  };
  for (const group of groups) matchTypeCounts[group.matchType]++;

  return {
    totalGroups: groups.length,
    totalDuplicateContacts: groups.reduce((sum, g) => sum + g.contacts.length, 0),
    highConfidenceGroups: groups.filter(g => g.confidence > 0.9).length,
    mediumConfidenceGroups: groups.filter(g => g.confidence > 0.7 && g.confidence <= 0.9).length,
    lowConfidenceGroups: groups.filter(g => g.confidence <= 0.7).length,
    matchTypeCounts,
  };
}

function completenessScore(contact: ContactRecord): number {
  return contact.phoneNumbers.length + contact.emailAddresses.length + (contact.organization ? 1 : 0);
}

function resolveMatchType(signals: Set<MatchSignal>): MatchType {
  if (signals.size > 1) return 'multipleMatches';
  const [only] = signals;
  return only;
}

function addToIndex(index: Map<string, number[]>, keys: string[], position: number): void {
  for (const key of new Set(keys)) {
    if (!key) continue;
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(position);
    } else {
      index.set(key, [position]);
    }
  }
}

/** Star edges from the first member of every shared bucket; union-find does the rest. */
function collectBucketEdges(
  index: Map<string, number[]>,
  signal: MatchSignal,
  confidence: number,
  edges: Edge[],
): void {
  for (const bucket of index.values()) {
    if (bucket.length < 2) continue;
    for (let i = 1; i < bucket.length; i++) {
      edges.push({ a: bucket[0], b: bucket[i], signal, confidence });
    }
  }
}

function collectSimilarNameEdges(
  records: readonly ContactRecord[],
  names: string[],
  options: DedupOptions,
  edges: Edge[],
): void {
  const threshold = options.similarNameThreshold ?? DEFAULT_SIMILAR_NAME_THRESHOLD;
  const orgThreshold = options.sharedOrganizationThreshold ?? DEFAULT_SHARED_ORGANIZATION_THRESHOLD;
  const maxLengthDiff = options.maxNameLengthDifference ?? DEFAULT_MAX_NAME_LENGTH_DIFFERENCE;

  const buckets = new Map<string, number[]>();
  names.forEach((name, i) => {
    if (!name) return;
    addToIndex(buckets, [name.slice(0, SIMILARITY_PREFIX_LENGTH)], i);
  });

  for (const bucket of buckets.values()) {
    if (bucket.length < 2) continue;
    const byLength = [...bucket].sort((x, y) => names[x].length - names[y].length || x - y);

    for (let i = 0; i < byLength.length; i++) {
      const a = byLength[i];
      for (let j = i + 1; j < byLength.length; j++) {
        const b = byLength[j];
        if (names[b].length - names[a].length > maxLengthDiff) break;
        if (names[a] === names[b]) continue;

        const similarity = normalizedSimilarity(names[a], names[b]);
        const sharesOrganization = sameOrganization(records[a], records[b]);
        if (similarity >= threshold || (sharesOrganization && similarity > orgThreshold)) {
          edges.push({
            a: Math.min(a, b),
            b: Math.max(a, b),
            signal: 'similarName',
            confidence: Math.round(similarity * 100) / 100,
          });
        }
      }
    }
  }
}

function sameOrganization(a: ContactRecord, b: ContactRecord): boolean {
  if (!a.organization || !b.organization) return false;
  return a.organization.trim().toLowerCase() === b.organization.trim().toLowerCase();
}
