import type { ContactRecord } from './contact.js';

export type MatchType = 'exactName' | 'similarName' | 'samePhone' | 'sameEmail' | 'multipleMatches';

/** The match types a single index or comparison can produce on its own. */
export type MatchSignal = Exclude<MatchType, 'multipleMatches'>;

export interface DuplicateGroup {
  id: string;
  /** Members in the order they appeared in the analyzed list; always two or more. */
  contacts: ContactRecord[];
  matchType: MatchType;
  confidence: number;
}

export interface DuplicateAnalysis {
  totalGroups: number;
  totalDuplicateContacts: number;
  highConfidenceGroups: number;
  mediumConfidenceGroups: number;
  lowConfidenceGroups: number;
  matchTypeCounts: Record<MatchType, number>;
}
