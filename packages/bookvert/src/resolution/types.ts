/**
 * Resolution outcomes, one per catalogue. Never mutated once produced.
 */

import type { Candidate } from '../catalogue/candidate.js';
import type { Catalogue } from '../catalogue/group.js';
import type { PickRule } from '../policy/types.js';

export type SelectorFailure = 'index-out-of-range' | 'no-pattern-match';

export type Resolution =
  | {
      type: 'selected';
      candidate: Candidate;
      via: 'single' | 'rule' | 'interactive';
      rule?: PickRule;
    }
  | { type: 'unresolved'; cancelled?: boolean }
  | { type: 'failed'; kind: SelectorFailure; rule: PickRule; reason: string };

export interface ResolvedCatalogue {
  catalogue: Catalogue;
  resolution: Resolution;
}

/** What the archive builder receives for each book. */
export interface BookPlan {
  catalogueKey: string;
  number: number | undefined;
  candidate: Candidate;
  /** Base name of the archive; the builder appends the extension. */
  outputName: string;
}
