/**
 * Catalogue grouper. Pure, no I/O.
 * Partitions scanned books into catalogues keyed by identity.
 */

import { DuplicateCandidateError } from '../shared/errors.js';
import type { ScannedBook } from '../shared/types.js';
import { compareNames, toCandidate, type Candidate } from './candidate.js';

export interface Catalogue {
  /** Unique within a run. Books without digits get a key of their own. */
  key: string;
  identity: readonly number[];
  /** Leading identity component, undefined for the no-identity marker. */
  number: number | undefined;
  /** Ordered by lexicalRank. */
  members: Candidate[];
}

const NO_IDENTITY = '∅';

export function catalogueKey(identity: readonly number[], path: string): string {
  if (identity.length === 0) return `${NO_IDENTITY}:${path}`;
  return identity.join('.');
}

export function isAmbiguous(catalogue: Catalogue): boolean {
  return catalogue.members.length > 1;
}

/** Human label: "3", "2.10", or the directory name when there are no digits. */
export function catalogueLabel(catalogue: Catalogue): string {
  if (catalogue.identity.length === 0) {
    return catalogue.members[0]?.rawName ?? catalogue.key;
  }
  return catalogue.identity.join('.');
}

/**
 * Group books by identity.
 * Catalogues are listed in first-encounter order; members are sorted by
 * name (byte order, then path) and ranked from 0.
 */
export function groupCatalogues(books: readonly ScannedBook[]): Catalogue[] {
  const seen = new Set<string>();
  const byKey = new Map<string, Omit<Candidate, 'lexicalRank'>[]>();

  for (const book of books) {
    if (seen.has(book.path)) throw new DuplicateCandidateError(book.path);
    seen.add(book.path);

    const candidate = toCandidate(book);
    const key = catalogueKey(candidate.identity, candidate.path);
    const bucket = byKey.get(key);
    if (bucket) bucket.push(candidate);
    else byKey.set(key, [candidate]);
  }

  const catalogues: Catalogue[] = [];
  for (const [key, bucket] of byKey) {
    const members = [...bucket]
      .sort((a, b) => compareNames(a.rawName, b.rawName) || compareNames(a.path, b.path))
      .map((c, lexicalRank) => ({ ...c, lexicalRank }));
    const identity = members[0].identity;
    catalogues.push({
      key,
      identity,
      number: identity.length > 0 ? identity[0] : undefined,
      members,
    });
  }
  return catalogues;
}
