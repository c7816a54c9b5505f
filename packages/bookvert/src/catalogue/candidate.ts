/**
 * Candidate model
 * A scanned directory considered as a book, plus the numeric identity
 * derived from its name.
 */

import type { ScannedBook } from '../shared/types.js';

export interface Candidate {
  path: string;
  rawName: string;
  /** All digit runs in rawName, in order. Empty when the name has no digits. */
  identity: readonly number[];
  pageCount: number;
  bytes: number;
  /** Position among the members of its catalogue, by rawName byte order. */
  lexicalRank: number;
}

const DIGIT_RUN = /[0-9]+/g;

/**
 * Extract the ordered sequence of numbers embedded in a name.
 * "Vol02-Ch10" → [2, 10]; "NoNumbers" → [].
 * Runs too large to be represented exactly are skipped.
 */
export function identity(rawName: string): number[] {
  const out: number[] = [];
  for (const run of rawName.match(DIGIT_RUN) ?? []) {
    const n = parseInt(run, 10);
    if (!Number.isSafeInteger(n)) continue;
    out.push(n);
  }
  return out;
}

/** Compare names by their UTF-8 bytes (same as code point order). */
export function compareNames(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

/** Candidate without a rank yet; ranks are assigned by the grouper. */
export function toCandidate(book: ScannedBook): Omit<Candidate, 'lexicalRank'> {
  return {
    path: book.path,
    rawName: book.name,
    identity: identity(book.name),
    pageCount: book.pageCount,
    bytes: book.bytes ?? 0,
  };
}
