/**
 * Pick policy resolver. Pure, no I/O.
 * The most specific matching rule decides; later declarations win ties.
 */

import type { Candidate } from '../catalogue/candidate.js';
import type { Catalogue } from '../catalogue/group.js';
import type { Resolution, ResolvedCatalogue, SelectorFailure } from '../resolution/types.js';
import { formatTo } from './parse.js';
import type { PickFrom, PickRule, PickTo } from './types.js';

export function matchesFrom(from: PickFrom, number: number | undefined): boolean {
  if (from.type === 'all') return true;
  if (number === undefined) return false;
  if (from.type === 'exact') return from.number === number;
  return number >= from.start && (from.end === null || number < from.end);
}

function tier(from: PickFrom): number {
  switch (from.type) {
    case 'exact': return 0;
    case 'range': return 1;
    case 'all': return 2;
  }
}

/** Negative when `a` is more specific than `b`. */
export function compareSpecificity(a: PickRule, b: PickRule): number {
  const byTier = tier(a.from) - tier(b.from);
  if (byTier !== 0) return byTier;

  if (a.from.type === 'range' && b.from.type === 'range') {
    const aEnd = a.from.end;
    const bEnd = b.from.end;
    if (aEnd !== null && bEnd !== null) {
      const byWidth = (aEnd - a.from.start) - (bEnd - b.from.start);
      if (byWidth !== 0) return byWidth;
    } else if (aEnd !== null) {
      return -1;
    } else if (bEnd !== null) {
      return 1;
    } else if (a.from.start !== b.from.start) {
      // both open-ended: the later start is the subset
      return b.from.start - a.from.start;
    }
  }

  return b.order - a.order;
}

export function mostSpecificRule(
  rules: readonly PickRule[],
  number: number | undefined
): PickRule | undefined {
  let best: PickRule | undefined;
  for (const rule of rules) {
    if (!matchesFrom(rule.from, number)) continue;
    if (!best || compareSpecificity(rule, best) < 0) best = rule;
  }
  return best;
}

type SelectorOutcome =
  | { type: 'ok'; candidate: Candidate }
  | { type: 'failed'; kind: SelectorFailure; reason: string };

/** First member not beaten by a later one under `better`. */
function pickBy(members: readonly Candidate[], better: (a: Candidate, b: Candidate) => boolean): Candidate {
  let best = members[0];
  for (const m of members) {
    if (better(m, best)) best = m;
  }
  return best;
}

export function applySelector(to: PickTo, members: readonly Candidate[]): SelectorOutcome {
  switch (to.type) {
    case 'first':
      return { type: 'ok', candidate: members[0] };
    case 'last':
      return { type: 'ok', candidate: members[members.length - 1] };
    case 'most-pages':
      return { type: 'ok', candidate: pickBy(members, (a, b) => a.pageCount > b.pageCount) };
    case 'largest':
      return { type: 'ok', candidate: pickBy(members, (a, b) => a.bytes > b.bytes) };
    case 'smallest':
      return { type: 'ok', candidate: pickBy(members, (a, b) => a.bytes < b.bytes) };
    case 'index':
      if (to.index < members.length) return { type: 'ok', candidate: members[to.index] };
      return {
        type: 'failed',
        kind: 'index-out-of-range',
        reason: `index ${to.index} out of range for ${members.length} candidate${members.length === 1 ? '' : 's'}`,
      };
    case 'pattern': {
      const found = members.find(m => to.pattern.test(m.rawName));
      if (found) return { type: 'ok', candidate: found };
      return {
        type: 'failed',
        kind: 'no-pattern-match',
        reason: `no candidate matches /${formatTo(to)}/`,
      };
    }
  }
}

/**
 * Resolve one catalogue against the rules.
 * A single-member catalogue is selected as-is unless a rule names its
 * number or range explicitly; catch-all rules leave it alone.
 */
export function resolveCatalogue(catalogue: Catalogue, rules: readonly PickRule[]): Resolution {
  const single = catalogue.members.length === 1;
  const applicable = single ? rules.filter(r => r.from.type !== 'all') : rules;
  const rule = mostSpecificRule(applicable, catalogue.number);

  if (!rule) {
    if (single) return { type: 'selected', candidate: catalogue.members[0], via: 'single' };
    return { type: 'unresolved' };
  }

  const outcome = applySelector(rule.to, catalogue.members);
  if (outcome.type === 'failed') {
    return { type: 'failed', kind: outcome.kind, rule, reason: outcome.reason };
  }
  return { type: 'selected', candidate: outcome.candidate, via: 'rule', rule };
}

export function resolveCatalogues(
  catalogues: readonly Catalogue[],
  rules: readonly PickRule[]
): ResolvedCatalogue[] {
  return catalogues.map(catalogue => ({ catalogue, resolution: resolveCatalogue(catalogue, rules) }));
}
