/**
 * Pick policy parser
 * Compiles `[from=]to` selectors into PickRules.
 *
 *   from ::= N | N..M | N..=M | N.. | ..M | ..=M | ..
 *   to   ::= first | last | most-pages | largest | smallest | INDEX | REGEX
 */

import { PolicySyntaxError } from '../shared/errors.js';
import type { PickFrom, PickRule, PickTo } from './types.js';

// A `from` prefix is digits, dots and whitespace, optionally ending in `..=M`.
// Anything else before the first '=' belongs to the target (regexes may contain '=').
const FROM_PREFIX = /^(\s*[0-9]*\s*\.\.=\s*[0-9]+\s*|[0-9\s.]*?)=/;
const RANGE = /^([0-9]*)\s*\.\.(=?)\s*([0-9]*)$/;
const INTEGER = /^[0-9]+$/;

type Fail = (token: string, reason: string) => never;

function parseInteger(token: string, fail: Fail): number {
  if (!INTEGER.test(token)) fail(token, 'bad integer');
  const n = parseInt(token, 10);
  if (!Number.isSafeInteger(n)) fail(token, 'bad integer');
  return n;
}

function parseFrom(raw: string, fail: Fail): PickFrom {
  const text = raw.trim();
  if (text === '') fail(raw, 'empty range');
  if (INTEGER.test(text)) return { type: 'exact', number: parseInteger(text, fail) };

  const m = text.match(RANGE);
  if (!m) return fail(text, 'malformed range');
  const [, startText, inclusive, endText] = m;

  if (endText === '') {
    if (inclusive) fail(text, 'missing upper bound');
    if (startText === '') return { type: 'all' };
    return { type: 'range', start: parseInteger(startText, fail), end: null };
  }

  const start = startText === '' ? 0 : parseInteger(startText, fail);
  const last = parseInteger(endText, fail);
  if (last < start) fail(text, 'inverted range');
  const end = inclusive ? last + 1 : last;
  if (end === start) fail(text, 'empty range');
  return { type: 'range', start, end };
}

/** Case-insensitive unless the pattern spells an uppercase letter itself. */
function smartCaseFlags(pattern: string): string {
  return /[A-Z]/.test(pattern.replace(/\\./g, '')) ? '' : 'i';
}

function parseTo(raw: string, fail: Fail): PickTo {
  const text = raw.trim();
  switch (text) {
    case '':
      return fail(raw, 'empty pattern');
    case 'first':
    case 'last':
    case 'most-pages':
    case 'largest':
    case 'smallest':
      return { type: text };
  }

  if (INTEGER.test(text)) return { type: 'index', index: parseInteger(text, fail) };

  try {
    return { type: 'pattern', pattern: new RegExp(text, smartCaseFlags(text)) };
  } catch (err) {
    return fail(text, `invalid regular expression: ${(err as Error).message}`);
  }
}

function failer(selector: string, position: number): Fail {
  return (token, reason) => {
    throw new PolicySyntaxError(selector, position, token, reason);
  };
}

export function parsePickRule(selector: string, order: number): PickRule {
  const fail = failer(selector, order);
  const m = selector.match(FROM_PREFIX);
  const from = m ? parseFrom(m[1], fail) : { type: 'all' as const };
  const to = parseTo(m ? selector.slice(m[0].length) : selector, fail);
  return { from, to, order, source: selector };
}

/**
 * Parse selectors in declaration order.
 * The first malformed entry aborts the whole parse.
 */
export function parsePickRules(selectors: readonly string[]): PickRule[] {
  return selectors.map((s, i) => parsePickRule(s, i));
}

/** Parse `--include` ranges; same grammar as a selector's `from`. */
export function parseRanges(ranges: readonly string[]): PickFrom[] {
  return ranges.map((r, i) => parseFrom(r, failer(r, i)));
}

export function formatFrom(from: PickFrom): string {
  switch (from.type) {
    case 'all':
      return '..';
    case 'exact':
      return String(from.number);
    case 'range':
      return from.end === null ? `${from.start}..` : `${from.start}..${from.end}`;
  }
}

export function formatTo(to: PickTo): string {
  switch (to.type) {
    case 'index':
      return String(to.index);
    case 'pattern':
      return to.pattern.source;
    default:
      return to.type;
  }
}
