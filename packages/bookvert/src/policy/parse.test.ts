import { describe, expect, it } from 'vitest';

import { PolicySyntaxError } from '../shared/errors.js';
import { formatFrom, formatTo, parsePickRule, parsePickRules, parseRanges } from './parse.js';
import type { PickTo } from './types.js';

function patternOf(to: PickTo): RegExp {
  if (to.type !== 'pattern') throw new Error(`expected a pattern, got ${to.type}`);
  return to.pattern;
}

describe('parsePickRule', () => {
  it('treats a bare target as applying to every catalogue', () => {
    const rule = parsePickRule('last', 0);
    expect(rule).toEqual({ from: { type: 'all' }, to: { type: 'last' }, order: 0, source: 'last' });
  });

  it('parses every keyword target', () => {
    for (const keyword of ['first', 'last', 'most-pages', 'largest', 'smallest'] as const) {
      expect(parsePickRule(`4=${keyword}`, 0).to).toEqual({ type: keyword });
    }
  });

  it('reads a digit-only target as a zero-based index', () => {
    expect(parsePickRule('2=1', 0)).toMatchObject({ from: { type: 'exact', number: 2 }, to: { type: 'index', index: 1 } });
  });

  it('parses each range form with an exclusive end', () => {
    expect(parsePickRule('1..3=first', 0).from).toEqual({ type: 'range', start: 1, end: 3 });
    expect(parsePickRule('1..=3=first', 0).from).toEqual({ type: 'range', start: 1, end: 4 });
    expect(parsePickRule('5..=first', 0).from).toEqual({ type: 'range', start: 5, end: null });
    expect(parsePickRule('..3=first', 0).from).toEqual({ type: 'range', start: 0, end: 3 });
    expect(parsePickRule('..=5=first', 0).from).toEqual({ type: 'range', start: 0, end: 6 });
    expect(parsePickRule('..=first', 0).from).toEqual({ type: 'all' });
  });

  it('reads `..=N` without a second `=` as every catalogue picking index N', () => {
    expect(parsePickRule('..=5', 0)).toMatchObject({ from: { type: 'all' }, to: { type: 'index', index: 5 } });
  });

  it('allows whitespace around the range', () => {
    expect(parsePickRule(' 2 .. 4 =last', 0).from).toEqual({ type: 'range', start: 2, end: 4 });
  });

  it('keeps `=` inside a pattern target', () => {
    const rule = parsePickRule('a=b', 0);
    expect(rule.from).toEqual({ type: 'all' });
    expect(patternOf(rule.to).source).toBe('a=b');
  });

  it('matches lowercase patterns case-insensitively', () => {
    const pattern = patternOf(parsePickRule('fix', 0).to);
    expect(pattern.test('Title - 1 - Fix')).toBe(true);
  });

  it('matches patterns with an uppercase letter exactly', () => {
    const pattern = patternOf(parsePickRule('Fix', 0).to);
    expect(pattern.test('title - 1 - fix')).toBe(false);
    expect(pattern.test('Title - 1 - Fix')).toBe(true);
  });

  it('does not count escape sequences as uppercase', () => {
    expect(patternOf(parsePickRule('\\Dfix', 0).to).flags).toBe('i');
  });

  it('records the selector and its position', () => {
    const [a, b] = parsePickRules(['first', '3=last']);
    expect([a.order, a.source, b.order, b.source]).toEqual([0, 'first', 1, '3=last']);
  });
});

describe('parsePickRule errors', () => {
  function reasonOf(selector: string): string {
    try {
      parsePickRule(selector, 0);
    } catch (err) {
      if (err instanceof PolicySyntaxError) return err.reason;
      throw err;
    }
    throw new Error(`'${selector}' parsed`);
  }

  it('rejects an inverted range', () => {
    expect(reasonOf('3..1=first')).toBe('inverted range');
  });

  it('rejects a range that holds no numbers', () => {
    expect(reasonOf('2..2=first')).toBe('empty range');
  });

  it('rejects an empty from before `=`', () => {
    expect(reasonOf('=fix')).toBe('empty range');
  });

  it('rejects a malformed range', () => {
    expect(reasonOf('1.2=first')).toBe('malformed range');
  });

  it('rejects an empty target', () => {
    expect(reasonOf('3=')).toBe('empty pattern');
    expect(reasonOf('..=')).toBe('empty pattern');
  });

  it('rejects numbers too large to hold exactly', () => {
    expect(reasonOf('99999999999999999999=first')).toBe('bad integer');
  });

  it('rejects a regular expression that does not compile', () => {
    expect(reasonOf('[')).toMatch(/^invalid regular expression: /);
  });

  it('reports the first bad selector with its one-based position', () => {
    expect(() => parsePickRules(['first', '3..1=last', '=x'])).toThrow(
      "Selector #2 '3..1=last': inverted range ('3..1')"
    );
  });
});

describe('parseRanges', () => {
  it('uses the from grammar', () => {
    expect(parseRanges(['3', '5..7', '10..'])).toEqual([
      { type: 'exact', number: 3 },
      { type: 'range', start: 5, end: 7 },
      { type: 'range', start: 10, end: null },
    ]);
  });

  it('needs an upper bound after `..=`', () => {
    expect(() => parseRanges(['3..='])).toThrow("Selector #1 '3..=': missing upper bound ('3..=')");
  });
});

describe('formatFrom / formatTo', () => {
  it('prints compiled rules back in selector form', () => {
    expect(formatFrom({ type: 'all' })).toBe('..');
    expect(formatFrom({ type: 'exact', number: 3 })).toBe('3');
    expect(formatFrom({ type: 'range', start: 1, end: 4 })).toBe('1..4');
    expect(formatFrom({ type: 'range', start: 5, end: null })).toBe('5..');
    expect(formatTo({ type: 'most-pages' })).toBe('most-pages');
    expect(formatTo({ type: 'index', index: 2 })).toBe('2');
    expect(formatTo({ type: 'pattern', pattern: /fix/i })).toBe('fix');
  });
});
