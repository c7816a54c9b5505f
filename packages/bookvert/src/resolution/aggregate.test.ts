import { describe, expect, it } from 'vitest';

import { groupCatalogues } from '../catalogue/group.js';
import { parsePickRules } from '../policy/parse.js';
import { resolveCatalogues } from '../policy/resolve.js';
import {
  AggregateResolutionError,
  CatalogueResolutionError,
  NamingCollisionError,
} from '../shared/errors.js';
import type { ScannedBook } from '../shared/types.js';
import { book } from '../test/books.js';
import { aggregate, outputName, type NamingOptions } from './aggregate.js';

function plan(books: ScannedBook[], selectors: string[], opts: NamingOptions) {
  return aggregate(resolveCatalogues(groupCatalogues(books), parsePickRules(selectors)), opts);
}

function aggregateError(fn: () => unknown): AggregateResolutionError {
  try {
    fn();
  } catch (err) {
    if (err instanceof AggregateResolutionError) return err;
    throw err;
  }
  throw new Error('expected an AggregateResolutionError');
}

describe('outputName', () => {
  const [numbered, plain] = groupCatalogues([book('Ch 7'), book('Extras')]);

  it('appends the number to the title', () => {
    expect(outputName(numbered, numbered.members[0], { title: 'Title', pad: 0 })).toBe('Title7');
  });

  it('zero-pads the number when asked', () => {
    expect(outputName(numbered, numbered.members[0], { title: 'Title', pad: 3 })).toBe('Title007');
  });

  it('keeps the directory name without a title or a number', () => {
    expect(outputName(numbered, numbered.members[0], { pad: 0 })).toBe('Ch 7');
    expect(outputName(plain, plain.members[0], { title: 'Title', pad: 0 })).toBe('Extras');
  });
});

describe('aggregate', () => {
  it('hands every selected book to the builder', () => {
    const books = plan([book('Title - 1'), book('Title - 1 - Fix'), book('Title - 2')], ['fix'], {
      title: 'Title',
      pad: 0,
    });
    expect(books.map(b => [b.catalogueKey, b.number, b.candidate.rawName, b.outputName])).toEqual([
      ['1', 1, 'Title - 1 - Fix', 'Title1'],
      ['2', 2, 'Title - 2', 'Title2'],
    ]);
  });

  it('collects every problem before failing', () => {
    const err = aggregateError(() =>
      plan([book('Ch 1'), book('Ch 1 alt'), book('Ch 2'), book('Ch 2 alt'), book('Ch 3')], ['2=5'], {
        title: 'Ch',
        pad: 0,
      })
    );

    expect(err.message).toBe('Could not resolve every catalogue (2 problems)');
    expect(err.errors.map(e => e.message)).toEqual([
      '1: 2 candidates and no pick rule applies',
      "2: pick '2=5' failed: index 5 out of range for 2 candidates",
    ]);
    const [unresolved, failed] = err.errors;
    expect(unresolved).toBeInstanceOf(CatalogueResolutionError);
    if (!(unresolved instanceof CatalogueResolutionError) || !(failed instanceof CatalogueResolutionError)) return;
    expect(unresolved.kind).toBe('unresolved');
    expect(unresolved.candidates.map(c => c.rawName)).toEqual(['Ch 1', 'Ch 1 alt']);
    expect(failed.kind).toBe('index-out-of-range');
  });

  it('reports books that would be written to the same name', () => {
    const err = aggregateError(() =>
      plan([book('Vol 2 Ch 10'), book('Vol 2 Ch 11'), book('Vol 3 Ch 12')], [], { title: 'Vol', pad: 0 })
    );

    expect(err.errors).toHaveLength(1);
    const [collision] = err.errors;
    expect(collision).toBeInstanceOf(NamingCollisionError);
    expect(collision.message).toBe("Output name 'Vol2' is produced by more than one catalogue: 2.10, 2.11");
  });

  it('marks catalogues left open by an aborted session', () => {
    const [catalogue] = groupCatalogues([book('Ch 4'), book('Ch 4 alt')]);
    const err = aggregateError(() =>
      aggregate([{ catalogue, resolution: { type: 'unresolved', cancelled: true } }], { pad: 0 })
    );
    expect(err.errors[0].message).toBe('4: 2 candidates, left unresolved when the session was aborted');
  });
});
