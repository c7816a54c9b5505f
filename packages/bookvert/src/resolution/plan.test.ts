import { describe, expect, it } from 'vitest';

import type { CandidateChoice, CatalogueChoice, CatalogueSummary, ResolutionUi } from '../interactive/protocol.js';
import { parsePickRules, parseRanges } from '../policy/parse.js';
import { AggregateResolutionError, ResolutionCancelledError } from '../shared/errors.js';
import { book } from '../test/books.js';
import { planBooks, type RunContext } from './plan.js';

const scenario = [book('Title - 1'), book('Title - 1 - Fix'), book('Title - 2')];

function context(overrides: Partial<RunContext> = {}): RunContext {
  return { rules: [], include: [], title: 'Title', pad: 0, ...overrides };
}

/** Always picks the same rank, or aborts. */
function operator(answer: CandidateChoice, seen: string[][] = []): ResolutionUi {
  return {
    showCatalogues(catalogues: CatalogueSummary[]) {
      seen.push(catalogues.map(c => c.label));
    },
    async chooseCatalogue(catalogues: CatalogueSummary[]): Promise<CatalogueChoice> {
      return { type: 'choose-catalogue', key: catalogues[0].key };
    },
    async chooseCandidate(): Promise<CandidateChoice> {
      return answer;
    },
  };
}

describe('planBooks', () => {
  it('fails on an ambiguous catalogue when nothing settles it', async () => {
    const result = planBooks(scenario, context());

    await expect(result).rejects.toBeInstanceOf(AggregateResolutionError);
    await expect(result).rejects.toMatchObject({
      errors: [{ kind: 'unresolved', label: '1', message: '1: 2 candidates and no pick rule applies' }],
    });
  });

  it('settles the ambiguity with a pattern rule', async () => {
    const books = await planBooks(scenario, context({ rules: parsePickRules(['fix']) }));
    expect(books.map(b => [b.outputName, b.candidate.rawName])).toEqual([
      ['Title1', 'Title - 1 - Fix'],
      ['Title2', 'Title - 2'],
    ]);
  });

  it('drops catalogues outside the include ranges before resolving', async () => {
    const books = await planBooks(scenario, context({ include: parseRanges(['2..']) }));
    expect(books.map(b => b.outputName)).toEqual(['Title2']);
  });

  it('asks the operator only about catalogues no rule settled', async () => {
    const seen: string[][] = [];
    const books = await planBooks(
      [...scenario, book('Title - 2 - Fix')],
      context({ rules: parsePickRules(['2=last']), ui: operator({ type: 'choose-candidate', rank: 0 }, seen) })
    );

    expect(seen).toEqual([['1']]);
    expect(books.map(b => [b.outputName, b.candidate.rawName])).toEqual([
      ['Title1', 'Title - 1'],
      ['Title2', 'Title - 2 - Fix'],
    ]);
  });

  it('cancels the run when the operator aborts', async () => {
    const result = planBooks(scenario, context({ ui: operator({ type: 'abort' }) }));

    await expect(result).rejects.toBeInstanceOf(ResolutionCancelledError);
    await expect(result).rejects.toMatchObject({ unresolvedLabels: ['1'] });
  });

  it('does not open a session when everything is settled', async () => {
    const seen: string[][] = [];
    await planBooks(scenario, context({ rules: parsePickRules(['1=0']), ui: operator({ type: 'abort' }, seen) }));
    expect(seen).toEqual([]);
  });
});
