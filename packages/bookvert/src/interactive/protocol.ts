/**
 * Drives the resolution session through an abstract UI.
 * Any front end works: the readline terminal, or a scripted harness in tests.
 */

import type { Candidate } from '../catalogue/candidate.js';
import { catalogueLabel, type Catalogue } from '../catalogue/group.js';
import { startSession, transition, type Selections, type SessionState } from './session.js';

export interface CatalogueSummary {
  key: string;
  label: string;
  identity: readonly number[];
  candidateCount: number;
}

export interface CandidateSummary {
  rank: number;
  name: string;
  path: string;
  pageCount: number;
  bytes: number;
}

export type CatalogueChoice =
  | { type: 'choose-catalogue'; key: string }
  | { type: 'abort' };

export type CandidateChoice =
  | { type: 'choose-candidate'; rank: number }
  | { type: 'back' }
  | { type: 'abort' };

export interface ResolutionUi {
  /** Listing event: every catalogue still waiting for a choice. */
  showCatalogues(catalogues: CatalogueSummary[]): void | Promise<void>;
  chooseCatalogue(catalogues: CatalogueSummary[]): Promise<CatalogueChoice>;
  chooseCandidate(catalogue: CatalogueSummary, candidates: CandidateSummary[]): Promise<CandidateChoice>;
  confirmed?(catalogue: CatalogueSummary, candidate: CandidateSummary): void | Promise<void>;
  close?(): void;
}

export type InteractiveOutcome =
  | { type: 'completed'; selections: Selections }
  | { type: 'aborted'; selections: Selections; pending: readonly string[] };

export function summarizeCatalogue(catalogue: Catalogue): CatalogueSummary {
  return {
    key: catalogue.key,
    label: catalogueLabel(catalogue),
    identity: catalogue.identity,
    candidateCount: catalogue.members.length,
  };
}

export function summarizeCandidate(candidate: Candidate): CandidateSummary {
  return {
    rank: candidate.lexicalRank,
    name: candidate.rawName,
    path: candidate.path,
    pageCount: candidate.pageCount,
    bytes: candidate.bytes,
  };
}

function pendingSummaries(state: { pending: readonly string[] }, byKey: ReadonlyMap<string, Catalogue>): CatalogueSummary[] {
  const out: CatalogueSummary[] = [];
  for (const key of state.pending) {
    const catalogue = byKey.get(key);
    if (catalogue) out.push(summarizeCatalogue(catalogue));
  }
  return out;
}

/**
 * Ask the operator to settle each catalogue.
 * Blocks on the UI with no timeout; only an explicit abort ends it early.
 */
export async function runInteractive(
  catalogues: readonly Catalogue[],
  ui: ResolutionUi
): Promise<InteractiveOutcome> {
  const byKey = new Map(catalogues.map(c => [c.key, c] as const));
  let state: SessionState = startSession(catalogues);

  for (;;) {
    switch (state.type) {
      case 'list-catalogues':
        await ui.showCatalogues(pendingSummaries(state, byKey));
        state = transition(state, { type: 'listed' }, byKey);
        break;

      case 'select-catalogue':
        state = transition(state, await ui.chooseCatalogue(pendingSummaries(state, byKey)), byKey);
        break;

      case 'select-candidate': {
        const catalogue = byKey.get(state.catalogueKey);
        if (!catalogue) throw new Error(`Unknown catalogue ${state.catalogueKey}`);
        const choice = await ui.chooseCandidate(
          summarizeCatalogue(catalogue),
          catalogue.members.map(summarizeCandidate)
        );
        state = transition(state, choice, byKey);
        break;
      }

      case 'confirmed': {
        const catalogue = byKey.get(state.catalogueKey);
        if (catalogue) await ui.confirmed?.(summarizeCatalogue(catalogue), summarizeCandidate(state.candidate));
        state = transition(state, { type: 'acknowledge' }, byKey);
        break;
      }

      case 'completed':
        return { type: 'completed', selections: state.selections };

      case 'aborted':
        return { type: 'aborted', selections: state.selections, pending: state.pending };
    }
  }
}
