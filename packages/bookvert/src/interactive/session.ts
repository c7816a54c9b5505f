/**
 * Interactive resolution protocol as a pure state machine.
 * One catalogue at a time, in listing order; the UI layer only feeds inputs.
 *
 *   list-catalogues → select-catalogue → select-candidate → confirmed → list-catalogues …
 *                                    ↖ back ↙
 *   abort from either select state ends the session as 'aborted'.
 */

import type { Candidate } from '../catalogue/candidate.js';
import type { Catalogue } from '../catalogue/group.js';

export type Selections = ReadonlyMap<string, Candidate>;

export type SessionState =
  | { type: 'list-catalogues'; pending: readonly string[]; selections: Selections }
  | { type: 'select-catalogue'; pending: readonly string[]; selections: Selections }
  | { type: 'select-candidate'; catalogueKey: string; pending: readonly string[]; selections: Selections }
  | { type: 'confirmed'; catalogueKey: string; candidate: Candidate; pending: readonly string[]; selections: Selections }
  | { type: 'completed'; selections: Selections }
  | { type: 'aborted'; pending: readonly string[]; selections: Selections };

export type SessionInput =
  | { type: 'listed' }
  | { type: 'choose-catalogue'; key: string }
  | { type: 'choose-candidate'; rank: number }
  | { type: 'back' }
  | { type: 'acknowledge' }
  | { type: 'abort' };

function listOrComplete(pending: readonly string[], selections: Selections): SessionState {
  if (pending.length === 0) return { type: 'completed', selections };
  return { type: 'list-catalogues', pending, selections };
}

export function startSession(catalogues: readonly Catalogue[]): SessionState {
  return listOrComplete(catalogues.map(c => c.key), new Map());
}

export function isFinal(state: SessionState): state is Extract<SessionState, { type: 'completed' | 'aborted' }> {
  return state.type === 'completed' || state.type === 'aborted';
}

/**
 * Advance the session. Inputs that make no sense in the current state
 * (an unknown catalogue, an out-of-range rank) leave it unchanged.
 */
export function transition(
  state: SessionState,
  input: SessionInput,
  catalogues: ReadonlyMap<string, Catalogue>
): SessionState {
  switch (state.type) {
    case 'list-catalogues':
      if (input.type === 'listed') {
        return { type: 'select-catalogue', pending: state.pending, selections: state.selections };
      }
      return state;

    case 'select-catalogue':
      if (input.type === 'abort') {
        return { type: 'aborted', pending: state.pending, selections: state.selections };
      }
      if (input.type === 'choose-catalogue' && state.pending.includes(input.key)) {
        return {
          type: 'select-candidate',
          catalogueKey: input.key,
          pending: state.pending,
          selections: state.selections,
        };
      }
      return state;

    case 'select-candidate': {
      if (input.type === 'abort') {
        return { type: 'aborted', pending: state.pending, selections: state.selections };
      }
      if (input.type === 'back') {
        return { type: 'list-catalogues', pending: state.pending, selections: state.selections };
      }
      if (input.type !== 'choose-candidate') return state;
      const candidate = catalogues.get(state.catalogueKey)?.members[input.rank];
      if (!candidate) return state;
      return {
        type: 'confirmed',
        catalogueKey: state.catalogueKey,
        candidate,
        pending: state.pending,
        selections: state.selections,
      };
    }

    case 'confirmed': {
      if (input.type !== 'acknowledge') return state;
      const selections = new Map(state.selections);
      selections.set(state.catalogueKey, state.candidate);
      return listOrComplete(state.pending.filter(k => k !== state.catalogueKey), selections);
    }

    case 'completed':
    case 'aborted':
      return state;
  }
}
