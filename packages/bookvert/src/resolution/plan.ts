/**
 * Resolution pipeline
 * scanned books → catalogues → pick rules → operator (optional) → book plan
 */

import { catalogueLabel, groupCatalogues, type Catalogue } from '../catalogue/group.js';
import { runInteractive, type ResolutionUi } from '../interactive/protocol.js';
import { formatFrom, formatTo } from '../policy/parse.js';
import { matchesFrom, resolveCatalogues } from '../policy/resolve.js';
import type { PickFrom, PickRule } from '../policy/types.js';
import { ResolutionCancelledError } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import type { ScannedBook } from '../shared/types.js';
import { aggregate } from './aggregate.js';
import type { BookPlan, ResolvedCatalogue } from './types.js';

/** Everything one run needs; nothing is read from process-wide state. */
export interface RunContext {
  rules: readonly PickRule[];
  /** Keep only catalogues whose number matches one of these; empty keeps all. */
  include: readonly PickFrom[];
  title?: string;
  pad: number;
  /** Present when interactive resolution is enabled. */
  ui?: ResolutionUi;
  logger?: Logger;
}

export function filterIncluded(catalogues: readonly Catalogue[], include: readonly PickFrom[]): Catalogue[] {
  if (include.length === 0) return [...catalogues];
  return catalogues.filter(c => c.number !== undefined && include.some(from => matchesFrom(from, c.number)));
}

function logDecisions(resolved: readonly ResolvedCatalogue[], logger: Logger): void {
  for (const { catalogue, resolution } of resolved) {
    const label = catalogueLabel(catalogue);
    if (resolution.type === 'selected' && resolution.rule) {
      const { from, to } = resolution.rule;
      logger.debug(`${label}: ${formatFrom(from)}=${formatTo(to)} picked ${resolution.candidate.rawName}`);
    } else if (resolution.type === 'unresolved') {
      logger.debug(`${label}: ${catalogue.members.length} candidates, no rule applies`);
    }
  }
}

/**
 * Group, resolve and name every book.
 * Rules settle what they can before the operator is asked about the rest.
 * Throws AggregateResolutionError or ResolutionCancelledError.
 */
export async function planBooks(books: readonly ScannedBook[], ctx: RunContext): Promise<BookPlan[]> {
  const catalogues = filterIncluded(groupCatalogues(books), ctx.include);
  let resolved = resolveCatalogues(catalogues, ctx.rules);
  if (ctx.logger) logDecisions(resolved, ctx.logger);

  const unresolved = resolved.filter(r => r.resolution.type === 'unresolved').map(r => r.catalogue);

  if (ctx.ui && unresolved.length > 0) {
    const outcome = await runInteractive(unresolved, ctx.ui);
    resolved = resolved.map((r): ResolvedCatalogue => {
      const picked = outcome.selections.get(r.catalogue.key);
      if (picked) {
        return { catalogue: r.catalogue, resolution: { type: 'selected', candidate: picked, via: 'interactive' } };
      }
      if (outcome.type === 'aborted' && r.resolution.type === 'unresolved') {
        return { catalogue: r.catalogue, resolution: { type: 'unresolved', cancelled: true } };
      }
      return r;
    });

    if (outcome.type === 'aborted') {
      const labels = resolved
        .filter(r => r.resolution.type === 'unresolved')
        .map(r => catalogueLabel(r.catalogue));
      throw new ResolutionCancelledError(labels);
    }
  }

  return aggregate(resolved, { title: ctx.title, pad: ctx.pad });
}
