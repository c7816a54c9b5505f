/**
 * Resolution aggregator
 * Turns per-catalogue outcomes into the book list for the archive builder,
 * or one error listing every catalogue that could not be settled.
 */

import { catalogueLabel, type Catalogue } from '../catalogue/group.js';
import type { Candidate } from '../catalogue/candidate.js';
import {
  AggregateResolutionError,
  CatalogueResolutionError,
  NamingCollisionError,
} from '../shared/errors.js';
import type { BookPlan, ResolvedCatalogue } from './types.js';

export interface NamingOptions {
  /** Base title; without one the selected directory name is used. */
  title?: string;
  /** Zero-pad width for the catalogue number. */
  pad: number;
}

export function outputName(catalogue: Catalogue, candidate: Candidate, opts: NamingOptions): string {
  if (!opts.title || catalogue.number === undefined) return candidate.rawName;
  return `${opts.title}${String(catalogue.number).padStart(opts.pad, '0')}`;
}

function unresolvedReason(catalogue: Catalogue, cancelled: boolean): string {
  const count = catalogue.members.length;
  if (cancelled) return `${count} candidates, left unresolved when the session was aborted`;
  return `${count} candidates and no pick rule applies`;
}

export function aggregate(resolved: readonly ResolvedCatalogue[], opts: NamingOptions): BookPlan[] {
  const errors: Array<CatalogueResolutionError | NamingCollisionError> = [];
  const books: BookPlan[] = [];

  for (const { catalogue, resolution } of resolved) {
    const label = catalogueLabel(catalogue);
    switch (resolution.type) {
      case 'selected':
        books.push({
          catalogueKey: catalogue.key,
          number: catalogue.number,
          candidate: resolution.candidate,
          outputName: outputName(catalogue, resolution.candidate, opts),
        });
        break;
      case 'unresolved':
        errors.push(new CatalogueResolutionError(
          'unresolved',
          catalogue.key,
          label,
          unresolvedReason(catalogue, resolution.cancelled === true),
          catalogue.members
        ));
        break;
      case 'failed':
        errors.push(new CatalogueResolutionError(
          resolution.kind,
          catalogue.key,
          label,
          `pick '${resolution.rule.source}' failed: ${resolution.reason}`,
          catalogue.members
        ));
        break;
    }
  }

  const byName = new Map<string, BookPlan[]>();
  for (const book of books) {
    const same = byName.get(book.outputName);
    if (same) same.push(book);
    else byName.set(book.outputName, [book]);
  }
  const labels = new Map(resolved.map(r => [r.catalogue.key, catalogueLabel(r.catalogue)] as const));
  for (const [name, same] of byName) {
    if (same.length < 2) continue;
    errors.push(new NamingCollisionError(name, same.map(b => labels.get(b.catalogueKey) ?? b.catalogueKey)));
  }

  if (errors.length > 0) throw new AggregateResolutionError(errors);
  return books;
}
