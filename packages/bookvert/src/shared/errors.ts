/**
 * Error taxonomy.
 * Selector errors abort before resolution; catalogue errors and naming
 * collisions are collected and thrown together as AggregateResolutionError.
 */

import type { Candidate } from '../catalogue/candidate.js';

export type ErrorCode =
  | 'policy_syntax'
  | 'catalogue'
  | 'naming_collision'
  | 'aggregate'
  | 'cancelled'
  | 'config'
  | 'duplicate_candidate';

export class BookvertError extends Error {
  constructor(readonly code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class PolicySyntaxError extends BookvertError {
  constructor(
    readonly selector: string,
    readonly position: number,   // zero-based index among the parsed selectors
    readonly token: string,
    readonly reason: string
  ) {
    super('policy_syntax', `Selector #${position + 1} '${selector}': ${reason} ('${token}')`);
  }
}

export type CatalogueErrorKind = 'index-out-of-range' | 'no-pattern-match' | 'unresolved';

export class CatalogueResolutionError extends BookvertError {
  constructor(
    readonly kind: CatalogueErrorKind,
    readonly catalogueKey: string,
    readonly label: string,
    readonly reason: string,
    readonly candidates: readonly Candidate[] = []
  ) {
    super('catalogue', `${label}: ${reason}`);
  }
}

export class NamingCollisionError extends BookvertError {
  constructor(readonly outputName: string, readonly catalogueLabels: string[]) {
    super(
      'naming_collision',
      `Output name '${outputName}' is produced by more than one catalogue: ${catalogueLabels.join(', ')}`
    );
  }
}

export class AggregateResolutionError extends BookvertError {
  constructor(readonly errors: Array<CatalogueResolutionError | NamingCollisionError>) {
    super('aggregate', `Could not resolve every catalogue (${errors.length} problem${errors.length === 1 ? '' : 's'})`);
  }
}

export class ResolutionCancelledError extends BookvertError {
  constructor(readonly unresolvedLabels: string[]) {
    super('cancelled', 'Aborting due to user cancellation.');
  }
}

export class ConfigError extends BookvertError {
  constructor(message: string) {
    super('config', message);
  }
}

export class DuplicateCandidateError extends BookvertError {
  constructor(readonly path: string) {
    super('duplicate_candidate', `Directory scanned twice: ${path}`);
  }
}
