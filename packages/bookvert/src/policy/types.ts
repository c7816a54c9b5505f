/**
 * Compiled pick selector shapes.
 */

/** Which catalogue numbers a rule applies to. Range ends are exclusive; null = open. */
export type PickFrom =
  | { type: 'all' }
  | { type: 'exact'; number: number }
  | { type: 'range'; start: number; end: number | null };

export type PickTo =
  | { type: 'first' }
  | { type: 'last' }
  | { type: 'most-pages' }
  | { type: 'largest' }
  | { type: 'smallest' }
  | { type: 'index'; index: number }
  | { type: 'pattern'; pattern: RegExp };

export interface PickRule {
  from: PickFrom;
  to: PickTo;
  /** Position on the command line; later rules win ties. */
  order: number;
  /** The selector as written. */
  source: string;
}
