/**
 * Error rendering and exit codes for the CLI.
 */

import {
  AggregateResolutionError,
  CatalogueResolutionError,
  ConfigError,
  NamingCollisionError,
  PolicySyntaxError,
  ResolutionCancelledError,
} from '../shared/errors.js';
import { escapeName, type Logger } from '../shared/logger.js';

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_CANCELLED = 130;

function renderCatalogueError(err: CatalogueResolutionError, logger: Logger): void {
  const number = err.candidates[0]?.identity[0];
  const hint = err.kind === 'unresolved' && number !== undefined
    ? `, use something like \`-p ${number}=0\` to pick one`
    : '';
  logger.error(`${err.message}${hint}:`);
  for (const c of err.candidates) {
    logger.line(`  ${c.lexicalRank}: ${escapeName(c.rawName)} (${c.pageCount} pages, ${c.bytes} bytes)`);
    logger.debug(c.path, 4);
  }
}

/** Print an error and return the process exit code for it. */
export function renderError(err: unknown, logger: Logger): number {
  if (err instanceof AggregateResolutionError) {
    for (const e of err.errors) {
      if (e instanceof NamingCollisionError) logger.error(e.message);
      else renderCatalogueError(e, logger);
    }
    logger.error(err.message);
    return EXIT_FAILURE;
  }

  if (err instanceof ResolutionCancelledError) {
    if (err.unresolvedLabels.length > 0) {
      logger.warn('cancelled', `still unresolved: ${err.unresolvedLabels.join(', ')}`);
    }
    logger.error(err.message);
    return EXIT_CANCELLED;
  }

  if (err instanceof PolicySyntaxError || err instanceof ConfigError) {
    logger.error(err.message);
    return EXIT_USAGE;
  }

  if (err instanceof Error) {
    logger.error(err.message);
    return EXIT_FAILURE;
  }

  logger.error(String(err));
  return EXIT_FAILURE;
}
