import { describe, expect, it } from 'vitest';

import { groupCatalogues } from '../catalogue/group.js';
import {
  AggregateResolutionError,
  CatalogueResolutionError,
  ConfigError,
  NamingCollisionError,
  PolicySyntaxError,
  ResolutionCancelledError,
} from '../shared/errors.js';
import { book } from '../test/books.js';
import { captureLogger } from '../test/output.js';
import { EXIT_CANCELLED, EXIT_FAILURE, EXIT_USAGE, renderError } from './render.js';

describe('renderError', () => {
  it('lists each unresolved catalogue with its candidates and a hint', () => {
    const [catalogue] = groupCatalogues([book('Title - 1', 20, 2048), book('Title - 1 - Fix', 22, 4096)]);
    const err = new AggregateResolutionError([
      new CatalogueResolutionError('unresolved', '1', '1', '2 candidates and no pick rule applies', catalogue.members),
      new NamingCollisionError('Vol2', ['2.10', '2.11']),
    ]);
    const { logger, output } = captureLogger();

    expect(renderError(err, logger)).toBe(EXIT_FAILURE);
    expect(output()).toBe(
      [
        '[error] 1: 2 candidates and no pick rule applies, use something like `-p 1=0` to pick one:',
        '  0: "Title - 1" (20 pages, 2048 bytes)',
        '  1: "Title - 1 - Fix" (22 pages, 4096 bytes)',
        "[error] Output name 'Vol2' is produced by more than one catalogue: 2.10, 2.11",
        '[error] Could not resolve every catalogue (2 problems)',
        '',
      ].join('\n')
    );
  });

  it('shows candidate paths when verbose', () => {
    const [catalogue] = groupCatalogues([book('Ch 5 a', 1, 1), book('Ch 5 b', 1, 1)]);
    const err = new AggregateResolutionError([
      new CatalogueResolutionError('no-pattern-match', '5', '5', "pick 'zzz' failed: no candidate matches /zzz/", catalogue.members),
    ]);
    const { logger, output } = captureLogger(true);

    renderError(err, logger);

    expect(output().split('\n').slice(0, 3)).toEqual([
      "[error] 5: pick 'zzz' failed: no candidate matches /zzz/:",
      '  0: "Ch 5 a" (1 pages, 1 bytes)',
      '    [debug] /library/Ch 5 a',
    ]);
  });

  it('maps cancellation to its own exit code', () => {
    const { logger, output } = captureLogger();
    expect(renderError(new ResolutionCancelledError(['1', '4']), logger)).toBe(EXIT_CANCELLED);
    expect(output()).toBe('[cancelled] still unresolved: 1, 4\n[error] Aborting due to user cancellation.\n');
  });

  it('treats bad selectors and config as usage errors', () => {
    const { logger, output } = captureLogger();
    expect(renderError(new PolicySyntaxError('3..1=x', 0, '3..1', 'inverted range'), logger)).toBe(EXIT_USAGE);
    expect(renderError(new ConfigError('pad must be an integer between 0 and 12, got \'x\''), logger)).toBe(EXIT_USAGE);
    expect(output()).toBe(
      "[error] Selector #1 '3..1=x': inverted range ('3..1')\n" +
      "[error] pad must be an integer between 0 and 12, got 'x'\n"
    );
  });

  it('prints anything else as a general failure', () => {
    const { logger, output } = captureLogger();
    expect(renderError(new Error('disk full'), logger)).toBe(EXIT_FAILURE);
    expect(renderError('odd', logger)).toBe(EXIT_FAILURE);
    expect(output()).toBe('[error] disk full\n[error] odd\n');
  });
});
