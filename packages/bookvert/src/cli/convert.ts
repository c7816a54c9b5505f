/**
 * bookvert convert <paths...>
 * Scan directories of page images, pick one book per number, write .cbz archives.
 */

import path from 'node:path';

import { Command } from 'commander';

import { buildArchives, type BuildSummary } from '../archive/cbz.js';
import type { ResolutionUi } from '../interactive/protocol.js';
import { TerminalUi } from '../interactive/terminal.js';
import { parsePickRules, parseRanges } from '../policy/parse.js';
import { planBooks } from '../resolution/plan.js';
import { scanBooks } from '../scanner/walker.js';
import { loadConfig, parseManga, parsePad } from '../shared/config.js';
import { ConfigError } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';
import type { ComicMetadata } from '../shared/types.js';
import { renderError } from './render.js';

export interface ConvertOptions {
  config?: string;
  out?: string;
  name?: string;
  pick: string[];
  force?: boolean;
  noninteractive?: boolean;
  verbose?: boolean;
  dryRun?: boolean;
  skip: string[];
  include: string[];
  pad?: string;
  series?: string;
  author?: string;
  artist?: string;
  publisher?: string;
  genre?: string;
  language?: string;
  manga?: string;
  summary?: string;
}

export interface ConvertDeps {
  logger: Logger;
  /** Called only when interactive resolution is enabled. */
  createUi?: () => ResolutionUi;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function compileSkip(patterns: readonly string[]): RegExp[] {
  return patterns.map(p => {
    try {
      return new RegExp(p);
    } catch (err) {
      throw new ConfigError(`Invalid skip pattern '${p}': ${(err as Error).message}`);
    }
  });
}

function cliMetadata(opts: ConvertOptions): ComicMetadata {
  const out: ComicMetadata = {};
  if (opts.series !== undefined) out.series = opts.series;
  if (opts.author !== undefined) out.author = opts.author;
  if (opts.artist !== undefined) out.artist = opts.artist;
  if (opts.publisher !== undefined) out.publisher = opts.publisher;
  if (opts.genre !== undefined) out.genre = opts.genre;
  if (opts.language !== undefined) out.language = opts.language;
  if (opts.manga !== undefined) out.manga = parseManga(opts.manga);
  if (opts.summary !== undefined) out.summary = opts.summary;
  return out;
}

/**
 * Run one conversion. Config values come first, command line values are
 * layered on top; CLI pick selectors count as declared after the config's.
 */
export async function convert(paths: readonly string[], opts: ConvertOptions, deps: ConvertDeps): Promise<BuildSummary> {
  const { logger } = deps;
  const cwd = deps.cwd ?? process.cwd();
  const { config, path: configPath } = loadConfig(opts.config, { cwd, env: deps.env });
  if (configPath) logger.debug(`config: ${configPath}`);

  const rules = parsePickRules([...config.pick, ...opts.pick]);
  const include = parseRanges([...config.include, ...opts.include]);
  const skip = compileSkip([...config.skip, ...opts.skip]);
  const pad = opts.pad !== undefined ? parsePad(opts.pad) : config.pad;
  const metadata = { ...config.metadata, ...cliMetadata(opts) };
  const interactive = config.interactive && !opts.noninteractive;
  const out = path.resolve(cwd, opts.out ?? config.out);

  const books = scanBooks(paths.map(p => path.resolve(cwd, p)), { skip });
  logger.debug(`scanned ${books.length} book director${books.length === 1 ? 'y' : 'ies'}`);

  const ui = interactive && deps.createUi ? deps.createUi() : undefined;
  const plan = await planBooks(books, { rules, include, title: opts.name, pad, ui, logger })
    .finally(() => ui?.close?.());

  return buildArchives(plan, books, {
    out,
    force: opts.force ?? config.force,
    dryRun: opts.dryRun ?? false,
    series: opts.name,
    metadata,
    logger,
  });
}

export function convertCommand(): Command {
  return new Command('convert')
    .description('Convert directories of page images into .cbz books')
    .argument('<paths...>', 'Directories to convert')
    .option('-c, --config <file>', 'YAML config file')
    .option('-o, --out <dir>', 'Output directory to write to (default: ".")')
    .option('--name <title>', 'Base title for output files; the book number is appended')
    .option(
      '-p, --pick <selector>',
      'When more than one book claims a number, how to pick one: [from=]to\n' +
      'from: N, N..M, N..=M, N.. or .. ; to: first, last, most-pages, largest,\n' +
      'smallest, a zero-based index, or a regular expression',
      collect,
      []
    )
    .option('-f, --force', 'Overwrite existing files')
    .option('-n, --noninteractive', 'Fail instead of asking when a choice is required')
    .option('-v, --verbose', 'Verbose output')
    .option('--dry-run', 'Perform a trial run with no changes made')
    .option('--skip <regex>', 'Skip directories whose name matches', collect, [])
    .option('--include <range>', 'Only convert book numbers in this range', collect, [])
    .option('--pad <width>', 'Zero-pad the book number in output names')
    .option('--series <name>', 'Series for ComicInfo.xml')
    .option('--author <name>', 'Writer for ComicInfo.xml')
    .option('--artist <name>', 'Penciller for ComicInfo.xml')
    .option('--publisher <name>', 'Publisher for ComicInfo.xml')
    .option('--genre <list>', 'Genre for ComicInfo.xml (comma-separated)')
    .option('--language <code>', 'Language ISO code for ComicInfo.xml (e.g. "en", "ja")')
    .option('--manga <value>', 'Reading direction: Yes, No or YesAndRightToLeft')
    .option('--summary <text>', 'Summary for ComicInfo.xml')
    .action(async (paths: string[], opts: ConvertOptions) => {
      const logger = new Logger(process.stdout, { verbose: Boolean(opts.verbose) });
      try {
        const summary = await convert(paths, opts, {
          logger,
          createUi: () => new TerminalUi(process.stdin, process.stdout),
        });
        logger.debug(
          `written=${summary.written.length} existing=${summary.existing.length} dry-run=${summary.dryRun.length}`
        );
      } catch (err) {
        process.exitCode = renderError(err, logger);
      }
    });
}
