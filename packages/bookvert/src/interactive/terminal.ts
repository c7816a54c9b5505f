/**
 * Terminal front end for the resolution session, on readline.
 * Closing the input (Ctrl-D) counts as an abort.
 */

import * as readline from 'node:readline';

import { palette, type Palette } from '../shared/colors.js';
import { escapeName } from '../shared/logger.js';
import type {
  CandidateChoice,
  CandidateSummary,
  CatalogueChoice,
  CatalogueSummary,
  ResolutionUi,
} from './protocol.js';

function pluralize(n: number, one: string, many: string): string {
  return `${n} ${n === 1 ? one : many}`;
}

function isQuit(answer: string): boolean {
  return answer === 'q' || answer === 'quit';
}

/** Catalogues are numbered from 1 in the listing. Undefined means "ask again". */
export function parseCatalogueAnswer(raw: string, catalogues: readonly CatalogueSummary[]): CatalogueChoice | undefined {
  const answer = raw.trim().toLowerCase();
  if (isQuit(answer)) return { type: 'abort' };
  if (!/^[0-9]+$/.test(answer)) return undefined;
  const picked = catalogues[parseInt(answer, 10) - 1];
  return picked ? { type: 'choose-catalogue', key: picked.key } : undefined;
}

/** Candidates are numbered by rank, from 0, matching `-p N=<rank>`. */
export function parseCandidateAnswer(raw: string, candidates: readonly CandidateSummary[]): CandidateChoice | undefined {
  const answer = raw.trim().toLowerCase();
  if (isQuit(answer)) return { type: 'abort' };
  if (answer === 'b' || answer === 'back') return { type: 'back' };
  if (!/^[0-9]+$/.test(answer)) return undefined;
  const rank = parseInt(answer, 10);
  return candidates.some(c => c.rank === rank) ? { type: 'choose-candidate', rank } : undefined;
}

export class TerminalUi implements ResolutionUi {
  private readonly rl: readline.Interface;
  private readonly c: Palette;
  private closed = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
    opts: { color?: boolean } = {}
  ) {
    this.rl = readline.createInterface({ input: this.input, output: this.output });
    this.rl.once('close', () => { this.closed = true; });
    this.c = palette(opts.color);
  }

  private print(line: string = ''): void {
    this.output.write(`${line}\n`);
  }

  private question(query: string): Promise<string> {
    if (this.closed) return Promise.resolve('q');
    return new Promise(resolve => {
      const onClose = () => resolve('q');
      this.rl.once('close', onClose);
      this.rl.question(query, answer => {
        this.rl.off('close', onClose);
        resolve(answer);
      });
    });
  }

  private async ask<T>(query: string, parse: (raw: string) => T | undefined): Promise<T> {
    for (;;) {
      const parsed = parse(await this.question(query));
      if (parsed !== undefined) return parsed;
      this.print(this.c.yellow('Not a valid choice.'));
    }
  }

  showCatalogues(catalogues: CatalogueSummary[]): void {
    this.print();
    this.print(`${this.c.bold('Catalogues')} ${this.c.dim('(more than one book claims each number)')}`);
    catalogues.forEach((c, i) => {
      this.print(`  ${i + 1}. ${c.label} ${this.c.dim(`(${pluralize(c.candidateCount, 'book', 'books')})`)}`);
    });
  }

  chooseCatalogue(catalogues: CatalogueSummary[]): Promise<CatalogueChoice> {
    const range = catalogues.length === 1 ? '1' : `1-${catalogues.length}`;
    return this.ask(`Catalogue [${range}], q to quit: `, raw => parseCatalogueAnswer(raw, catalogues));
  }

  chooseCandidate(catalogue: CatalogueSummary, candidates: CandidateSummary[]): Promise<CandidateChoice> {
    this.print();
    this.print(this.c.bold(`Catalogue ${catalogue.label}`));
    for (const c of candidates) {
      this.print(
        `  ${c.rank}: ${escapeName(c.name)} ` +
        this.c.dim(`(${pluralize(c.pageCount, 'page', 'pages')}, ${c.bytes} bytes)`)
      );
      this.print(`     ${this.c.dim(c.path)}`);
    }
    const last = candidates.length - 1;
    return this.ask(`Book [0-${last}], b to go back, q to quit: `, raw => parseCandidateAnswer(raw, candidates));
  }

  confirmed(catalogue: CatalogueSummary, candidate: CandidateSummary): void {
    this.print(`${this.c.green('[picked]')} ${catalogue.label}: ${escapeName(candidate.name)}`);
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }
}
