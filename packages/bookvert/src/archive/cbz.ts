/**
 * Archive builder
 * Writes one .cbz per planned book: ComicInfo.xml, then pages as p000.ext, p001.ext, …
 * Archives are written to a temp file and renamed into place.
 */

import fs from 'node:fs';
import path from 'node:path';

import yazl from 'yazl';

import type { BookPlan } from '../resolution/types.js';
import { escapeName, type Logger } from '../shared/logger.js';
import type { ComicMetadata, PageFile, ScannedBook } from '../shared/types.js';
import { comicInfoXml } from './comicInfo.js';

export interface BuildOptions {
  out: string;
  force: boolean;
  dryRun: boolean;
  /** Series for ComicInfo.xml when metadata.series is not set; defaults to the output name. */
  series?: string;
  metadata: ComicMetadata;
  logger: Logger;
}

export interface BuildSummary {
  written: string[];
  existing: string[];
  dryRun: string[];
}

export function pageName(index: number, ext: string): string {
  return `p${String(index).padStart(3, '0')}.${ext}`;
}

/**
 * A page that cannot be read fails the promise; the temp file is removed
 * and the target is left untouched.
 */
export function writeCbz(target: string, pages: readonly PageFile[], comicInfo: string): Promise<void> {
  const tmpPath = `${target}.tmp`;
  return new Promise<void>((resolve, reject) => {
    const zip = new yazl.ZipFile();
    const out = fs.createWriteStream(tmpPath);
    let failure: Error | undefined;

    const fail = (err: Error) => {
      if (failure) return;
      failure = err;
      zip.outputStream.unpipe(out);
      out.destroy();
    };

    zip.on('error', fail);
    zip.outputStream.on('error', fail);
    out.on('error', fail);
    out.on('close', () => {
      if (failure) {
        fs.rmSync(tmpPath, { force: true });
        reject(failure);
        return;
      }
      try {
        fs.renameSync(tmpPath, target);
        resolve();
      } catch (err) {
        reject(err);
      }
    });
    zip.outputStream.pipe(out);

    const options = { compress: false, mode: 0o100755 };
    zip.addBuffer(Buffer.from(comicInfo, 'utf-8'), 'ComicInfo.xml', options);
    pages.forEach((page, i) => zip.addFile(page.path, pageName(i, page.ext), options));
    zip.end();
  });
}

export async function buildArchives(
  books: readonly BookPlan[],
  scanned: readonly ScannedBook[],
  opts: BuildOptions
): Promise<BuildSummary> {
  const { logger } = opts;
  const pagesByPath = new Map(scanned.map(b => [b.path, b.pages ?? []] as const));
  const summary: BuildSummary = { written: [], existing: [], dryRun: [] };

  for (const book of books) {
    const target = path.join(opts.out, `${book.outputName}.cbz`);
    const pages = pagesByPath.get(book.candidate.path) ?? [];
    const label = book.number === undefined ? escapeName(book.candidate.rawName) : String(book.number).padStart(3, '0');

    if (opts.dryRun) logger.warn('from', `${label}: ${book.candidate.path}`);
    else logger.ok('from', `${label}: ${book.candidate.path}`);

    const comicInfo = comicInfoXml({
      title: book.outputName,
      series: opts.series ?? book.outputName,
      number: book.number,
      pageCount: pages.length,
      metadata: opts.metadata,
    });
    if (logger.verbose) {
      logger.ok('info', 'ComicInfo.xml:', 2);
      for (const line of comicInfo.trimEnd().split('\n')) logger.line(`    ${line}`);
    }

    if (fs.existsSync(target) && !opts.force) {
      logger.warn('exists', `${target} (--force to overwrite)`, 2);
      summary.existing.push(target);
      continue;
    }

    if (opts.dryRun) {
      logger.warn('dry-run', `${target} (${pages.length} pages)`, 2);
      summary.dryRun.push(target);
      continue;
    }

    fs.mkdirSync(path.dirname(target), { recursive: true });
    await writeCbz(target, pages, comicInfo);
    logger.ok('file', `${target} (${fs.statSync(target).size} bytes)`, 2);
    summary.written.push(target);
  }

  return summary;
}
