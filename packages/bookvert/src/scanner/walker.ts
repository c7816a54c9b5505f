/**
 * Directory walker
 * Finds book directories and their page images.
 * Any directory holding at least one image is a book; pages are its direct image children.
 */

import fs from 'node:fs';
import path from 'node:path';

import type { PageFile, ScannedBook } from '../shared/types.js';

const IMAGE_EXTENSIONS = new Set(['jpg', 'png', 'gif', 'bmp', 'tif', 'webp', 'avif']);

/** Map an extension to its common form: "JPEG" → "jpg", "tiff" → "tif". */
export function normalizeExtension(filename: string): string | undefined {
  const ext = path.extname(filename).slice(1).toLowerCase();
  if (ext === 'jpeg') return 'jpg';
  if (ext === 'tiff') return 'tif';
  return IMAGE_EXTENSIONS.has(ext) ? ext : undefined;
}

export interface WalkOptions {
  /** Directory names matching any of these, roots included, are skipped with everything below them. */
  skip?: RegExp[];
}

/**
 * Walk one root and yield a ScannedBook per directory with images.
 * Directories are visited in sorted order so runs are reproducible.
 */
export function* walkBooks(rootPath: string, opts: WalkOptions = {}): Generator<ScannedBook> {
  const skip = opts.skip ?? [];
  const root = path.resolve(rootPath);
  if (skip.some(re => re.test(path.basename(root)))) return;
  const stack = [root];

  while (stack.length > 0) {
    const dir = stack.pop();
    if (dir === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      throw new Error(`Cannot read directory ${dir}: ${(err as Error).message}`);
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const pages: PageFile[] = [];
    const subdirs: string[] = [];

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!skip.some(re => re.test(entry.name))) subdirs.push(full);
        continue;
      }
      if (!entry.isFile()) continue;
      const ext = normalizeExtension(entry.name);
      if (!ext) continue;
      pages.push({ path: full, ext, bytes: fs.statSync(full).size });
    }

    if (pages.length > 0) {
      yield {
        path: dir,
        name: path.basename(dir),
        pageCount: pages.length,
        bytes: pages.reduce((sum, p) => sum + p.bytes, 0),
        pages,
      };
    }

    // reversed so the stack pops them in sorted order
    for (let i = subdirs.length - 1; i >= 0; i--) stack.push(subdirs[i]);
  }
}

/**
 * Scan several roots; a directory reached twice is reported once.
 * Books come back sorted by path.
 */
export function scanBooks(roots: readonly string[], opts: WalkOptions = {}): ScannedBook[] {
  const seen = new Set<string>();
  const books: ScannedBook[] = [];
  for (const root of roots) {
    for (const book of walkBooks(root, opts)) {
      if (seen.has(book.path)) continue;
      seen.add(book.path);
      books.push(book);
    }
  }
  return books.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
