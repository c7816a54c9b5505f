/**
 * Configuration loader for Bookvert
 * Optional YAML config file with environment variable expansion.
 * Command line options are layered on top by the CLI.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { parse } from 'yaml';

import { ConfigError } from './errors.js';
import { MANGA_VALUES, type BookvertConfig, type ComicMetadata, type Manga } from './types.js';

export const DEFAULT_CONFIG: BookvertConfig = {
  out: '.',
  force: false,
  pick: [],
  skip: [],
  include: [],
  interactive: true,
  pad: 0,
  metadata: {},
};

/**
 * Expand environment variables in a string
 * Supports ${VAR} syntax
 */
function expandEnv(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value !== 'string') return value;
  return value.replace(/\$\{([^}]+)\}/g, (_, name: string) => env[name] ?? '');
}

/**
 * Recursively expand environment variables in an object
 */
function deepExpand(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (Array.isArray(obj)) return obj.map(v => deepExpand(v, env));
  if (obj && typeof obj === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      out[k] = deepExpand(v, env);
    }
    return out;
  }
  return expandEnv(obj, env);
}

/**
 * Find config file from multiple candidate locations
 */
function findConfigFile(cwd: string, env: NodeJS.ProcessEnv): string | null {
  const candidates = [
    env.BOOKVERT_CONFIG,
    path.join(cwd, 'bookvert.yaml'),
    path.join(cwd, 'config/bookvert.yaml'),
    path.join(os.homedir(), '.config/bookvert/config.yaml'),
  ].filter((c): c is string => Boolean(c));

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

// ── Field readers ──────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') throw new ConfigError(`${where}${key} must be a string`);
  return value;
}

function readBoolean(raw: Record<string, unknown>, key: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') throw new ConfigError(`${key} must be true or false`);
  return value;
}

function readStringList(raw: Record<string, unknown>, key: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  const list = Array.isArray(value) ? value : [value];
  return list.map((item, i) => {
    if (typeof item === 'string') return item;
    if (typeof item === 'number') return String(item);
    throw new ConfigError(`${key}[${i}] must be a string`);
  });
}

export function parseManga(value: string): Manga {
  const found = MANGA_VALUES.find(m => m === value);
  if (!found) throw new ConfigError(`Invalid manga value '${value}' (expected ${MANGA_VALUES.join(', ')})`);
  return found;
}

export function parsePad(value: unknown): number {
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n) || n < 0 || n > 12) {
    throw new ConfigError(`pad must be an integer between 0 and 12, got '${String(value)}'`);
  }
  return n;
}

function readMetadata(raw: unknown): ComicMetadata {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) throw new ConfigError('metadata must be a mapping');
  const manga = readString(raw, 'manga', 'metadata.');
  return {
    series: readString(raw, 'series', 'metadata.'),
    author: readString(raw, 'author', 'metadata.'),
    artist: readString(raw, 'artist', 'metadata.'),
    publisher: readString(raw, 'publisher', 'metadata.'),
    genre: readString(raw, 'genre', 'metadata.'),
    language: readString(raw, 'language', 'metadata.'),
    manga: manga === undefined ? undefined : parseManga(manga),
    summary: readString(raw, 'summary', 'metadata.'),
  };
}

/**
 * Validate a parsed config document and fill in defaults
 */
export function buildConfig(doc: unknown): BookvertConfig {
  if (doc === undefined || doc === null) return { ...DEFAULT_CONFIG, metadata: {} };
  if (!isRecord(doc)) throw new ConfigError('Config file must contain a mapping');

  const pad = doc.pad;
  return {
    out: readString(doc, 'out', '') ?? DEFAULT_CONFIG.out,
    force: readBoolean(doc, 'force') ?? DEFAULT_CONFIG.force,
    pick: readStringList(doc, 'pick') ?? [],
    skip: readStringList(doc, 'skip') ?? [],
    include: readStringList(doc, 'include') ?? [],
    interactive: readBoolean(doc, 'interactive') ?? DEFAULT_CONFIG.interactive,
    pad: pad === undefined || pad === null ? DEFAULT_CONFIG.pad : parsePad(pad),
    metadata: readMetadata(doc.metadata),
  };
}

/**
 * Load configuration. An explicitly requested file must exist;
 * otherwise the first file found wins, or defaults when there is none.
 */
export function loadConfig(
  explicitPath?: string,
  opts: { cwd?: string; env?: NodeJS.ProcessEnv } = {}
): { config: BookvertConfig; path: string | null } {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;

  let configPath: string | null;
  if (explicitPath) {
    configPath = path.resolve(cwd, explicitPath);
    if (!fs.existsSync(configPath)) throw new ConfigError(`Config file not found: ${configPath}`);
  } else {
    configPath = findConfigFile(cwd, env);
  }

  if (!configPath) return { config: buildConfig(undefined), path: null };

  const content = fs.readFileSync(configPath, 'utf-8');
  let doc: unknown;
  try {
    doc = parse(content);
  } catch (err) {
    throw new ConfigError(`${configPath}: ${(err as Error).message}`);
  }
  return { config: buildConfig(deepExpand(doc, env)), path: configPath };
}
