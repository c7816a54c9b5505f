import { palette, type Palette } from './colors.js';

export interface LoggerOptions {
  verbose?: boolean;
  color?: boolean;
}

/**
 * Tagged console output: `[error] …`, `[from] …`, `  [file] …`.
 * Writes to any stream so tests can capture it.
 */
export class Logger {
  private readonly c: Palette;
  readonly verbose: boolean;

  constructor(private readonly out: NodeJS.WritableStream = process.stdout, opts: LoggerOptions = {}) {
    this.verbose = opts.verbose ?? false;
    this.c = palette(opts.color);
  }

  get colors(): Palette {
    return this.c;
  }

  line(message: string = ''): void {
    this.out.write(`${message}\n`);
  }

  error(message: string, indent: number = 0): void {
    this.tagged(this.c.red, 'error', message, indent);
  }

  warn(tag: string, message: string, indent: number = 0): void {
    this.tagged(this.c.yellow, tag, message, indent);
  }

  ok(tag: string, message: string, indent: number = 0): void {
    this.tagged(this.c.green, tag, message, indent);
  }

  debug(message: string, indent: number = 0): void {
    if (!this.verbose) return;
    this.tagged(this.c.dim, 'debug', message, indent);
  }

  private tagged(color: (s: string) => string, tag: string, message: string, indent: number): void {
    this.out.write(`${' '.repeat(indent)}${color(`[${tag}]`)} ${message}\n`);
  }
}

/** Quote a name for the terminal when it holds whitespace, quotes or backslashes. */
export function escapeName(input: string): string {
  if (!/["\\\s]/.test(input)) return input;
  return `"${input.replace(/["\\]/g, ch => `\\${ch}`)}"`;
}
