#!/usr/bin/env node
/**
 * bookvert - batch convert directories of page images into .cbz books
 */

import { Command } from 'commander';

import { convertCommand } from './cli/convert.js';

const program = new Command();

program
  .name('bookvert')
  .description('Group numbered image directories into books and write .cbz archives')
  .version('0.1.0');

program.addCommand(convertCommand(), { isDefault: true });

await program.parseAsync(process.argv);
