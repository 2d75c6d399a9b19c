#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerExportCommand } from './commands/export-cmd.js';
import { registerPlotCommand } from './commands/plot-cmd.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();
program
  .name('ann-report')
  .description('Export and plot approximate-nearest-neighbor benchmark results')
  .version(pkg.version);

registerExportCommand(program);
registerPlotCommand(program);

await program.parseAsync();
