/**
 * CLI command: ann-report export
 *
 * Computes metrics for every stored run of every dataset and writes them
 * to one CSV table, one row per run.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { resolve } from 'node:path';
import { exportMetrics, type PipelineDiagnostic } from '@ann-report/core';
import { resolveExportPath } from './output-paths.js';
import { openContext, printDiagnostics, saveCache } from './shared.js';

export function registerExportCommand(program: Command): void {
  program
    .command('export')
    .description('Compute metrics for all stored runs and write them to a CSV table')
    .option('--output <path>', 'Path to the output file (a yymmdd date suffix is added)')
    .option('--recompute', 'Recompute metrics instead of reading them from the cache')
    .option('--no-batch', 'Export runs made in single-query mode instead of batch mode')
    .action(async (options: { output?: string; recompute?: boolean; batch: boolean }) => {
      const spinner = ora('Loading configuration...').start();

      try {
        const rootDir = process.cwd();
        const contextResult = await openContext(rootDir);
        if (contextResult.isErr()) {
          spinner.fail(contextResult.error.message);
          process.exit(1);
        }
        const { config, store, provider, cache } = contextResult.value;

        const outputPath = resolve(rootDir, resolveExportPath(options.output, config.reportsDir, new Date()));
        const diagnostics: PipelineDiagnostic[] = [];

        const result = await exportMetrics(store, provider, outputPath, {
          batchMode: options.batch,
          forceRecompute: options.recompute ?? false,
          cache,
          recallEpsilon: config.recall.epsilon,
          onDataset: (dataset) => {
            spinner.text = `Looking at dataset ${dataset}`;
          },
          onDiagnostic: (diagnostic) => {
            diagnostics.push(diagnostic);
          },
        });

        await saveCache(cache);

        if (result.isErr()) {
          spinner.fail('Export failed');
          // eslint-disable-next-line no-console
          console.error(chalk.red('Error:'), result.error.message);
          process.exit(1);
        }

        const table = result.value;
        if (!table.written) {
          spinner.warn('No results found. Nothing was written.');
          printDiagnostics(diagnostics);
          return;
        }

        spinner.succeed(`Exported ${table.rows.length} row(s)`);
        // eslint-disable-next-line no-console
        console.log(`  Output:  ${chalk.cyan(outputPath)}`);
        // eslint-disable-next-line no-console
        console.log(`  Columns: ${chalk.cyan(String(table.columns.length))}`);
        if (diagnostics.length > 0) {
          // eslint-disable-next-line no-console
          console.log(chalk.yellow(`  ${diagnostics.length} issue(s):`));
          printDiagnostics(diagnostics);
        }
      } catch (error: unknown) {
        spinner.fail('Export failed');
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Error:'), message);
        process.exit(1);
      }
    });
}
