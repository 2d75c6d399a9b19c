/**
 * CLI command: ann-report plot
 *
 * Renders the accuracy/throughput trade-off of every algorithm on one
 * dataset as Pareto-frontier curves. With --algo, also renders one chart
 * per other algorithm family comparing it against the chosen algorithm.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { resolve } from 'node:path';
import {
  METRIC_NAMES,
  isMetricName,
  parseScale,
  loadPlotData,
  buildTradeoffChart,
  describePlotError,
  assignColors,
  comparisonGroups,
  writeFileAtomic,
  type PipelineDiagnostic,
} from '@ann-report/core';
import { comparisonPlotPath, defaultPlotPath } from './output-paths.js';
import { openContext, printDiagnostics, saveCache } from './shared.js';

export interface PlotCommandOptions {
  dataset: string;
  count: string;
  output?: string;
  outputdir?: string;
  algo?: string;
  xAxis: string;
  yAxis: string;
  xScale: string;
  yScale: string;
  raw?: boolean;
  batch?: boolean;
  recompute?: boolean;
  dark?: boolean;
}

function fail(message: string): never {
  // eslint-disable-next-line no-console
  console.error(chalk.red(message));
  process.exit(1);
}

export function registerPlotCommand(program: Command): void {
  program
    .command('plot')
    .description('Plot the Pareto frontier of each algorithm on one dataset')
    .option('--dataset <name>', 'Dataset to plot', 'glove-100-angular')
    .option('--count <k>', 'Number of nearest neighbours searched for', '10')
    .option('-o, --output <path>', 'Output SVG file')
    .option('--outputdir <dir>', 'Output directory (defaults to plotsDir from config)')
    .option('--algo <name>', 'Also compare this algorithm against every other algorithm family')
    .option('-x, --x-axis <metric>', `Metric for the X-axis (${METRIC_NAMES.join(', ')})`, 'k-nn')
    .option('-y, --y-axis <metric>', `Metric for the Y-axis (${METRIC_NAMES.join(', ')})`, 'qps')
    .option('-X, --x-scale <scale>', 'X-axis scale: linear, log, symlog, logit or a<alpha>', 'linear')
    .option('-Y, --y-scale <scale>', 'Y-axis scale: linear, log, symlog or logit', 'linear')
    .option('--raw', 'Show raw results (not just the Pareto frontier) in faded colours')
    .option('--batch', 'Plot runs made in batch mode')
    .option('--recompute', 'Recompute metrics instead of reading them from the cache')
    .option('--dark', 'Dark background')
    .action(async (options: PlotCommandOptions) => {
      if (!isMetricName(options.xAxis)) fail(`Invalid --x-axis value "${options.xAxis}".`);
      if (!isMetricName(options.yAxis)) fail(`Invalid --y-axis value "${options.yAxis}".`);

      const count = parseInt(options.count, 10);
      if (isNaN(count) || count < 1) fail('Invalid --count value. Must be a positive integer.');

      const xScale = parseScale(options.xScale, true);
      if (xScale.isErr()) fail(`Invalid --x-scale value. ${xScale.error}`);
      const yScale = parseScale(options.yScale, false);
      if (yScale.isErr()) fail(`Invalid --y-scale value. ${yScale.error}`);

      const spinner = ora('Loading configuration...').start();

      try {
        const rootDir = process.cwd();
        const contextResult = await openContext(rootDir);
        if (contextResult.isErr()) {
          spinner.fail(contextResult.error.message);
          process.exit(1);
        }
        const { config, store, provider, cache } = contextResult.value;
        const batchMode = options.batch ?? false;

        const plotsDir = resolve(rootDir, options.outputdir ?? config.plotsDir);
        const outputPath = options.output
          ? resolve(rootDir, options.output)
          : defaultPlotPath(plotsDir, options.dataset, batchMode);

        spinner.text = `Computing metrics for ${options.dataset}...`;
        const diagnostics: PipelineDiagnostic[] = [];
        const dataResult = await loadPlotData(store, provider, {
          dataset: options.dataset,
          xMetric: options.xAxis,
          yMetric: options.yAxis,
          count,
          batchMode,
          forceRecompute: options.recompute ?? false,
          cache,
          recallEpsilon: config.recall.epsilon,
          onDiagnostic: (diagnostic) => {
            diagnostics.push(diagnostic);
          },
        });

        await saveCache(cache);

        if (dataResult.isErr()) {
          spinner.fail(describePlotError(dataResult.error));
          printDiagnostics(diagnostics);
          process.exit(1);
        }
        const data = dataResult.value;

        const algorithmsResult = await store.listAlgorithms();
        const allAlgorithms = algorithmsResult.isOk()
          ? algorithmsResult.value
          : [...data.pointSets.keys()];
        const chartRequest = {
          xScale: xScale.value,
          yScale: yScale.value,
          colors: assignColors(allAlgorithms),
          raw: options.raw ?? false,
          dark: options.dark ?? false,
          width: config.plot.width,
          height: config.plot.height,
        };

        const written: string[] = [];

        if (options.algo) {
          for (const group of comparisonGroups(options.algo, allAlgorithms)) {
            const hasPoints = group.algorithms.some(
              (algorithm) => (data.pointSets.get(algorithm)?.frontier.length ?? 0) > 0,
            );
            if (!hasPoints) continue;

            const groupPath = comparisonPlotPath(plotsDir, options.algo, group.base, options.dataset);
            spinner.text = `Writing ${groupPath}`;
            await writeFileAtomic(
              groupPath,
              buildTradeoffChart(data, { ...chartRequest, algorithms: group.algorithms }),
            );
            written.push(groupPath);
          }
        }

        await writeFileAtomic(outputPath, buildTradeoffChart(data, chartRequest));
        written.push(outputPath);

        spinner.succeed(`Plotted ${data.pointSets.size} algorithm(s) from ${data.records.length} run(s)`);
        for (const path of written) {
          // eslint-disable-next-line no-console
          console.log(`  ${chalk.gray('→')} ${chalk.cyan(path)}`);
        }
        if (diagnostics.length > 0) {
          // eslint-disable-next-line no-console
          console.log(chalk.yellow(`  ${diagnostics.length} issue(s):`));
          printDiagnostics(diagnostics);
        }
      } catch (error: unknown) {
        spinner.fail('Plot failed');
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Error:'), message);
        process.exit(1);
      }
    });
}
