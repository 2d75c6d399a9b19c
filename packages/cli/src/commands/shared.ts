import chalk from 'chalk';
import { resolve } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import {
  loadConfig,
  FileResultsStore,
  FileDatasetProvider,
  JsonFileMetricsCache,
  describeDiagnostic,
  type AnnReportConfig,
  type ConfigError,
  type MetricsCacheError,
  type PipelineDiagnostic,
} from '@ann-report/core';

export interface CommandContext {
  readonly rootDir: string;
  readonly config: AnnReportConfig;
  readonly store: FileResultsStore;
  readonly provider: FileDatasetProvider;
  readonly cache: JsonFileMetricsCache;
}

/**
 * Load configuration and open the results store, dataset provider and
 * metrics cache it points at. Relative paths resolve against `rootDir`.
 */
export async function openContext(
  rootDir: string,
): Promise<Result<CommandContext, ConfigError | MetricsCacheError>> {
  const configResult = await loadConfig(rootDir);
  if (configResult.isErr()) return err(configResult.error);
  const config = configResult.value;

  const cacheResult = await JsonFileMetricsCache.load(resolve(rootDir, config.cachePath));
  if (cacheResult.isErr()) return err(cacheResult.error);

  return ok({
    rootDir,
    config,
    store: new FileResultsStore(resolve(rootDir, config.resultsDir)),
    provider: new FileDatasetProvider(resolve(rootDir, config.datasetsDir)),
    cache: cacheResult.value,
  });
}

/**
 * Format collected diagnostics for the terminal, at most `limit` lines plus
 * a line counting the rest. Empty datasets are listed dimmed.
 */
export function formatDiagnostics(
  diagnostics: readonly PipelineDiagnostic[],
  limit = 10,
): string[] {
  const lines = diagnostics.slice(0, limit).map((d) => {
    const text = describeDiagnostic(d);
    return d.kind === 'empty_dataset'
      ? `  ${chalk.gray('→')} ${chalk.dim(text)}`
      : `  ${chalk.gray('→')} ${chalk.yellow(text)}`;
  });
  if (diagnostics.length > limit) {
    lines.push(`  ${chalk.gray(`… and ${diagnostics.length - limit} more`)}`);
  }
  return lines;
}

export function printDiagnostics(diagnostics: readonly PipelineDiagnostic[]): void {
  for (const line of formatDiagnostics(diagnostics)) {
    // eslint-disable-next-line no-console
    console.log(line);
  }
}

/** Persist the metrics cache; failures only warn since results are already written. */
export async function saveCache(cache: JsonFileMetricsCache): Promise<void> {
  const saved = await cache.save();
  if (saved.isErr()) {
    // eslint-disable-next-line no-console
    console.error(chalk.yellow('Warning:'), saved.error.message);
  }
}
