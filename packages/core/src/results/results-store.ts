/**
 * Read-only results store over a directory of JSON run files laid out as
 * `<root>/<dataset>/<count>/<algorithm>[-batch]/<run>.json`.
 *
 * The store can be iterated any number of times; each iteration re-reads
 * the files lazily, one run at a time.
 */

import type { Dirent } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import type { RunRecord } from '../types/index.js';
import { isNodeError } from '../utils/atomic-write.js';
import { parseRunFile } from './run-schema.js';

export class ResultsStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResultsStoreError';
  }
}

/** A stored file that could not be read as a run. */
export interface StoreDiagnostic {
  readonly path: string;
  readonly reason: string;
}

export interface RunQuery {
  /** Only runs with this neighbour count. */
  readonly count?: number;
  /** Only batch (true) or only single-query (false) runs. Defaults to false. */
  readonly batchMode?: boolean;
  readonly onDiagnostic?: (diagnostic: StoreDiagnostic) => void;
}

export interface ResultsStore {
  listDatasets(): Promise<Result<string[], ResultsStoreError>>;
  listAlgorithms(): Promise<Result<string[], ResultsStoreError>>;
  iterateRuns(dataset: string, query?: RunQuery): AsyncIterable<RunRecord>;
}

export class FileResultsStore implements ResultsStore {
  constructor(private readonly rootDir: string) {}

  async listDatasets(): Promise<Result<string[], ResultsStoreError>> {
    try {
      const entries = await readdir(this.rootDir, { withFileTypes: true });
      return ok(
        entries
          .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
          .map((entry) => entry.name)
          .sort(),
      );
    } catch (error: unknown) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return ok([]);
      }
      const message = error instanceof Error ? error.message : String(error);
      return err(new ResultsStoreError(`Failed to list datasets: ${message}`));
    }
  }

  /** Unique algorithm names across all datasets and modes, sorted. */
  async listAlgorithms(): Promise<Result<string[], ResultsStoreError>> {
    const datasets = await this.listDatasets();
    if (datasets.isErr()) return err(datasets.error);

    const algorithms = new Set<string>();
    try {
      for (const dataset of datasets.value) {
        for await (const run of this.iterateAll(dataset, () => true, undefined)) {
          algorithms.add(run.algorithm);
        }
      }
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      return err(new ResultsStoreError(`Failed to list algorithms: ${message}`));
    }

    return ok([...algorithms].sort());
  }

  iterateRuns(dataset: string, query: RunQuery = {}): AsyncIterable<RunRecord> {
    const batchMode = query.batchMode ?? false;
    const matches = (run: RunRecord): boolean =>
      run.batchMode === batchMode && (query.count === undefined || run.count === query.count);
    return {
      [Symbol.asyncIterator]: () => this.iterateAll(dataset, matches, query.onDiagnostic),
    };
  }

  private async *iterateAll(
    dataset: string,
    matches: (run: RunRecord) => boolean,
    onDiagnostic: ((diagnostic: StoreDiagnostic) => void) | undefined,
  ): AsyncGenerator<RunRecord> {
    if (dataset.length === 0 || dataset.includes('/') || dataset.includes(sep) || dataset.startsWith('.')) {
      throw new ResultsStoreError(`Invalid dataset name: ${dataset}`);
    }

    const files = await collectJsonFiles(join(this.rootDir, dataset));
    for (const file of files) {
      const id = relative(this.rootDir, file).split(sep).join('/');
      let content: string;
      try {
        content = await readFile(file, 'utf-8');
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        onDiagnostic?.({ path: id, reason: `failed to read: ${message}` });
        continue;
      }
      const parsed = parseRunFile(id, content);
      if (parsed.isErr()) {
        onDiagnostic?.({ path: id, reason: parsed.error });
        continue;
      }
      if (matches(parsed.value)) {
        yield parsed.value;
      }
    }
  }
}

/** All `.json` files below `dir`, sorted; hidden entries are skipped. */
async function collectJsonFiles(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') return [];
    throw error;
  }

  const files: string[] = [];
  for (const entry of [...entries].sort((a, b) => a.name.localeCompare(b.name))) {
    if (entry.name.startsWith('.')) continue;
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectJsonFiles(fullPath)));
    } else if (entry.isFile() && entry.name.endsWith('.json')) {
      files.push(fullPath);
    }
  }
  return files;
}
