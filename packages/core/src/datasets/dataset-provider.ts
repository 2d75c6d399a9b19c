/**
 * Ground-truth provider reading `<datasetsDir>/<name>.json`.
 */

import { readFile } from 'node:fs/promises';
import { join, sep } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import type { Dataset } from '../types/index.js';
import { isNodeError } from '../utils/atomic-write.js';

export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DatasetError';
  }
}

export interface DatasetProvider {
  getDataset(name: string): Promise<Result<Dataset, DatasetError>>;
}

const datasetFileSchema = z
  .object({
    distance: z.string().optional(),
    neighbors: z.array(z.array(z.number())),
    distances: z.array(z.array(z.number())),
  })
  .refine((data) => data.neighbors.length === data.distances.length, {
    message: 'neighbors and distances must have one row per query',
  });

export class FileDatasetProvider implements DatasetProvider {
  constructor(private readonly datasetsDir: string) {}

  async getDataset(name: string): Promise<Result<Dataset, DatasetError>> {
    if (name.length === 0 || name.includes('/') || name.includes(sep) || name.startsWith('.')) {
      return err(new DatasetError(`Invalid dataset name: ${name}`));
    }

    const filePath = join(this.datasetsDir, `${name}.json`);
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return err(new DatasetError(`Dataset not found: ${filePath}`));
      }
      const message = error instanceof Error ? error.message : String(error);
      return err(new DatasetError(`Failed to read dataset ${name}: ${message}`));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      return err(new DatasetError(`Dataset file is not valid JSON: ${filePath}`));
    }

    const validation = datasetFileSchema.safeParse(parsed);
    if (!validation.success) {
      const issues = validation.error.issues.map((issue) => issue.message).join('; ');
      return err(new DatasetError(`Invalid dataset ${name}: ${issues}`));
    }

    const data = validation.data;
    return ok({
      groundTruth: { neighbors: data.neighbors, distances: data.distances },
      metadata: {
        name,
        distance: data.distance,
        queryCount: data.distances.length,
      },
    });
  }
}
