import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import type { RunRecord } from '../types/index.js';

const parameterValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const runFileSchema = z.object({
  algorithm: z.string().min(1, 'algorithm must not be empty'),
  name: z.string().min(1, 'name must not be empty'),
  dataset: z.string().min(1, 'dataset must not be empty'),
  count: z.number().int('count must be an integer').positive('count must be positive'),
  batchMode: z.boolean().default(false),
  parameters: z.record(z.string(), parameterValueSchema).default({}),
  neighbors: z.array(z.array(z.number())),
  distances: z.array(z.array(z.number())),
  times: z.array(z.number()),
  buildTime: z.number().optional(),
  indexSize: z.number().optional(),
  candidates: z.number().optional(),
  distComps: z.number().optional(),
  runCount: z.number().int().positive().optional(),
});

export type RunFile = z.input<typeof runFileSchema>;

function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Parse the JSON content of a stored run file into a RunRecord.
 * Returns a readable reason on failure.
 */
export function parseRunFile(id: string, content: string): Result<RunRecord, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(`invalid JSON: ${message}`);
  }

  const validation = runFileSchema.safeParse(parsed);
  if (!validation.success) {
    return err(formatZodErrors(validation.error));
  }

  const data = validation.data;
  return ok({
    id,
    algorithm: data.algorithm,
    name: data.name,
    dataset: data.dataset,
    count: data.count,
    batchMode: data.batchMode,
    parameters: data.parameters,
    neighbors: data.neighbors,
    distances: data.distances,
    times: data.times,
    attributes: {
      buildTime: data.buildTime,
      indexSize: data.indexSize,
      candidates: data.candidates,
      distComps: data.distComps,
      runCount: data.runCount,
    },
  });
}
