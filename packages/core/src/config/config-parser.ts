import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Result, ok, err } from 'neverthrow';
import { parse } from 'yaml';
import { z } from 'zod';
import { isNodeError } from '../utils/atomic-write.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const CONFIG_FILE_NAME = '.ann-report.yaml';

// --- Zod Schemas ---

const recallConfigSchema = z.object({
  epsilon: z.number().nonnegative('recall.epsilon must not be negative'),
});

const plotConfigSchema = z.object({
  width: z.number().int('plot.width must be an integer').positive('plot.width must be positive'),
  height: z.number().int('plot.height must be an integer').positive('plot.height must be positive'),
});

const annReportConfigSchema = z.object({
  resultsDir: z.string().min(1, 'resultsDir must not be empty'),
  datasetsDir: z.string().min(1, 'datasetsDir must not be empty'),
  reportsDir: z.string().min(1, 'reportsDir must not be empty'),
  plotsDir: z.string().min(1, 'plotsDir must not be empty'),
  cachePath: z.string().min(1, 'cachePath must not be empty'),
  recall: recallConfigSchema,
  plot: plotConfigSchema,
});

export type AnnReportConfig = z.infer<typeof annReportConfigSchema>;

// --- Defaults ---

export const DEFAULT_CONFIG: AnnReportConfig = {
  resultsDir: 'results',
  datasetsDir: 'data',
  reportsDir: 'reports',
  plotsDir: 'plots',
  cachePath: 'results/.metrics-cache.json',
  recall: {
    epsilon: 1e-3,
  },
  plot: {
    width: 960,
    height: 720,
  },
};

// --- Helpers ---

function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

function asSection(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function applyDefaults(partial: Record<string, unknown>): Record<string, unknown> {
  return {
    ...DEFAULT_CONFIG,
    ...partial,
    recall: { ...DEFAULT_CONFIG.recall, ...asSection(partial['recall']) },
    plot: { ...DEFAULT_CONFIG.plot, ...asSection(partial['plot']) },
  };
}

// --- Main ---

/**
 * Load `.ann-report.yaml` from `rootDir`. A missing file yields the defaults.
 */
export async function loadConfig(rootDir: string): Promise<Result<AnnReportConfig, ConfigError>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return ok(DEFAULT_CONFIG);
    }
    const message = error instanceof Error ? error.message : String(error);
    return err(new ConfigError(`Failed to read config file ${configPath}: ${message}`));
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new ConfigError(`Invalid YAML in config file: ${message}`));
  }

  if (parsed === null || parsed === undefined) {
    return ok(DEFAULT_CONFIG);
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    return err(new ConfigError('Config file is not a valid YAML object'));
  }

  const validationResult = annReportConfigSchema.safeParse(applyDefaults(asSection(parsed)));
  if (!validationResult.success) {
    return err(new ConfigError(`Config validation failed: ${formatZodErrors(validationResult.error)}`));
  }

  return ok(validationResult.data);
}
