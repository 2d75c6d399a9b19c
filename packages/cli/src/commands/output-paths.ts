import { extname, join, sep } from 'node:path';

/** Local date as `yymmdd`. */
export function dateStamp(date: Date): string {
  const yy = String(date.getFullYear() % 100).padStart(2, '0');
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${yy}${mm}${dd}`;
}

/**
 * Where the export CSV goes.
 *
 * - no output: `<reportsDir>/data-<yymmdd>.csv`
 * - bare file name: `<reportsDir>/<name>-<yymmdd><ext>`
 * - path with a directory: `<name>-<yymmdd><ext>` next to it
 */
export function resolveExportPath(
  output: string | undefined,
  reportsDir: string,
  date: Date,
): string {
  const stamp = dateStamp(date);
  if (output === undefined || output.length === 0) {
    return join(reportsDir, `data-${stamp}.csv`);
  }

  const ext = extname(output);
  const name = ext.length > 0 ? output.slice(0, -ext.length) : output;
  const hasDirectory = output.includes('/') || output.includes(sep);

  return hasDirectory
    ? `${name}-${stamp}${ext}`
    : join(reportsDir, `${name}-${stamp}${ext}`);
}

export function defaultPlotPath(plotsDir: string, dataset: string, batchMode: boolean): string {
  return join(plotsDir, `${dataset}${batchMode ? '-batch' : ''}.svg`);
}

export function comparisonPlotPath(
  plotsDir: string,
  algorithm: string,
  base: string,
  dataset: string,
): string {
  return join(plotsDir, `${algorithm}-vs-${base}-${dataset}.svg`);
}
