import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, readFileSync, rmSync, existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { Command } from 'commander';
import { registerPlotCommand } from './plot-cmd.js';

function runFile(algorithm: string, name: string, distances: number[], time: number): object {
  return {
    algorithm,
    name,
    dataset: 'ds',
    count: 2,
    neighbors: [[0, 1]],
    distances: [distances],
    times: [time],
  };
}

describe('plot command', () => {
  let tempDir: string;

  const write = (relativePath: string, value: unknown): void => {
    const fullPath = join(tempDir, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, JSON.stringify(value));
  };

  const run = async (...args: string[]): Promise<void> => {
    const program = new Command();
    program.name('ann-report');
    registerPlotCommand(program);
    await program.parseAsync(['node', 'ann-report', 'plot', ...args]);
  };

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'ann-report-plot-cmd-'));
    vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });

    write('data/ds.json', { neighbors: [[0, 1]], distances: [[0.1, 0.2]] });
    write('results/ds/2/tree-fast/a.json', runFile('tree-fast', 'tree-fast(a)', [0.1, 0.2], 0.01));
    write('results/ds/2/tree-fast/b.json', runFile('tree-fast', 'tree-fast(b)', [0.1, 0.9], 0.001));
    write('results/ds/2/graph/a.json', runFile('graph', 'graph(a)', [0.1, 0.2], 0.002));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write the chart to the plots directory', async () => {
    await run('--dataset', 'ds', '--count', '2');

    const svg = readFileSync(join(tempDir, 'plots', 'ds.svg'), 'utf-8');
    expect(svg.startsWith('<svg')).toBe(true);
    expect(svg).toContain('data-algorithm="tree-fast"');
    expect(svg).toContain('data-algorithm="graph"');
  });

  it('should honour an explicit output path', async () => {
    await run('--dataset', 'ds', '--count', '2', '-o', 'out/chart.svg', '-Y', 'log', '--dark');

    const svg = readFileSync(join(tempDir, 'out', 'chart.svg'), 'utf-8');
    expect(svg).toContain('fill="#111111"');
  });

  it('should write comparison charts with --algo', async () => {
    await run('--dataset', 'ds', '--count', '2', '--algo', 'tree-fast');

    const comparison = readFileSync(join(tempDir, 'plots', 'tree-fast-vs-graph-ds.svg'), 'utf-8');
    expect(comparison).toContain('data-algorithm="tree-fast"');
    expect(comparison).toContain('data-algorithm="graph"');
    expect(existsSync(join(tempDir, 'plots', 'ds.svg'))).toBe(true);
  });

  it('should reject an unknown metric before reading results', async () => {
    await expect(run('--dataset', 'ds', '-y', 'speed')).rejects.toThrow('process.exit(1)');
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Invalid --y-axis value "speed".'));
  });

  it('should reject an alpha scale on the y axis', async () => {
    await expect(run('--dataset', 'ds', '-Y', 'a2')).rejects.toThrow('process.exit(1)');
  });

  it('should exit when there is nothing to plot', async () => {
    await expect(run('--dataset', 'ds', '--count', '10')).rejects.toThrow('process.exit(1)');
    expect(existsSync(join(tempDir, 'plots'))).toBe(false);
  });
});
