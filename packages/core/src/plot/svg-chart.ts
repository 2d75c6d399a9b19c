/**
 * SVG rendering of trade-off charts: one connected frontier curve per
 * algorithm, optional faded raw points, axes with ticks, and a legend.
 *
 * Output is a standalone SVG document with inline styling only.
 */

import type { MetricPoint } from '../frontier/pareto-frontier.js';
import { scaleTicks, type AxisScale } from './scales.js';

const SERIES_COLORS: ReadonlyArray<string> = [
  '#7c6bf0', '#4ade80', '#fbbf24', '#f87171', '#38bdf8',
  '#fb923c', '#a78bfa', '#f472b6', '#34d399', '#facc15',
  '#3178c6', '#b07219', '#00add8', '#c22d40', '#178600',
];

const MARGIN = { top: 56, right: 240, bottom: 64, left: 88 } as const;

export interface ChartSeries {
  readonly algorithm: string;
  readonly color: string;
  readonly frontier: readonly MetricPoint[];
  readonly all: readonly MetricPoint[];
}

export interface AxisSpec {
  readonly label: string;
  readonly scale: AxisScale;
  readonly domain: readonly [number, number];
}

export interface ChartOptions {
  readonly title: string;
  readonly x: AxisSpec;
  readonly y: AxisSpec;
  readonly width: number;
  readonly height: number;
  /** Draw every raw point, faded, behind the frontier. */
  readonly raw: boolean;
  readonly dark: boolean;
}

/**
 * Stable colour per algorithm, assigned by position in the sorted list
 * of all algorithms so the same algorithm keeps its colour across plots.
 */
export function assignColors(algorithms: readonly string[]): Map<string, string> {
  const colors = new Map<string, string>();
  [...new Set(algorithms)].sort().forEach((algorithm, i) => {
    colors.set(algorithm, SERIES_COLORS[i % SERIES_COLORS.length] ?? '#888888');
  });
  return colors;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function formatTick(value: number): string {
  if (value === 0) return '0';
  const abs = Math.abs(value);
  if (abs >= 1e5 || abs < 1e-3) return value.toExponential(1);
  return String(Number(value.toPrecision(3)));
}

function round(value: number): string {
  return String(Math.round(value * 100) / 100);
}

export function renderTradeoffChart(
  series: readonly ChartSeries[],
  options: ChartOptions,
): string {
  const { width, height } = options;
  const plotWidth = width - MARGIN.left - MARGIN.right;
  const plotHeight = height - MARGIN.top - MARGIN.bottom;
  const background = options.dark ? '#111111' : '#ffffff';
  const foreground = options.dark ? '#e5e5e5' : '#222222';
  const gridColor = options.dark ? '#444444' : '#a6a6a6';

  const xLo = options.x.scale.forward(options.x.domain[0]);
  const xHi = options.x.scale.forward(options.x.domain[1]);
  const yLo = options.y.scale.forward(options.y.domain[0]);
  const yHi = options.y.scale.forward(options.y.domain[1]);

  const px = (v: number): number =>
    MARGIN.left + (xHi === xLo ? plotWidth / 2 : ((options.x.scale.forward(v) - xLo) / (xHi - xLo)) * plotWidth);
  const py = (v: number): number =>
    MARGIN.top + plotHeight - (yHi === yLo ? plotHeight / 2 : ((options.y.scale.forward(v) - yLo) / (yHi - yLo)) * plotHeight);

  const inDomain = (p: MetricPoint): boolean =>
    options.x.scale.accepts(p.x) && options.y.scale.accepts(p.y);

  const parts: string[] = [];
  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="sans-serif">`,
  );
  parts.push(`<rect width="${width}" height="${height}" fill="${background}"/>`);
  parts.push(
    `<text x="${round(MARGIN.left + plotWidth / 2)}" y="28" text-anchor="middle" font-size="15" fill="${foreground}">${escapeXml(options.title)}</text>`,
  );

  // Grid and tick labels
  for (const tick of scaleTicks(options.x.scale, options.x.domain)) {
    const x = round(px(tick));
    parts.push(`<line x1="${x}" y1="${MARGIN.top}" x2="${x}" y2="${MARGIN.top + plotHeight}" stroke="${gridColor}" stroke-width="0.6"/>`);
    parts.push(`<text x="${x}" y="${MARGIN.top + plotHeight + 18}" text-anchor="middle" font-size="11" fill="${foreground}">${formatTick(tick)}</text>`);
  }
  for (const tick of scaleTicks(options.y.scale, options.y.domain)) {
    const y = round(py(tick));
    parts.push(`<line x1="${MARGIN.left}" y1="${y}" x2="${MARGIN.left + plotWidth}" y2="${y}" stroke="${gridColor}" stroke-width="0.6"/>`);
    parts.push(`<text x="${MARGIN.left - 8}" y="${y}" text-anchor="end" dominant-baseline="middle" font-size="11" fill="${foreground}">${formatTick(tick)}</text>`);
  }

  // Axes frame and labels
  parts.push(`<rect x="${MARGIN.left}" y="${MARGIN.top}" width="${plotWidth}" height="${plotHeight}" fill="none" stroke="${foreground}"/>`);
  parts.push(
    `<text x="${round(MARGIN.left + plotWidth / 2)}" y="${height - 20}" text-anchor="middle" font-size="13" fill="${foreground}">${escapeXml(options.x.label)}</text>`,
  );
  const yLabelX = 24;
  const yLabelY = round(MARGIN.top + plotHeight / 2);
  parts.push(
    `<text x="${yLabelX}" y="${yLabelY}" text-anchor="middle" font-size="13" fill="${foreground}" transform="rotate(-90 ${yLabelX} ${yLabelY})">${escapeXml(options.y.label)}</text>`,
  );

  // Series
  parts.push(`<clipPath id="plot-area"><rect x="${MARGIN.left}" y="${MARGIN.top}" width="${plotWidth}" height="${plotHeight}"/></clipPath>`);
  for (const s of series) {
    const algorithm = escapeXml(s.algorithm);
    parts.push(`<g data-algorithm="${algorithm}" clip-path="url(#plot-area)">`);
    if (options.raw) {
      const rawPoints = s.all.filter(inDomain).sort((a, b) => a.x - b.x);
      if (rawPoints.length > 0) {
        parts.push(renderLine(rawPoints, px, py, s.color, 0.35, 2, 'raw'));
      }
    }
    const frontier = s.frontier.filter(inDomain);
    if (frontier.length > 0) {
      parts.push(renderLine(frontier, px, py, s.color, 1, 3, 'frontier'));
    }
    parts.push('</g>');
  }

  // Legend
  series.forEach((s, i) => {
    const y = MARGIN.top + 10 + i * 20;
    const x = MARGIN.left + plotWidth + 16;
    parts.push(`<line x1="${x}" y1="${y}" x2="${x + 24}" y2="${y}" stroke="${s.color}" stroke-width="3"/>`);
    parts.push(`<text x="${x + 32}" y="${y}" dominant-baseline="middle" font-size="11" fill="${foreground}">${escapeXml(s.algorithm)}</text>`);
  });

  parts.push('</svg>');
  return parts.join('\n') + '\n';
}

function renderLine(
  points: readonly MetricPoint[],
  px: (v: number) => number,
  py: (v: number) => number,
  color: string,
  opacity: number,
  strokeWidth: number,
  kind: 'raw' | 'frontier',
): string {
  const coords = points.map((p) => `${round(px(p.x))},${round(py(p.y))}`);
  const markers = points
    .map((p, i) => {
      const [cx, cy] = (coords[i] ?? '0,0').split(',');
      return `<circle cx="${cx}" cy="${cy}" r="${strokeWidth + 1}" fill="${color}"><title>${escapeXml(p.label)}</title></circle>`;
    })
    .join('');
  return `<g class="${kind}" opacity="${opacity}"><polyline points="${coords.join(' ')}" fill="none" stroke="${color}" stroke-width="${strokeWidth}"/>${markers}</g>`;
}
