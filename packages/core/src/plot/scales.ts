/**
 * Axis scales for trade-off charts.
 *
 * A scale maps data values into a space where they are laid out linearly.
 * Supported: `linear`, `log`, `symlog`, `logit`, and `a<alpha>`, which
 * stretches values near 1 (x ↦ 1 − (1 − x)^(1/α)) for recall axes.
 */

import { ok, err, type Result } from 'neverthrow';

export interface AxisScale {
  readonly name: string;
  forward(value: number): number;
  inverse(value: number): number;
  /** Whether the value can be placed on this scale at all. */
  accepts(value: number): boolean;
}

export const SCALE_NAMES = ['linear', 'log', 'symlog', 'logit'] as const;

const linear: AxisScale = {
  name: 'linear',
  forward: (v) => v,
  inverse: (v) => v,
  accepts: (v) => Number.isFinite(v),
};

const log: AxisScale = {
  name: 'log',
  forward: (v) => Math.log10(v),
  inverse: (v) => 10 ** v,
  accepts: (v) => Number.isFinite(v) && v > 0,
};

const symlog: AxisScale = {
  name: 'symlog',
  forward: (v) => Math.sign(v) * Math.log10(1 + Math.abs(v)),
  inverse: (v) => Math.sign(v) * (10 ** Math.abs(v) - 1),
  accepts: (v) => Number.isFinite(v),
};

const logit: AxisScale = {
  name: 'logit',
  forward: (v) => Math.log10(v / (1 - v)),
  inverse: (v) => 1 / (1 + 10 ** -v),
  accepts: (v) => v > 0 && v < 1,
};

function alphaScale(alpha: number): AxisScale {
  return {
    name: `a${alpha}`,
    forward: (v) => 1 - (1 - v) ** (1 / alpha),
    inverse: (v) => 1 - (1 - v) ** alpha,
    accepts: (v) => Number.isFinite(v) && v <= 1,
  };
}

const NAMED_SCALES: Readonly<Record<string, AxisScale>> = { linear, log, symlog, logit };

/**
 * Parse a scale name. `a<alpha>` is accepted only when `allowAlpha` is set.
 */
export function parseScale(name: string, allowAlpha: boolean): Result<AxisScale, string> {
  const named = Object.hasOwn(NAMED_SCALES, name) ? NAMED_SCALES[name] : undefined;
  if (named) return ok(named);

  if (allowAlpha && name.startsWith('a')) {
    const alpha = Number(name.slice(1));
    if (name.length > 1 && Number.isFinite(alpha) && alpha > 0) {
      return ok(alphaScale(alpha));
    }
  }

  const choices = allowAlpha ? [...SCALE_NAMES, 'a<alpha>'] : [...SCALE_NAMES];
  return err(`Unknown scale "${name}". Expected one of: ${choices.join(', ')}`);
}

/**
 * Evenly spaced tick values in scaled space, mapped back to data values.
 */
export function scaleTicks(scale: AxisScale, domain: readonly [number, number], count = 6): number[] {
  const lo = scale.forward(domain[0]);
  const hi = scale.forward(domain[1]);
  if (!Number.isFinite(lo) || !Number.isFinite(hi)) return [];
  if (lo === hi) return [domain[0]];

  const ticks: number[] = [];
  for (let i = 0; i < count; i++) {
    ticks.push(scale.inverse(lo + ((hi - lo) * i) / (count - 1)));
  }
  return ticks;
}
