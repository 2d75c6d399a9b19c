/**
 * Grouping of algorithms for head-to-head comparison plots.
 */

/** Base name of an algorithm: everything before the first `-`. */
export function algorithmBase(algorithm: string): string {
  return algorithm.split('-')[0] ?? algorithm;
}

/** Group algorithm names by their base name, keeping input order. */
export function groupAlgorithmsByBase(
  algorithms: readonly string[],
): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const algorithm of algorithms) {
    const base = algorithmBase(algorithm);
    const group = groups.get(base);
    if (group) {
      group.push(algorithm);
    } else {
      groups.set(base, [algorithm]);
    }
  }
  return groups;
}

/** One comparison plot: the focus algorithm against one other group. */
export interface ComparisonGroup {
  readonly base: string;
  /** Focus algorithm first, then the group's members. */
  readonly algorithms: readonly string[];
}

/**
 * Comparison groups for `focus` against every group other than its own.
 */
export function comparisonGroups(
  focus: string,
  algorithms: readonly string[],
): ComparisonGroup[] {
  const focusBase = algorithmBase(focus);
  const result: ComparisonGroup[] = [];

  for (const [base, members] of groupAlgorithmsByBase(algorithms)) {
    if (base === focusBase) continue;
    result.push({ base, algorithms: [focus, ...members] });
  }

  return result;
}
