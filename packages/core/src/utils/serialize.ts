import type { ParameterMap } from '../types/index.js';

/**
 * Serialize a parameter mapping to JSON with keys in sorted order, so that
 * equal mappings always produce the same string.
 */
export function serializeParameters(parameters: ParameterMap): string {
  const sorted: Record<string, ParameterMap[string]> = {};
  for (const key of Object.keys(parameters).sort()) {
    const value = parameters[key];
    if (value !== undefined) sorted[key] = value;
  }
  return JSON.stringify(sorted);
}
