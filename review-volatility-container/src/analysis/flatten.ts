/**
 * Flattens an AppAnalysis into a single-level document of primitive values,
 * keyed by dotted path (`metrics.riskScore`, `timeline.3.density`).
 */

export type FlatValue = string | number | boolean | null;
export type FlatDocument = Record<string, FlatValue>;

export function flattenAnalysis(value: object): FlatDocument {
  const flat: FlatDocument = {};
  visit(value, '', flat);
  return flat;
}

function visit(value: unknown, prefix: string, flat: FlatDocument): void {
  if (value === null || value === undefined) {
    flat[prefix] = null;
    return;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    flat[prefix] = value;
    return;
  }
  if (value instanceof Date) {
    flat[prefix] = value.toISOString();
    return;
  }

  if (typeof value !== 'object') {
    flat[prefix] = String(value);
    return;
  }

  // Arrays flatten by index
  const entries: [string, unknown][] = Object.entries(value);
  if (entries.length === 0 && prefix) {
    flat[prefix] = null;
    return;
  }
  for (const [key, child] of entries) {
    visit(child, prefix ? `${prefix}.${key}` : key, flat);
  }
}
