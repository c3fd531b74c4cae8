import { LengthMismatchError } from '../errors';
import type { FrequencyEntry } from '../types/ingestion';

/**
 * Distinct elements of `values` with their occurrence counts.
 *
 * Elements are grouped with SameValueZero equality (as `Map` keys are), so
 * objects only group with themselves. Entries come out in first-occurrence
 * order, though callers should not depend on it.
 */
export function frequencyCount<T>(values: readonly T[]): FrequencyEntry<T>[] {
  const counts = new Map<T, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Array.from(counts, ([element, count]) => ({ element, count }));
}

/**
 * Map each key to the value at the same position. A repeated key keeps
 * the value of its last occurrence.
 */
export function pairwiseMap(keys: readonly string[], values: readonly string[]): Map<string, string> {
  if (keys.length !== values.length) {
    throw new LengthMismatchError(
      keys.length,
      values.length,
      `Cannot pair arrays of different lengths: ${keys.length} keys, ${values.length} values`
    );
  }

  const map = new Map<string, string>();
  keys.forEach((key, index) => {
    map.set(key, values[index]);
  });
  return map;
}
