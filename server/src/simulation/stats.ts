// server/src/simulation/stats.ts

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function safeDivide(numerator: number, denominator: number, fallback = 0): number {
  return denominator === 0 || !Number.isFinite(denominator) ? fallback : numerator / denominator;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation; 0 for fewer than two values. */
export function stdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/** Build a record with one entry per key. */
export function recordOf<K extends string, V>(keys: readonly K[], fn: (key: K) => V): Record<K, V> {
  const out = {} as Record<K, V>;
  for (const key of keys) {
    out[key] = fn(key);
  }
  return out;
}
