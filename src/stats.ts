export const mean = (vals: number[]): number | null =>
  vals.length === 0 ? null : vals.reduce((a, b) => a + b, 0) / vals.length;

export const wilsonInterval = (successes: number, total: number) => {
  if (total === 0) return { center: 0, low: 0, high: 0 };
  const z = 1.96;
  const phat = successes / total;
  const denom = 1 + (z * z) / total;
  const center = (phat + (z * z) / (2 * total)) / denom;
  const half =
    (z / denom) *
    Math.sqrt((phat * (1 - phat) + (z * z) / (4 * total)) / total);
  return {
    center,
    low: Math.max(0, center - half),
    high: Math.min(1, center + half),
  };
};

// Linear interpolation between ranks, rank = p/100 * (n - 1).
export const percentile = (vals: number[], p: number): number | null => {
  if (vals.length === 0) return null;
  const sorted = [...vals].sort((a, b) => a - b);
  const n = sorted.length;
  const idx = (p / 100) * (n - 1);
  const i = Math.floor(idx);
  const frac = idx - i;
  if (i >= n - 1) return sorted[n - 1];
  return sorted[i] + frac * (sorted[i + 1] - sorted[i]);
};

export const roundTo = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

export const roundOrNull = (value: number | null, digits: number): number | null =>
  value === null ? null : roundTo(value, digits);
