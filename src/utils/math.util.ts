export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Share of `part` in `total` as a percentage rounded to 2 decimals; 0 when total is 0. */
export function percentage(part: number, total: number): number {
  return total > 0 ? round2((part / total) * 100) : 0;
}
