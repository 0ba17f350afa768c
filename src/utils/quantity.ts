/**
 * Converts numeric-like values coming back from PostgREST (`numeric`
 * columns may arrive as strings) into numbers.
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = parseFloat(value);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  return 0;
}

/**
 * Rounds to 3 decimal places, the precision of `numeric(14,3)` quantity
 * columns (fabric is sold in fractional meters).
 */
export function roundQuantity(value: number): number {
  return parseFloat(value.toFixed(3));
}

/**
 * Rounds to cents, the precision of `numeric(14,2)` price and total columns
 */
export function roundMoney(value: number): number {
  return parseFloat(value.toFixed(2));
}

export function sumMoney(values: readonly number[]): number {
  return roundMoney(values.reduce((sum, value) => sum + value, 0));
}

export function sumQuantities(values: readonly number[]): number {
  return roundQuantity(values.reduce((sum, value) => sum + value, 0));
}

/**
 * Sums `quantity` per key, preserving first-seen key order
 */
export function totalsBy<T>(
  rows: readonly T[],
  key: (row: T) => string,
  quantity: (row: T) => number
): Map<string, number> {
  const totals = new Map<string, number>();

  for (const row of rows) {
    const k = key(row);
    totals.set(k, roundQuantity((totals.get(k) ?? 0) + quantity(row)));
  }

  return totals;
}
