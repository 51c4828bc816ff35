/**
 * Balance-proportional position sizing.
 */

export const QTY_PRECISION = 3;

// Fraction of available balance committed per entry step.
export const WEIGHT_MAP: ReadonlyMap<string, number> = new Map([
  ["Long 1", 0.7],
  ["Long 2", 0.1],
  ["Long 3", 0.1],
  ["Long 4", 0.1],
  ["Short 1", 0.3],
  ["Short 2", 0.4],
  ["Short 3", 0.2],
  ["Short 4", 0.1],
]);

export type SizingParams = {
  leverage: number;
  slippage: number;
};

export function weightFor(orderId: string): number {
  return WEIGHT_MAP.get(orderId) ?? 0;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * `balance * weight * leverage / (price * (1 + slippage))`, rounded to
 * QTY_PRECISION decimals. `price` must be positive.
 */
export function calculateQuantity(
  orderId: string,
  balance: number,
  price: number,
  { leverage, slippage }: SizingParams
): number {
  const usdtAmount = balance * weightFor(orderId) * leverage;
  const qty = usdtAmount / (price * (1 + slippage));
  return roundTo(qty, QTY_PRECISION);
}
