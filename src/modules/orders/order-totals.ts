import { roundToCents } from '../../common/transforms/decimal.transform';

export type PricedLine = {
  unitPrice: number;
  quantity: number;
  discountPercent: number;
};

/** Discounted line amount, rounded to cents. */
export function lineTotal(line: PricedLine): number {
  return roundToCents(
    line.unitPrice * line.quantity * (1 - line.discountPercent / 100),
  );
}

/**
 * Amount to charge for a set of lines. Always recompute from the current
 * lines at payment time; the result is never stored on the order.
 */
export function computeOrderTotal(lines: readonly PricedLine[]): number {
  if (lines.length === 0) return 0;
  return roundToCents(lines.reduce((sum, line) => sum + lineTotal(line), 0));
}

export function countItems(lines: readonly PricedLine[]): number {
  return lines.reduce((sum, line) => sum + line.quantity, 0);
}
