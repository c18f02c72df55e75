import type { LineItem } from "./lineItem";
import { round2dp, round3dp } from "./uomNames";

export type BillTotals = {
  lineCount: number;
  totalQuantity: number;
  subtotal: number;
  total: number;
  roundOff: number;
  totalSavings: number;
};

type BillLine = Pick<LineItem, "quantity" | "lineAmount" | "savings">;

/**
 * Bill-level totals. Lines with zero or negative quantity are left out, and
 * only the bill total is rounded to a whole currency unit.
 */
export function summarizeBill(lines: readonly BillLine[]): BillTotals {
  let lineCount = 0;
  let totalQuantity = 0;
  let subtotal = 0;
  let totalSavings = 0;

  for (const line of lines) {
    if (!(line.quantity > 0)) continue;
    lineCount++;
    totalQuantity += line.quantity;
    subtotal += line.lineAmount;
    totalSavings += line.savings;
  }

  const roundedSubtotal = round2dp(subtotal);
  const total = Math.round(roundedSubtotal);

  return {
    lineCount,
    totalQuantity: round3dp(totalQuantity),
    subtotal: roundedSubtotal,
    total,
    roundOff: round2dp(total - roundedSubtotal),
    totalSavings: round2dp(totalSavings),
  };
}
