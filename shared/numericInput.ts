const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a free-text grid cell (quantity, rate, MRP). Anything that is not a
 * plain decimal number reads as 0 so one bad cell zeroes a single line
 * instead of failing the bill.
 */
export function parseNumericCell(value: unknown): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value !== "string") return 0;

  const text = value.trim();
  if (!DECIMAL_PATTERN.test(text)) return 0;

  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : 0;
}
