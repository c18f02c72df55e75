// Loose weight is sold in grams against a per-kilogram catalog rate.
export const SUB_GRAM_UOMS = ["g", "gram", "grams"] as const;
export const SUB_GRAM_DIVISOR = 1000;

export type UomAliasMap = ReadonlyMap<string, string>;

export type UomRow = {
  name: string;
  alias?: string | null;
};

export function round2dp(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.round(value * 100) / 100;
}

export function round3dp(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.round(value * 1000) / 1000;
}

export function isSubGramUom(uom: string | null | undefined): boolean {
  if (!uom) return false;
  return (SUB_GRAM_UOMS as readonly string[]).includes(uom.trim().toLowerCase());
}

/**
 * Rate (or MRP) per sold unit. Gram lines divide the per-kilogram figure.
 */
export function perSoldUnit(value: number, uom: string | null | undefined): number {
  return isSubGramUom(uom) ? value / SUB_GRAM_DIVISOR : value;
}

/**
 * alias (lower-cased) -> canonical unit name, e.g. "kg" -> "kilogram".
 * Rows without an alias contribute nothing.
 */
export function buildUomAliasMap(rows: readonly UomRow[]): Map<string, string> {
  const map = new Map<string, string>();
  for (const row of rows) {
    const alias = row.alias?.trim().toLowerCase();
    if (alias) map.set(alias, row.name);
  }
  return map;
}

/**
 * Normalize a typed unit through the alias map. Unknown text passes through
 * trimmed but otherwise untouched, since stored unit names are matched
 * case-sensitively.
 */
export function normalizeUom(text: string | null | undefined, aliasMap: UomAliasMap): string {
  const trimmed = String(text ?? "").trim();
  if (!trimmed) return "";
  return aliasMap.get(trimmed.toLowerCase()) ?? trimmed;
}
