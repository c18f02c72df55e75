import type { SchemeBenefitType } from "./schema";

export type SchemeRuleRecord = {
  ruleId: string;
  schemeId: string;
  schemeName: string;
  productId: string;
  isActive: boolean;
  validFrom: string; // YYYY-MM-DD
  validTo: string | null;
  minQty: number;
  maxQty: number | null;
  targetUom: string | null;
  targetMrp: number | null;
  benefitType: SchemeBenefitType;
  benefitValue: number;
};

export type SchemeMatchCriteria = {
  productId: string;
  quantity: number;
  uom: string | null;
  mrp: number | null;
  today: string; // YYYY-MM-DD
};

// MRP columns are decimal(12,3); compare at that precision.
const MRP_EPSILON = 0.0005;

export function uomsMatch(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export function mrpsMatch(a: number, b: number): boolean {
  return Math.abs(a - b) < MRP_EPSILON;
}

/**
 * Calendar date in the given IANA zone (process zone when omitted).
 * `en-CA` formats as YYYY-MM-DD.
 */
export function toIsoDate(date: Date, timeZone?: string): string {
  return new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).format(date);
}

export function ruleMatches(rule: SchemeRuleRecord, criteria: SchemeMatchCriteria): boolean {
  if (rule.productId !== criteria.productId) return false;
  if (!rule.isActive) return false;
  if (criteria.quantity < rule.minQty) return false;
  if (rule.maxQty !== null && criteria.quantity > rule.maxQty) return false;
  if (criteria.today < rule.validFrom) return false;
  if (rule.validTo !== null && criteria.today > rule.validTo) return false;

  if (rule.targetUom !== null) {
    // A line without a unit only qualifies for unit-agnostic rules
    if (!criteria.uom || !uomsMatch(rule.targetUom, criteria.uom)) return false;
  }

  if (rule.targetMrp !== null) {
    if (criteria.mrp === null || !mrpsMatch(rule.targetMrp, criteria.mrp)) return false;
  }

  return true;
}

/**
 * Ranking: larger min_qty first (the most specific slab), then the larger
 * benefit, then rule id so the pick is deterministic.
 */
export function compareRules(a: SchemeRuleRecord, b: SchemeRuleRecord): number {
  if (a.minQty !== b.minQty) return b.minQty - a.minQty;
  if (a.benefitValue !== b.benefitValue) return b.benefitValue - a.benefitValue;
  return a.ruleId < b.ruleId ? -1 : a.ruleId > b.ruleId ? 1 : 0;
}

export function pickBestRule(
  rules: readonly SchemeRuleRecord[],
  criteria: SchemeMatchCriteria,
): SchemeRuleRecord | null {
  const candidates = rules.filter((rule) => ruleMatches(rule, criteria));
  if (candidates.length === 0) return null;
  return [...candidates].sort(compareRules)[0] ?? null;
}
