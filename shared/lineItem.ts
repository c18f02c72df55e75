import type { SchemeBenefitType } from "./schema";

export type PricingWarningCode = "AMBIGUOUS_UNIT" | "MULTI_HOP_SCHEME_UOM";

export type PricingWarning = {
  code: PricingWarningCode;
  message: string;
};

export type AppliedScheme = {
  schemeId: string;
  schemeName: string;
  ruleId: string;
  benefitType: SchemeBenefitType;
  benefitValue: number;
};

/**
 * One priced bill line. `rate` is the quoted unit rate (per kilogram on gram
 * lines); `effectiveRate` is what one sold unit costs.
 */
export type LineItem = {
  productId: string;
  name: string;
  barcode: string;
  uom: string;
  quantity: number;
  rate: number;
  effectiveRate: number;
  mrp: number;
  factor: number;
  isAlias: boolean;
  gross: number;
  discount: number;
  discountPercent: number;
  lineAmount: number;
  savings: number;
  scheme: AppliedScheme | null;
  warnings: readonly PricingWarning[];
};
