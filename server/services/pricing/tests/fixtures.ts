import { jest } from "@jest/globals";
import { DEFAULT_PRICING_CONFIG, type PricingConfig } from "../../../config";
import type { Logger } from "../../../logger";
import { CatalogSnapshot } from "../../../storage/catalogSnapshot";
import { PricingEngine } from "../PricingService";
import type { SchemeRuleRecord } from "@shared/schemeRules";
import type { UomRow } from "@shared/uomNames";
import type { AliasRecord, ProductRecord } from "@shared/variant";

// Catalog day for every pricing test (UTC)
export const TODAY = "2026-06-15";
export const fixedClock = () => new Date("2026-06-15T12:00:00Z");

export const TEST_CONFIG: PricingConfig = { ...DEFAULT_PRICING_CONFIG, schemeTimeZone: "UTC" };

function product(overrides: Partial<ProductRecord> & Pick<ProductRecord, "id" | "name" | "barcode" | "price">): ProductRecord {
  return {
    baseUom: "pcs",
    mrp: 0,
    category: "General",
    isDeleted: false,
    deletedAt: null,
    ...overrides,
  };
}

function alias(overrides: Partial<AliasRecord> & Pick<AliasRecord, "id" | "productId" | "barcode" | "uom">): AliasRecord {
  return {
    price: null,
    mrp: null,
    factor: 1,
    qty: 1,
    ...overrides,
  };
}

export const RICE = product({ id: "p-rice", name: "Rice", barcode: "RICE01", baseUom: "kg", price: 110, mrp: 120, category: "Grocery" });
export const SUGAR = product({ id: "p-sugar", name: "Sugar", barcode: "SUG01", baseUom: "kg", price: 45, mrp: 50 });
export const BRAN_OIL = product({ id: "p-bran", name: "Rice Bran Oil", barcode: "RBO01", baseUom: "ltr", price: 180, mrp: 195 });
export const SUNFLOWER_OIL = product({ id: "p-oil", name: "Sunflower Oil 1L", barcode: "OIL1L", baseUom: "ltr", price: 150, mrp: 165 });
export const NOODLES = product({ id: "p-noodles", name: "Instant Noodles", barcode: "NOOD70", price: 12, mrp: 14 });
export const ATTA = product({ id: "p-atta", name: "Wheat Atta", barcode: "ATTA01", baseUom: "kg", price: 40, mrp: 45 });
export const OLD_BISCUIT = product({
  id: "p-old",
  name: "Old Biscuit",
  barcode: "BIS01",
  price: 10,
  mrp: 12,
  isDeleted: true,
  deletedAt: new Date("2026-05-01T00:00:00Z"),
});

export const RICE_5KG = alias({ id: "a-rice-5kg", productId: "p-rice", barcode: "RICE5KG", uom: "kg", price: 540, factor: 5, qty: 5 });
export const NOODLES_BOX = alias({ id: "a-nood-box", productId: "p-noodles", barcode: "NOODBOX12", uom: "box", factor: 12 });
// Explicit zero price: reads as base price x factor
export const NOODLES_PACK = alias({ id: "a-nood-pkt", productId: "p-noodles", barcode: "NOODPK6", uom: "pkt", price: 0, mrp: 84, factor: 6 });
// An older batch on the shelf at a lower printed MRP
export const OIL_OLD_BATCH = alias({ id: "a-oil-old", productId: "p-oil", barcode: "OIL1L-OLD", uom: "ltr", price: 140, mrp: 155 });
export const OIL_SAME_TIER = alias({ id: "a-oil-dup", productId: "p-oil", barcode: "OIL1L-DUP", uom: "ltr", price: 150, mrp: 165 });
export const ATTA_SACK = alias({ id: "a-atta-sack", productId: "p-atta", barcode: "ATTA-SACK", uom: "KG", price: 900, mrp: 1000, factor: 25 });
export const BISCUIT_CASE = alias({ id: "a-bis-case", productId: "p-old", barcode: "BISCASE", uom: "box", factor: 24 });

export const PRODUCTS = [RICE, SUGAR, BRAN_OIL, SUNFLOWER_OIL, NOODLES, ATTA, OLD_BISCUIT];
export const ALIASES = [RICE_5KG, NOODLES_BOX, NOODLES_PACK, OIL_OLD_BATCH, OIL_SAME_TIER, ATTA_SACK, BISCUIT_CASE];

export const UOMS: UomRow[] = [
  { name: "pcs" },
  { name: "kg", alias: "kilo" },
  { name: "g", alias: "gm" },
  { name: "ltr", alias: "l" },
  { name: "box", alias: "bx" },
  { name: "pkt" },
];

export function rule(overrides: Partial<SchemeRuleRecord> & Pick<SchemeRuleRecord, "ruleId" | "productId">): SchemeRuleRecord {
  return {
    schemeId: "s-1",
    schemeName: "Test Scheme",
    isActive: true,
    validFrom: "2026-01-01",
    validTo: null,
    minQty: 0,
    maxQty: null,
    targetUom: null,
    targetMrp: null,
    benefitType: "percent",
    benefitValue: 0,
    ...overrides,
  };
}

export function buildSnapshot(schemeRules: SchemeRuleRecord[] = []): CatalogSnapshot {
  return new CatalogSnapshot({ products: PRODUCTS, aliases: ALIASES, schemeRules, uoms: UOMS });
}

export function createTestLogger(): Logger & {
  warn: jest.Mock<Logger["warn"]>;
  error: jest.Mock<Logger["error"]>;
} {
  const testLogger = {
    debug: jest.fn<Logger["debug"]>(),
    info: jest.fn<Logger["info"]>(),
    warn: jest.fn<Logger["warn"]>(),
    error: jest.fn<Logger["error"]>(),
    child: jest.fn<Logger["child"]>(),
  };
  testLogger.child.mockReturnValue(testLogger);
  return testLogger;
}

export function buildEngine(schemeRules: SchemeRuleRecord[] = [], logger: Logger = createTestLogger()): PricingEngine {
  return new PricingEngine({
    store: buildSnapshot(schemeRules),
    config: TEST_CONFIG,
    clock: fixedClock,
    logger,
  });
}
