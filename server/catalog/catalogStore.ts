/**
 * Catalog Store contract
 *
 * The narrow, read-only surface the pricing engine needs from the catalog.
 * Implemented by CatalogRepository (PostgreSQL via Drizzle, pg_trgm for
 * similarity) and CatalogSnapshot (in-process, one catalog snapshot).
 *
 * Implementations exclude soft-deleted products from every read.
 */

import type { AliasRecord, ProductRecord } from "@shared/variant";
import type { SchemeMatchCriteria, SchemeRuleRecord } from "@shared/schemeRules";
import type { UomAliasMap } from "@shared/uomNames";

export type BarcodeMatch =
  | { kind: "product"; product: ProductRecord }
  | { kind: "alias"; alias: AliasRecord; product: ProductRecord };

export type NameMatchMode = "exact" | "contains";

export type ScoredProduct = {
  product: ProductRecord;
  // max(similarity(name), similarity(barcode))
  score: number;
};

export type ScoredAlias = {
  alias: AliasRecord;
  product: ProductRecord;
  score: number;
};

export type CatalogSearchHit = {
  productId: string;
  aliasId: string | null;
  name: string;
  barcode: string;
  uom: string;
  price: number;
  mrp: number;
  category: string | null;
  nameSimilarity: number;
  barcodeSimilarity: number;
};

export type UnitRows = {
  product: ProductRecord;
  aliases: AliasRecord[];
};

export type MrpTierRow = {
  mrp: number;
  price: number;
};

export interface CatalogStore {
  findByExactBarcode(code: string): Promise<BarcodeMatch | null>;

  /** exact = case-insensitive equality; contains = case-insensitive substring, first by name */
  findProductByName(name: string, mode: NameMatchMode): Promise<ProductRecord | null>;

  /** Products scoring strictly above the threshold, best first. */
  findProductsByName(pattern: string, fuzzyThreshold: number, limit: number): Promise<ScoredProduct[]>;

  /** Aliases whose barcode scores strictly above the threshold, best first. */
  findAliasesByBarcode(pattern: string, fuzzyThreshold: number, limit: number): Promise<ScoredAlias[]>;

  searchCatalog(query: string, fuzzyThreshold: number, limit: number): Promise<CatalogSearchHit[]>;

  /** null when the product is missing or soft-deleted */
  listUnits(productId: string): Promise<UnitRows | null>;

  /** Base row first (when its unit matches), then alias rows, prices derived. */
  listMrpVariants(productId: string, uom: string): Promise<MrpTierRow[]>;

  findBestSchemeRule(criteria: SchemeMatchCriteria): Promise<SchemeRuleRecord | null>;

  getUomAliasMap(): Promise<UomAliasMap>;
}
