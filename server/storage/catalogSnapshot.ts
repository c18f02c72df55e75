import type {
  BarcodeMatch,
  CatalogSearchHit,
  CatalogStore,
  MrpTierRow,
  NameMatchMode,
  ScoredAlias,
  ScoredProduct,
  UnitRows,
} from "../catalog/catalogStore";
import { pickBestRule, type SchemeMatchCriteria, type SchemeRuleRecord } from "@shared/schemeRules";
import { similarity } from "@shared/trigram";
import { buildUomAliasMap, type UomAliasMap, type UomRow } from "@shared/uomNames";
import { aliasMrp, aliasPrice, type AliasRecord, type ProductRecord } from "@shared/variant";

export type CatalogSnapshotData = {
  products: readonly ProductRecord[];
  aliases: readonly AliasRecord[];
  schemeRules: readonly SchemeRuleRecord[];
  uoms: readonly UomRow[];
};

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function containsIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

/**
 * In-process Catalog Store over one frozen copy of the catalog.
 *
 * Every read sees the same rows, so repeated pricing calls against one
 * snapshot are deterministic. Similarity uses the pg_trgm algorithm, so
 * rankings agree with CatalogRepository.
 */
export class CatalogSnapshot implements CatalogStore {
  private readonly products: ProductRecord[];
  private readonly productsById: Map<string, ProductRecord>;
  private readonly aliases: AliasRecord[];
  private readonly schemeRules: SchemeRuleRecord[];
  private readonly uomAliasMap: Map<string, string>;

  constructor(data: CatalogSnapshotData) {
    this.products = data.products.filter((product) => !product.isDeleted).map((product) => ({ ...product }));
    this.productsById = new Map(this.products.map((product) => [product.id, product]));
    this.aliases = data.aliases
      .filter((alias) => this.productsById.has(alias.productId))
      .map((alias) => ({ ...alias }));
    this.schemeRules = data.schemeRules.map((rule) => ({ ...rule }));
    this.uomAliasMap = buildUomAliasMap(data.uoms);
  }

  get productCount(): number {
    return this.products.length;
  }

  private aliasWithProduct(alias: AliasRecord): { alias: AliasRecord; product: ProductRecord } | null {
    const product = this.productsById.get(alias.productId);
    return product ? { alias, product } : null;
  }

  async findByExactBarcode(code: string): Promise<BarcodeMatch | null> {
    const product = this.products.find((candidate) => candidate.barcode === code);
    if (product) return { kind: "product", product };

    const alias = this.aliases.find((candidate) => candidate.barcode === code);
    const joined = alias ? this.aliasWithProduct(alias) : null;
    if (joined) return { kind: "alias", ...joined };

    return null;
  }

  async findProductByName(name: string, mode: NameMatchMode): Promise<ProductRecord | null> {
    const needle = name.toLowerCase();
    const matches = this.products.filter((product) =>
      mode === "exact" ? product.name.toLowerCase() === needle : containsIgnoreCase(product.name, name),
    );
    matches.sort((a, b) => compareText(a.name, b.name) || compareText(a.id, b.id));
    return matches[0] ?? null;
  }

  async findProductsByName(pattern: string, fuzzyThreshold: number, limit: number): Promise<ScoredProduct[]> {
    const scored: ScoredProduct[] = [];
    for (const product of this.products) {
      const nameScore = similarity(product.name, pattern);
      const barcodeScore = similarity(product.barcode, pattern);
      if (nameScore > fuzzyThreshold || barcodeScore > fuzzyThreshold) {
        scored.push({ product, score: Math.max(nameScore, barcodeScore) });
      }
    }
    scored.sort((a, b) => b.score - a.score || compareText(a.product.name, b.product.name));
    return scored.slice(0, limit);
  }

  async findAliasesByBarcode(pattern: string, fuzzyThreshold: number, limit: number): Promise<ScoredAlias[]> {
    const scored: ScoredAlias[] = [];
    for (const alias of this.aliases) {
      const joined = this.aliasWithProduct(alias);
      if (!joined) continue;
      const score = similarity(alias.barcode, pattern);
      if (score > fuzzyThreshold) scored.push({ ...joined, score });
    }
    scored.sort((a, b) => b.score - a.score || compareText(a.alias.barcode, b.alias.barcode));
    return scored.slice(0, limit);
  }

  async searchCatalog(query: string, fuzzyThreshold: number, limit: number): Promise<CatalogSearchHit[]> {
    const rows: CatalogSearchHit[] = [];

    for (const product of this.products) {
      rows.push({
        productId: product.id,
        aliasId: null,
        name: product.name,
        barcode: product.barcode,
        uom: product.baseUom,
        price: product.price,
        mrp: product.mrp,
        category: product.category,
        nameSimilarity: similarity(product.name, query),
        barcodeSimilarity: similarity(product.barcode, query),
      });
    }

    for (const alias of this.aliases) {
      const joined = this.aliasWithProduct(alias);
      if (!joined) continue;
      rows.push({
        productId: joined.product.id,
        aliasId: alias.id,
        name: joined.product.name,
        barcode: alias.barcode,
        uom: alias.uom,
        price: aliasPrice(alias, joined.product),
        mrp: aliasMrp(alias, joined.product),
        category: joined.product.category,
        nameSimilarity: similarity(joined.product.name, query),
        barcodeSimilarity: similarity(alias.barcode, query),
      });
    }

    return rows
      .filter((row) =>
        row.nameSimilarity > fuzzyThreshold ||
        row.barcodeSimilarity > fuzzyThreshold ||
        containsIgnoreCase(row.name, query) ||
        containsIgnoreCase(row.barcode, query),
      )
      .sort((a, b) =>
        Math.max(b.nameSimilarity, b.barcodeSimilarity) - Math.max(a.nameSimilarity, a.barcodeSimilarity) ||
        compareText(a.name, b.name),
      )
      .slice(0, limit);
  }

  async listUnits(productId: string): Promise<UnitRows | null> {
    const product = this.productsById.get(productId);
    if (!product) return null;
    return {
      product,
      aliases: this.aliases.filter((alias) => alias.productId === productId),
    };
  }

  async listMrpVariants(productId: string, uom: string): Promise<MrpTierRow[]> {
    const product = this.productsById.get(productId);
    if (!product) return [];

    const tiers: MrpTierRow[] = [];
    if (product.baseUom === uom) {
      tiers.push({ mrp: product.mrp, price: product.price });
    }
    for (const alias of this.aliases) {
      if (alias.productId === productId && alias.uom === uom) {
        tiers.push({ mrp: aliasMrp(alias, product), price: aliasPrice(alias, product) });
      }
    }
    return tiers;
  }

  async findBestSchemeRule(criteria: SchemeMatchCriteria): Promise<SchemeRuleRecord | null> {
    return pickBestRule(this.schemeRules, criteria);
  }

  async getUomAliasMap(): Promise<UomAliasMap> {
    return this.uomAliasMap;
  }
}
