/**
 * Unit Table - per-product UOM -> { price, mrp, factor } entries
 *
 * The base unit (factor 1) always comes first, followed by one entry per
 * alias row. Alias prices and MRPs without a stored value are derived from
 * the base row on every read, so base price edits propagate.
 */

import type { CatalogStore } from '../../catalog/catalogStore';
import { normalizeUom } from '@shared/uomNames';
import { aliasMrp, aliasPrice } from '@shared/variant';

export type UnitEntry = {
  uom: string;
  price: number;
  mrp: number;
  factor: number;
  isBase: boolean;
  aliasId: string | null;
  barcode: string;
  loadQuantity: number;
};

export type MrpTier = {
  mrp: number;
  price: number;
};

export class UnitTable {
  constructor(private readonly store: CatalogStore) { }

  /** Empty when the product is missing or soft-deleted. */
  async unitsFor(productId: string): Promise<UnitEntry[]> {
    const rows = await this.store.listUnits(productId);
    if (!rows) return [];

    const { product, aliases } = rows;
    const entries: UnitEntry[] = [{
      uom: product.baseUom,
      price: product.price,
      mrp: product.mrp,
      factor: 1,
      isBase: true,
      aliasId: null,
      barcode: product.barcode,
      loadQuantity: 1,
    }];

    for (const alias of aliases) {
      entries.push({
        uom: alias.uom,
        price: aliasPrice(alias, product),
        mrp: aliasMrp(alias, product),
        factor: alias.factor,
        isBase: false,
        aliasId: alias.id,
        barcode: alias.barcode,
        loadQuantity: alias.qty,
      });
    }

    return entries;
  }

  /**
   * Exact (case-sensitive) UOM match; the base unit wins over an alias that
   * shares its UOM name. Normalize typed text with `normalizeUom` first.
   */
  async lookup(productId: string, uom: string): Promise<UnitEntry | null> {
    const entries = await this.unitsFor(productId);
    return entries.find((entry) => entry.uom === uom) ?? null;
  }

  /** Distinct { mrp, price } tiers for one product+UOM, base first. */
  async mrpVariants(productId: string, uom: string): Promise<MrpTier[]> {
    const rows = await this.store.listMrpVariants(productId, uom);
    const seen = new Set<string>();
    const tiers: MrpTier[] = [];

    for (const row of rows) {
      const key = `${row.mrp.toFixed(3)}|${row.price.toFixed(3)}`;
      if (seen.has(key)) continue;
      seen.add(key);
      tiers.push({ mrp: row.mrp, price: row.price });
    }

    return tiers;
  }

  async normalizeUom(text: string | null | undefined): Promise<string> {
    const trimmed = String(text ?? '').trim();
    if (!trimmed) return '';
    return normalizeUom(trimmed, await this.store.getUomAliasMap());
  }
}
