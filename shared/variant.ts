/**
 * Catalog records and the resolved Variant.
 *
 * Records are the numeric (already parsed) view of `products` and
 * `product_aliases` rows. A Variant unifies "the product itself" and "one of
 * its packaging aliases" behind named fields, tagged by `isAlias`.
 */

export type ProductRecord = {
  id: string;
  name: string;
  barcode: string;
  baseUom: string;
  price: number;
  mrp: number;
  category: string | null;
  isDeleted: boolean;
  deletedAt: Date | null;
};

export type AliasRecord = {
  id: string;
  productId: string;
  barcode: string;
  uom: string;
  price: number | null;
  mrp: number | null;
  factor: number;
  qty: number;
};

type VariantFields = {
  productId: string;
  displayName: string;
  barcode: string;
  uom: string;
  price: number;
  mrp: number;
  factor: number;
  loadQuantity: number;
  category: string | null;
  baseUom: string;
  basePrice: number;
  baseMrp: number;
};

export type BaseVariant = VariantFields & { isAlias: false };
export type AliasVariant = VariantFields & { isAlias: true; aliasId: string };
export type Variant = BaseVariant | AliasVariant;

/**
 * Alias price, falling back to base price x factor when none is stored or the
 * stored price is zero. Evaluated on every read so base price edits flow through.
 */
export function aliasPrice(alias: AliasRecord, product: ProductRecord): number {
  return alias.price ? alias.price : product.price * alias.factor;
}

export function aliasMrp(alias: AliasRecord, product: ProductRecord): number {
  return alias.mrp ? alias.mrp : product.mrp * alias.factor;
}

export function variantFromProduct(product: ProductRecord): BaseVariant {
  return {
    isAlias: false,
    productId: product.id,
    displayName: product.name,
    barcode: product.barcode,
    uom: product.baseUom,
    price: product.price,
    mrp: product.mrp,
    factor: 1,
    loadQuantity: 1,
    category: product.category,
    baseUom: product.baseUom,
    basePrice: product.price,
    baseMrp: product.mrp,
  };
}

export function variantFromAlias(alias: AliasRecord, product: ProductRecord): AliasVariant {
  return {
    isAlias: true,
    aliasId: alias.id,
    productId: product.id,
    displayName: product.name,
    barcode: alias.barcode,
    uom: alias.uom,
    price: aliasPrice(alias, product),
    mrp: aliasMrp(alias, product),
    factor: alias.factor,
    loadQuantity: alias.qty,
    category: product.category,
    baseUom: product.baseUom,
    basePrice: product.price,
    baseMrp: product.mrp,
  };
}
