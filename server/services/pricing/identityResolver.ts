/**
 * Identity Resolver - scanned code or typed fragment -> one Variant
 *
 * Tiers, first tier with a candidate wins:
 *   1. exact product barcode
 *   2. exact alias barcode
 *   3. exact product name (case-insensitive)
 *   4. product name substring (case-insensitive), first by name
 *   5. trigram similarity over product name/barcode and alias barcode
 */

import type { CatalogSearchHit, CatalogStore } from '../../catalog/catalogStore';
import { DEFAULT_PRICING_CONFIG, type PricingConfig } from '../../config';
import { variantFromAlias, variantFromProduct, type Variant } from '@shared/variant';

export type ResolverConfig = Pick<PricingConfig, 'resolveFuzzyThreshold' | 'searchFuzzyThreshold' | 'searchLimit'>;

export class IdentityResolver {
  constructor(
    private readonly store: CatalogStore,
    private readonly config: ResolverConfig = DEFAULT_PRICING_CONFIG,
  ) { }

  /** null when no tier yields a candidate */
  async resolve(token: string): Promise<Variant | null> {
    const code = token.trim();
    if (!code) return null;

    const exact = await this.store.findByExactBarcode(code);
    if (exact) {
      return exact.kind === 'product'
        ? variantFromProduct(exact.product)
        : variantFromAlias(exact.alias, exact.product);
    }

    const byName = await this.store.findProductByName(code, 'exact')
      ?? await this.store.findProductByName(code, 'contains');
    if (byName) return variantFromProduct(byName);

    return this.resolveFuzzy(code);
  }

  private async resolveFuzzy(code: string): Promise<Variant | null> {
    const threshold = this.config.resolveFuzzyThreshold;
    const [bestProduct] = await this.store.findProductsByName(code, threshold, 1);
    const [bestAlias] = await this.store.findAliasesByBarcode(code, threshold, 1);

    // Ties go to the base variant
    if (bestAlias && (!bestProduct || bestAlias.score > bestProduct.score)) {
      return variantFromAlias(bestAlias.alias, bestAlias.product);
    }
    return bestProduct ? variantFromProduct(bestProduct.product) : null;
  }

  /** Ranked catalog search (looser threshold, capped), not a single pick. */
  async search(query: string): Promise<CatalogSearchHit[]> {
    const text = query.trim();
    if (!text) return [];
    return this.store.searchCatalog(text, this.config.searchFuzzyThreshold, this.config.searchLimit);
  }
}
