/**
 * PricingService - turns a scanned code (or resolved Variant), quantity,
 * chosen unit and chosen MRP into one priced, immutable LineItem.
 *
 * Shared by billing-grid recompute, purchase-entry lookup and held-bill
 * restore. The engine holds no UI state; the "suppress updates while
 * pricing" guard belongs to the caller (see billing/billDraft.ts).
 */

import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';
import type { CatalogSearchHit, CatalogStore } from '../../catalog/catalogStore';
import { DEFAULT_PRICING_CONFIG, type PricingConfig } from '../../config';
import { logger as rootLogger, type Logger } from '../../logger';
import { PRICING_ERRORS, PricingError, createSafeErrorContext } from '../../pricingErrors';
import { IdentityResolver } from './identityResolver';
import { SchemeMatcher, type Clock } from './schemeMatcher';
import { UnitTable, type MrpTier, type UnitEntry } from './unitTable';
import type { LineItem, PricingWarning } from '@shared/lineItem';
import { mrpsMatch, type SchemeRuleRecord } from '@shared/schemeRules';
import { isSubGramUom, perSoldUnit, round2dp } from '@shared/uomNames';
import type { Variant } from '@shared/variant';

// ============================================================================
// Types
// ============================================================================

export type PriceLineRequest = {
  token?: string;
  variant?: Variant;
  quantity: number;
  uom?: string | null;
  mrp?: number | null;
};

export type PriceLineResult =
  | { ok: true; line: LineItem }
  | { ok: false; code: 'UNRESOLVED_PRODUCT'; message: string };

export type PricingEngineOptions = {
  store: CatalogStore;
  config?: PricingConfig;
  clock?: Clock;
  logger?: Logger;
};

// The unit a line is billed in, after unit and MRP-tier selection
type LineUnit = {
  uom: string;
  rate: number;
  mrp: number;
  factor: number;
  isAlias: boolean;
  barcode: string;
};

function isVariant(value: unknown): value is Variant {
  return typeof value === 'object' && value !== null &&
    'productId' in value && typeof value.productId === 'string' &&
    'isAlias' in value && typeof value.isAlias === 'boolean' &&
    'uom' in value && typeof value.uom === 'string' &&
    'price' in value && typeof value.price === 'number';
}

const priceLineRequestSchema = z.object({
  token: z.string().optional(),
  variant: z.custom<Variant>(isVariant, { message: 'variant must be a resolved Variant' }).optional(),
  quantity: z.number().finite(),
  uom: z.string().nullish(),
  mrp: z.number().finite().nullish(),
}).refine(
  (request) => request.variant !== undefined || request.token !== undefined,
  { message: 'Either token or variant is required', path: ['token'] },
);

function unitFromEntry(entry: UnitEntry): LineUnit {
  return {
    uom: entry.uom,
    rate: entry.price,
    mrp: entry.mrp,
    factor: entry.factor,
    isAlias: !entry.isBase,
    barcode: entry.barcode,
  };
}

// ============================================================================
// Engine
// ============================================================================

export class PricingEngine {
  readonly resolver: IdentityResolver;
  readonly units: UnitTable;
  readonly schemes: SchemeMatcher;
  private readonly logger: Logger;

  constructor(options: PricingEngineOptions) {
    const config = options.config ?? DEFAULT_PRICING_CONFIG;
    this.resolver = new IdentityResolver(options.store, config);
    this.units = new UnitTable(options.store);
    this.schemes = new SchemeMatcher(options.store, {
      clock: options.clock,
      timeZone: config.schemeTimeZone,
    });
    this.logger = options.logger ?? rootLogger;
  }

  /**
   * Run one catalog read. Store failures surface as STORE_UNAVAILABLE and are
   * never retried here; retry policy belongs to the store client.
   */
  private async fromStore<T>(operation: string, read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error) {
      if (error instanceof PricingError) throw error;
      this.logger.error('Catalog store read failed', { operation, ...createSafeErrorContext(error) });
      throw new PricingError('STORE_UNAVAILABLE', `Catalog store failed during ${operation}`, { cause: error });
    }
  }

  // Catalog reads for callers (purchase entry, UOM/MRP pickers, search box)
  async resolve(token: string): Promise<Variant | null> {
    return this.fromStore('resolve', () => this.resolver.resolve(token));
  }

  async search(query: string): Promise<CatalogSearchHit[]> {
    return this.fromStore('search', () => this.resolver.search(query));
  }

  async unitsFor(productId: string): Promise<UnitEntry[]> {
    return this.fromStore('unitsFor', () => this.units.unitsFor(productId));
  }

  async lookup(productId: string, uom: string): Promise<UnitEntry | null> {
    return this.fromStore('lookup', () => this.units.lookup(productId, uom));
  }

  async mrpVariants(productId: string, uom: string): Promise<MrpTier[]> {
    return this.fromStore('mrpVariants', () => this.units.mrpVariants(productId, uom));
  }

  async normalizeUom(text: string | null | undefined): Promise<string> {
    return this.fromStore('normalizeUom', () => this.units.normalizeUom(text));
  }

  async bestRule(productId: string, quantity: number, uom: string | null, mrp: number | null): Promise<SchemeRuleRecord | null> {
    return this.fromStore('bestRule', () => this.schemes.bestRule(productId, quantity, uom, mrp));
  }

  // ==========================================================================
  // priceLine
  // ==========================================================================

  /**
   * Price one bill line.
   *
   * Zero and negative quantities are priced like any other; callers leave
   * them out of bill totals.
   *
   * @throws PricingError INVALID_REQUEST for a malformed request,
   *         STORE_UNAVAILABLE when a catalog read fails
   */
  async priceLine(request: PriceLineRequest): Promise<PriceLineResult> {
    const parsed = priceLineRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new PricingError('INVALID_REQUEST', fromZodError(parsed.error).message);
    }
    const input = parsed.data;

    // Step 1: Identity
    const variant = input.variant ?? await this.resolve(input.token ?? '');
    if (!variant) {
      this.logger.debug('Code did not resolve to a product', { code: input.token });
      return {
        ok: false,
        code: 'UNRESOLVED_PRODUCT',
        message: PRICING_ERRORS.UNRESOLVED_PRODUCT.userMessage,
      };
    }

    const log = this.logger.child({ productId: variant.productId });
    const warnings: PricingWarning[] = [];
    const quantity = input.quantity;

    // Step 2: Unit and MRP tier
    let unit = await this.chooseUnit(variant, input.uom, warnings, log);
    unit = await this.chooseMrpTier(variant, unit, input.mrp);

    // Step 3: Scheme (may switch the line to the rule's unit once)
    const matched = await this.matchScheme(variant, unit, quantity, warnings, log);
    unit = matched.unit;
    const rule = matched.rule;

    // Step 4: Amounts
    let rate = unit.rate;
    let effectiveRate = perSoldUnit(rate, unit.uom);
    let gross = quantity * effectiveRate;
    let discount = 0;

    if (rule) {
      switch (rule.benefitType) {
        case 'absolute_rate':
          rate = rule.benefitValue;
          effectiveRate = perSoldUnit(rate, unit.uom);
          gross = quantity * effectiveRate;
          break;
        case 'percent':
          discount = gross * rule.benefitValue / 100;
          break;
        case 'amount':
          discount = quantity * perSoldUnit(rule.benefitValue, unit.uom);
          break;
      }
    }

    const lineAmount = round2dp(gross - discount);
    const effectiveMrp = perSoldUnit(unit.mrp, unit.uom);

    const line: LineItem = {
      productId: variant.productId,
      name: variant.displayName,
      barcode: unit.barcode,
      uom: unit.uom,
      quantity,
      rate,
      effectiveRate,
      mrp: unit.mrp,
      factor: unit.factor,
      isAlias: unit.isAlias,
      gross: round2dp(gross),
      discount: round2dp(discount),
      discountPercent: gross !== 0 ? round2dp(discount / gross * 100) : 0,
      lineAmount,
      savings: Math.max(0, round2dp(quantity * effectiveMrp - lineAmount)),
      scheme: rule
        ? Object.freeze({
          schemeId: rule.schemeId,
          schemeName: rule.schemeName,
          ruleId: rule.ruleId,
          benefitType: rule.benefitType,
          benefitValue: rule.benefitValue,
        })
        : null,
      warnings: Object.freeze(warnings),
    };

    log.debug('Line priced', {
      uom: line.uom,
      quantity,
      lineAmount,
      ruleId: line.scheme?.ruleId ?? null,
      warnings: warnings.length,
    });

    return { ok: true, line: Object.freeze(line) };
  }

  // ==========================================================================
  // Steps
  // ==========================================================================

  private async chooseUnit(
    variant: Variant,
    requestedUom: string | null | undefined,
    warnings: PricingWarning[],
    log: Logger,
  ): Promise<LineUnit> {
    const current: LineUnit = {
      uom: variant.uom,
      rate: variant.price,
      mrp: variant.mrp,
      factor: variant.factor,
      isAlias: variant.isAlias,
      barcode: variant.barcode,
    };

    const uom = await this.normalizeUom(requestedUom);
    if (!uom || uom === variant.uom) return current;

    const entry = await this.lookup(variant.productId, uom);
    if (entry) return unitFromEntry(entry);

    // Gram lines are priced off the per-kilogram rate; anything else is a data gap
    if (!isSubGramUom(uom)) {
      warnings.push({
        code: 'AMBIGUOUS_UNIT',
        message: `Unit "${uom}" is not set up for ${variant.displayName}; kept rate ${variant.price}`,
      });
      log.warn('Unknown unit, keeping last known rate', { uom, rate: variant.price });
    }
    return { ...current, uom };
  }

  private async chooseMrpTier(
    variant: Variant,
    unit: LineUnit,
    chosenMrp: number | null | undefined,
  ): Promise<LineUnit> {
    if (chosenMrp === null || chosenMrp === undefined) return unit;

    const tiers = await this.mrpVariants(variant.productId, unit.uom);
    const tier = tiers.find((candidate) => mrpsMatch(candidate.mrp, chosenMrp));
    return tier
      ? { ...unit, rate: tier.price, mrp: tier.mrp }
      : { ...unit, mrp: chosenMrp };
  }

  private async matchScheme(
    variant: Variant,
    unit: LineUnit,
    quantity: number,
    warnings: PricingWarning[],
    log: Logger,
  ): Promise<{ rule: SchemeRuleRecord | null; unit: LineUnit }> {
    const rule = await this.bestRule(variant.productId, quantity, unit.uom, unit.mrp);
    if (!rule || rule.targetUom === null || rule.targetUom === unit.uom) {
      return { rule, unit };
    }

    // The rule names the unit under another spelling: bill in the rule's unit
    // when the product has it, then match once more.
    const entry = await this.lookup(variant.productId, rule.targetUom);
    if (!entry) return { rule, unit };

    const switched = unitFromEntry(entry);
    const rerun = await this.bestRule(variant.productId, quantity, switched.uom, switched.mrp);

    if (rerun && rerun.targetUom !== null && rerun.targetUom !== switched.uom) {
      warnings.push({
        code: 'MULTI_HOP_SCHEME_UOM',
        message: `Scheme "${rerun.schemeName}" targets unit "${rerun.targetUom}"; only one unit switch is followed`,
      });
      log.warn('Multi-hop scheme unit chain not followed', {
        fromUom: unit.uom,
        toUom: switched.uom,
        nextUom: rerun.targetUom,
        ruleId: rerun.ruleId,
      });
    }

    return { rule: rerun, unit: switched };
  }
}
