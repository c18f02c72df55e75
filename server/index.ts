/**
 * Library entry for the pricing engine.
 *
 * The Postgres-backed catalog lives in `./storage`, which opens the pool on
 * import; load it separately once DATABASE_URL is validated.
 */

export { PricingEngine } from './services/pricing/PricingService';
export type { PriceLineRequest, PriceLineResult, PricingEngineOptions } from './services/pricing/PricingService';
export type { UnitEntry, MrpTier } from './services/pricing/unitTable';
export type { Clock } from './services/pricing/schemeMatcher';
export { BillDraft } from './services/billing/billDraft';
export type { DraftField, DraftRow, HeldLine, PurchaseLookup, RestoreResult } from './services/billing/billDraft';
export { CatalogSnapshot } from './storage/catalogSnapshot';
export type { CatalogSnapshotData } from './storage/catalogSnapshot';
export type { CatalogStore, CatalogSearchHit } from './catalog/catalogStore';
export { DEFAULT_PRICING_CONFIG, loadPricingConfig } from './config';
export type { PricingConfig } from './config';
export { PRICING_ERRORS, PricingError, classifyPricingError } from './pricingErrors';
export type { PricingErrorCode } from './pricingErrors';
export { logger } from './logger';
export type { Logger, LogContext } from './logger';
export { summarizeBill } from '@shared/billTotals';
export type { BillTotals } from '@shared/billTotals';
export type { LineItem, PricingWarning, AppliedScheme } from '@shared/lineItem';
export type { Variant, ProductRecord, AliasRecord } from '@shared/variant';
export type { SchemeRuleRecord } from '@shared/schemeRules';
