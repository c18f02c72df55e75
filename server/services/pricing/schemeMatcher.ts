import type { CatalogStore } from '../../catalog/catalogStore';
import { toIsoDate, type SchemeRuleRecord } from '@shared/schemeRules';

export type Clock = () => Date;

export type SchemeMatcherOptions = {
  clock?: Clock;
  // IANA zone for "today"; the process zone when omitted
  timeZone?: string;
};

/**
 * Finds the single best active scheme rule for a line.
 * Filtering and ranking live in the store (SQL or `pickBestRule`); this
 * class pins the calendar day the rule windows are checked against.
 */
export class SchemeMatcher {
  private readonly clock: Clock;
  private readonly timeZone: string | undefined;

  constructor(private readonly store: CatalogStore, options: SchemeMatcherOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.timeZone = options.timeZone;
  }

  today(): string {
    return toIsoDate(this.clock(), this.timeZone);
  }

  async bestRule(
    productId: string,
    quantity: number,
    uom: string | null,
    mrp: number | null,
  ): Promise<SchemeRuleRecord | null> {
    return this.store.findBestSchemeRule({
      productId,
      quantity,
      uom: uom || null,
      mrp,
      today: this.today(),
    });
  }
}
