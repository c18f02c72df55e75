/**
 * BillDraft - the billing grid without a UI.
 *
 * Rows hold the operator's free-text cells plus the last priced LineItem.
 * Every edit reprices its row through the PricingEngine. Values the
 * recompute writes back into cells (normalized unit, chosen MRP) would
 * re-trigger it in a reactive grid, so edits arriving while a computation is
 * in flight are dropped (`updating`).
 */

import { logger as rootLogger, type Logger } from '../../logger';
import type { PricingEngine } from '../pricing/PricingService';
import type { UnitEntry } from '../pricing/unitTable';
import { summarizeBill, type BillTotals } from '@shared/billTotals';
import type { LineItem } from '@shared/lineItem';
import { parseNumericCell } from '@shared/numericInput';
import type { Variant } from '@shared/variant';

export type DraftField = 'code' | 'quantity' | 'uom' | 'mrp';

export type DraftRow = {
  code: string;
  quantity: string;
  uom: string;
  mrp: string;
  variant: Variant | null;
  line: LineItem | null;
};

// A line as parked by "hold bill". Restore reprices it against the current
// catalog, so no rate is kept.
export type HeldLine = {
  barcode: string;
  quantity: number | string;
  uom?: string | null;
  mrp?: number | string | null;
};

export type RestoreResult = {
  restored: number;
  unresolved: string[];
};

export type PurchaseLookup = {
  variant: Variant;
  uom: string;
  rate: number;
  mrp: number;
  factor: number;
  units: UnitEntry[];
};

export type BillDraftOptions = {
  engine: PricingEngine;
  billId?: string;
  logger?: Logger;
};

function blankRow(code = ''): DraftRow {
  return { code, quantity: '', uom: '', mrp: '', variant: null, line: null };
}

function optionalNumber(text: string): number | null {
  return text.trim() ? parseNumericCell(text) : null;
}

export class BillDraft {
  private readonly engine: PricingEngine;
  private readonly logger: Logger;
  private rows: DraftRow[] = [];
  private updating = false;

  constructor(options: BillDraftOptions) {
    this.engine = options.engine;
    const base = options.logger ?? rootLogger;
    this.logger = options.billId ? base.child({ billId: options.billId }) : base;
  }

  get isUpdating(): boolean {
    return this.updating;
  }

  get rowCount(): number {
    return this.rows.length;
  }

  row(index: number): Readonly<DraftRow> | undefined {
    return this.rows[index];
  }

  lines(): LineItem[] {
    return this.rows.flatMap((row) => (row.line ? [row.line] : []));
  }

  clear(): void {
    this.rows = [];
  }

  removeRow(index: number): void {
    this.rows.splice(index, 1);
  }

  /**
   * Apply one cell edit and reprice the row.
   *
   * @returns false when the edit arrived while another computation was in flight
   */
  async editCell(index: number, field: DraftField, text: string): Promise<boolean> {
    if (this.updating) {
      this.logger.debug('Edit ignored while pricing is in flight', { row: index, field });
      return false;
    }

    this.updating = true;
    try {
      while (this.rows.length <= index) this.rows.push(blankRow());
      const row = this.rows[index] ?? blankRow();
      this.rows[index] = row;
      row[field] = text;
      // A new unit has its own MRP tiers; the old unit's MRP would pin a stale tier
      if (field === 'uom') row.mrp = '';

      if (field === 'code') {
        await this.scan(index, text);
      } else if (row.variant) {
        await this.reprice(row);
      }
      return true;
    } finally {
      this.updating = false;
    }
  }

  private async scan(index: number, code: string): Promise<void> {
    const variant = code.trim() ? await this.engine.resolve(code) : null;
    if (!variant) {
      this.rows[index] = blankRow(code);
      return;
    }

    const row: DraftRow = {
      code,
      // A freshly scanned alias starts at its load quantity
      quantity: String(variant.loadQuantity),
      uom: variant.uom,
      mrp: String(variant.mrp),
      variant,
      line: null,
    };
    this.rows[index] = row;
    await this.reprice(row);
  }

  private async reprice(row: DraftRow): Promise<void> {
    if (!row.variant) return;

    const result = await this.engine.priceLine({
      variant: row.variant,
      quantity: parseNumericCell(row.quantity),
      uom: row.uom,
      mrp: optionalNumber(row.mrp),
    });

    if (!result.ok) {
      Object.assign(row, blankRow(row.code));
      return;
    }

    row.line = result.line;
    // Reflect normalized values back into the cells
    row.uom = result.line.uom;
    row.mrp = String(result.line.mrp);
  }

  totals(): BillTotals {
    return summarizeBill(this.lines());
  }

  /**
   * Lines to park for "hold bill": the cells needed to price them again.
   */
  holdLines(): HeldLine[] {
    return this.lines()
      .filter((line) => line.quantity > 0)
      .map((line) => ({
        barcode: line.barcode,
        quantity: line.quantity,
        uom: line.uom,
        mrp: line.mrp,
      }));
  }

  /**
   * Replace the draft with held lines, repricing each against the current
   * catalog. Unresolvable barcodes come back as blank rows.
   *
   * @returns null when a computation is already in flight
   */
  async restoreHeldLines(items: readonly HeldLine[]): Promise<RestoreResult | null> {
    if (this.updating) return null;

    this.updating = true;
    try {
      const rows: DraftRow[] = [];
      const unresolved: string[] = [];

      for (const item of items) {
        const variant = await this.engine.resolve(item.barcode);
        if (!variant) {
          unresolved.push(item.barcode);
          rows.push(blankRow(item.barcode));
          continue;
        }

        const row: DraftRow = {
          code: item.barcode,
          quantity: String(parseNumericCell(item.quantity)),
          uom: item.uom ?? variant.uom,
          mrp: item.mrp === null || item.mrp === undefined ? '' : String(parseNumericCell(item.mrp)),
          variant,
          line: null,
        };
        await this.reprice(row);
        rows.push(row);
      }

      this.rows = rows;
      if (unresolved.length > 0) {
        this.logger.warn('Held lines no longer resolve', { unresolved });
      }
      return { restored: rows.length - unresolved.length, unresolved };
    } finally {
      this.updating = false;
    }
  }

  /**
   * Purchase-entry lookup: the catalog rate and MRP for a code, no schemes.
   */
  async lookupForPurchase(token: string): Promise<PurchaseLookup | null> {
    const variant = await this.engine.resolve(token);
    if (!variant) return null;

    return {
      variant,
      uom: variant.uom,
      rate: variant.price,
      mrp: variant.mrp,
      factor: variant.factor,
      units: await this.engine.unitsFor(variant.productId),
    };
  }
}
