import { beforeEach, describe, expect, test } from "@jest/globals";
import { BillDraft } from "../services/billing/billDraft";
import { buildEngine, createTestLogger, rule } from "../services/pricing/tests/fixtures";

describe("BillDraft", () => {
  let logger: ReturnType<typeof createTestLogger>;
  let draft: BillDraft;

  beforeEach(() => {
    logger = createTestLogger();
    draft = new BillDraft({ engine: buildEngine(), billId: "bill-1", logger });
  });

  test("scanning an alias starts the line at its load quantity", async () => {
    expect(await draft.editCell(0, "code", "RICE5KG")).toBe(true);

    const row = draft.row(0);
    expect(row?.quantity).toBe("5");
    expect(row?.uom).toBe("kg");
    expect(row?.mrp).toBe("600");
    expect(row?.line?.rate).toBe(540);
    expect(row?.line?.lineAmount).toBe(2700);
  });

  test("scanning a base barcode starts at one unit", async () => {
    await draft.editCell(0, "code", "RICE01");

    expect(draft.row(0)?.quantity).toBe("1");
    expect(draft.row(0)?.line?.lineAmount).toBe(110);
  });

  test("quantity edits reprice the row", async () => {
    await draft.editCell(0, "code", "RICE01");
    await draft.editCell(0, "quantity", "2");

    expect(draft.row(0)?.line?.lineAmount).toBe(220);
  });

  test("unit edits are written back normalized", async () => {
    await draft.editCell(0, "code", "RICE01");
    await draft.editCell(0, "uom", "kilo");

    expect(draft.row(0)?.uom).toBe("kg");
    expect(draft.row(0)?.line?.warnings).toEqual([]);
  });

  test("a malformed quantity zeroes the line instead of failing", async () => {
    await draft.editCell(0, "code", "RICE01");
    await draft.editCell(0, "quantity", "two");

    expect(draft.row(0)?.line?.quantity).toBe(0);
    expect(draft.row(0)?.line?.lineAmount).toBe(0);
    expect(draft.totals().lineCount).toBe(0);
  });

  test("an unresolved code blanks the row", async () => {
    await draft.editCell(0, "code", "RICE01");
    await draft.editCell(0, "code", "NOPE-XYZ");

    expect(draft.row(0)).toEqual({ code: "NOPE-XYZ", quantity: "", uom: "", mrp: "", variant: null, line: null });
  });

  test("edits on a row without a product only store the text", async () => {
    expect(await draft.editCell(2, "quantity", "4")).toBe(true);

    expect(draft.rowCount).toBe(3);
    expect(draft.row(2)?.quantity).toBe("4");
    expect(draft.row(2)?.line).toBeNull();
  });

  test("edits arriving while a computation is in flight are dropped", async () => {
    const first = draft.editCell(0, "code", "RICE01");
    expect(draft.isUpdating).toBe(true);

    expect(await draft.editCell(1, "code", "SUG01")).toBe(false);
    expect(await first).toBe(true);
    expect(draft.isUpdating).toBe(false);
    expect(draft.rowCount).toBe(1);
  });

  test("totals round the bill, not the lines", async () => {
    await draft.editCell(0, "code", "RICE01");
    await draft.editCell(0, "quantity", "2");
    await draft.editCell(1, "code", "SUG01");
    await draft.editCell(1, "quantity", "1.5");
    await draft.editCell(2, "code", "NOOD70");
    await draft.editCell(2, "quantity", "0");

    expect(draft.totals()).toEqual({
      lineCount: 2,
      totalQuantity: 3.5,
      subtotal: 287.5,
      total: 288,
      roundOff: 0.5,
      totalSavings: 27.5,
    });
  });

  test("held lines are repriced against the current schemes on restore", async () => {
    const schemeDraft = new BillDraft({
      engine: buildEngine([rule({ ruleId: "r-rice", productId: "p-rice", minQty: 5, benefitValue: 10 })]),
      logger,
    });
    await schemeDraft.editCell(0, "code", "RICE01");
    await schemeDraft.editCell(0, "quantity", "6");
    await schemeDraft.editCell(1, "code", "SUG01");
    await schemeDraft.editCell(1, "quantity", "0");

    const held = schemeDraft.holdLines();
    expect(held).toEqual([{ barcode: "RICE01", quantity: 6, uom: "kg", mrp: 120 }]);

    // Recalled on a till where the offer no longer runs
    expect(await draft.restoreHeldLines(held)).toEqual({ restored: 1, unresolved: [] });
    expect(draft.row(0)?.line?.scheme).toBeNull();
    expect(draft.row(0)?.line?.lineAmount).toBe(660);

    expect(await schemeDraft.restoreHeldLines(held)).toEqual({ restored: 1, unresolved: [] });
    expect(schemeDraft.row(0)?.line?.scheme?.ruleId).toBe("r-rice");
    expect(schemeDraft.row(0)?.line?.lineAmount).toBe(594);
  });

  test("a unit edit takes the new unit's MRP and the schemes aimed at it", async () => {
    const boxDraft = new BillDraft({
      engine: buildEngine([
        rule({ ruleId: "r-box", productId: "p-noodles", targetUom: "box", targetMrp: 168, benefitValue: 10 }),
      ]),
      logger,
    });
    await boxDraft.editCell(0, "code", "NOOD70");
    expect(boxDraft.row(0)?.mrp).toBe("14");

    await boxDraft.editCell(0, "uom", "box");

    const row = boxDraft.row(0);
    expect(row?.uom).toBe("box");
    expect(row?.mrp).toBe("168");
    expect(row?.line).toEqual(expect.objectContaining({
      rate: 144,
      mrp: 168,
      lineAmount: 129.6,
      savings: 38.4,
    }));
    expect(row?.line?.scheme?.ruleId).toBe("r-box");
  });

  test("restoring held lines reprices them and blanks the ones that no longer resolve", async () => {
    const result = await draft.restoreHeldLines([
      { barcode: "RICE5KG", quantity: 2, uom: "kg", mrp: 540 },
      { barcode: "GONE", quantity: 1 },
      { barcode: "SUG01", quantity: "3", uom: null, mrp: null },
    ]);

    expect(result).toEqual({ restored: 2, unresolved: ["GONE"] });
    expect(draft.rowCount).toBe(3);
    expect(draft.row(0)?.line?.lineAmount).toBe(1080);
    expect(draft.row(1)?.line).toBeNull();
    expect(draft.row(2)?.uom).toBe("kg");
    expect(draft.row(2)?.mrp).toBe("50");
    expect(draft.row(2)?.line?.lineAmount).toBe(135);
    expect(draft.totals().subtotal).toBe(1215);
    expect(logger.warn).toHaveBeenCalledWith("Held lines no longer resolve", { unresolved: ["GONE"] });
  });

  test("restore is refused while an edit is in flight", async () => {
    const pending = draft.editCell(0, "code", "RICE01");

    expect(await draft.restoreHeldLines([{ barcode: "SUG01", quantity: 1 }])).toBeNull();
    await pending;
    expect(draft.rowCount).toBe(1);
  });

  test("purchase lookup returns catalog rate and units without schemes", async () => {
    const purchaseDraft = new BillDraft({
      engine: buildEngine([rule({ ruleId: "r-box", productId: "p-noodles", benefitType: "absolute_rate", benefitValue: 1 })]),
      logger,
    });
    const lookup = await purchaseDraft.lookupForPurchase("NOODBOX12");

    expect(lookup).toEqual(expect.objectContaining({ uom: "box", rate: 144, mrp: 168, factor: 12 }));
    expect(lookup?.units.map((unit) => unit.uom)).toEqual(["pcs", "box", "pkt"]);
    expect(await purchaseDraft.lookupForPurchase("NOPE-XYZ")).toBeNull();
  });

  test("purchase lookup on an alias stored at a zero price quotes base price x factor", async () => {
    const lookup = await draft.lookupForPurchase("NOODPK6");

    expect(lookup).toEqual(expect.objectContaining({ uom: "pkt", rate: 72, mrp: 84, factor: 6 }));
  });
});
