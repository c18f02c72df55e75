import { describe, expect, test } from "@jest/globals";
import { BillDraft, CatalogSnapshot, PricingEngine } from "..";
import { ALIASES, PRODUCTS, TEST_CONFIG, UOMS, createTestLogger, fixedClock } from "../services/pricing/tests/fixtures";

describe("library entry", () => {
  test("an engine over a snapshot prices a scanned alias", async () => {
    const engine = new PricingEngine({
      store: new CatalogSnapshot({ products: PRODUCTS, aliases: ALIASES, schemeRules: [], uoms: UOMS }),
      config: TEST_CONFIG,
      clock: fixedClock,
      logger: createTestLogger(),
    });
    const draft = new BillDraft({ engine, logger: createTestLogger() });

    await draft.editCell(0, "code", "NOODBOX12");

    expect(draft.row(0)?.line?.lineAmount).toBe(144);
    expect(draft.totals().total).toBe(144);
  });
});
