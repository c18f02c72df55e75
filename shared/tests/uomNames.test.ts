import { describe, expect, test } from "@jest/globals";
import {
  buildUomAliasMap,
  isSubGramUom,
  normalizeUom,
  perSoldUnit,
  round2dp,
  round3dp,
} from "../uomNames";

describe("uomNames", () => {
  const aliasMap = buildUomAliasMap([
    { name: "kg", alias: "Kilo" },
    { name: "g", alias: "gm" },
    { name: "pcs" },
    { name: "box", alias: " " },
  ]);

  test("alias map is keyed by lower-cased alias", () => {
    expect([...aliasMap.entries()]).toEqual([["kilo", "kg"], ["gm", "g"]]);
  });

  test("normalizeUom maps aliases case-insensitively", () => {
    expect(normalizeUom("KILO", aliasMap)).toBe("kg");
    expect(normalizeUom(" gm ", aliasMap)).toBe("g");
  });

  test("normalizeUom passes unknown units through trimmed", () => {
    expect(normalizeUom(" Dozen ", aliasMap)).toBe("Dozen");
    expect(normalizeUom("pcs", aliasMap)).toBe("pcs");
  });

  test("normalizeUom turns missing text into an empty unit", () => {
    expect(normalizeUom(null, aliasMap)).toBe("");
    expect(normalizeUom(undefined, aliasMap)).toBe("");
    expect(normalizeUom("   ", aliasMap)).toBe("");
  });

  test("sub-gram units are g, gram and grams in any case", () => {
    expect(isSubGramUom("g")).toBe(true);
    expect(isSubGramUom("Gram")).toBe(true);
    expect(isSubGramUom(" GRAMS ")).toBe(true);
    expect(isSubGramUom("kg")).toBe(false);
    expect(isSubGramUom(null)).toBe(false);
  });

  test("perSoldUnit divides per-kilogram figures on gram lines only", () => {
    expect(perSoldUnit(110, "g")).toBe(0.11);
    expect(perSoldUnit(110, "kg")).toBe(110);
    expect(perSoldUnit(110, null)).toBe(110);
  });

  test("rounding helpers", () => {
    expect(round2dp(10 / 3)).toBe(3.33);
    expect(round3dp(2 / 3)).toBe(0.667);
    expect(round2dp(Number.NaN)).toBe(0);
    expect(round3dp(Number.POSITIVE_INFINITY)).toBe(0);
  });
});
