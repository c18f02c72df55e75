import { describe, expect, test } from "@jest/globals";
import { similarity, trigrams } from "../trigram";

describe("trigrams", () => {
  test("pads each word with two leading spaces and one trailing", () => {
    expect([...trigrams("Ab")].sort()).toEqual(["  a", " ab", "ab "]);
  });

  test("splits words on non-alphanumerics", () => {
    expect([...trigrams("a-b")].sort()).toEqual(["  a", "  b", " a ", " b "]);
  });

  test("collapses repeated trigrams", () => {
    expect(trigrams("aaaa").size).toBe(4);
  });

  test("empty and punctuation-only text has no trigrams", () => {
    expect(trigrams("").size).toBe(0);
    expect(trigrams(" -- ").size).toBe(0);
  });
});

describe("similarity", () => {
  test("identical text scores 1, regardless of case", () => {
    expect(similarity("rice", "rice")).toBe(1);
    expect(similarity("RICE", "rice")).toBe(1);
  });

  test("shared over distinct trigrams", () => {
    // rice: "  r"," ri","ric","ice","ce " / rica: "  r"," ri","ric","ica","ca "
    expect(similarity("rice", "rica")).toBeCloseTo(3 / 7, 10);
    expect(similarity("RICE5KG", "RICE5KGX")).toBeCloseTo(0.7, 10);
  });

  test("is symmetric", () => {
    expect(similarity("Rice Bran Oil", "rice")).toBe(similarity("rice", "Rice Bran Oil"));
  });

  test("empty input scores 0", () => {
    expect(similarity("", "rice")).toBe(0);
    expect(similarity("rice", "")).toBe(0);
  });
});
