import { describe, expect, jest, test } from "@jest/globals";
import type { CatalogStore } from "../../../catalog/catalogStore";
import { IdentityResolver } from "../identityResolver";
import { buildSnapshot, NOODLES, RICE, RICE_5KG, SUGAR, TEST_CONFIG } from "./fixtures";

function stubStore(overrides: Partial<CatalogStore> = {}): CatalogStore {
  return {
    findByExactBarcode: jest.fn<CatalogStore["findByExactBarcode"]>().mockResolvedValue(null),
    findProductByName: jest.fn<CatalogStore["findProductByName"]>().mockResolvedValue(null),
    findProductsByName: jest.fn<CatalogStore["findProductsByName"]>().mockResolvedValue([]),
    findAliasesByBarcode: jest.fn<CatalogStore["findAliasesByBarcode"]>().mockResolvedValue([]),
    searchCatalog: jest.fn<CatalogStore["searchCatalog"]>().mockResolvedValue([]),
    listUnits: jest.fn<CatalogStore["listUnits"]>().mockResolvedValue(null),
    listMrpVariants: jest.fn<CatalogStore["listMrpVariants"]>().mockResolvedValue([]),
    findBestSchemeRule: jest.fn<CatalogStore["findBestSchemeRule"]>().mockResolvedValue(null),
    getUomAliasMap: jest.fn<CatalogStore["getUomAliasMap"]>().mockResolvedValue(new Map()),
    ...overrides,
  };
}

// Fuzzy candidates with fixed scores; filtered by threshold like a real store
function fuzzyStore(productScore: number, aliasScore: number): CatalogStore {
  return stubStore({
    findProductsByName: async (_pattern, threshold) =>
      [{ product: SUGAR, score: productScore }].filter((candidate) => candidate.score > threshold),
    findAliasesByBarcode: async (_pattern, threshold) =>
      [{ alias: RICE_5KG, product: RICE, score: aliasScore }].filter((candidate) => candidate.score > threshold),
  });
}

describe("IdentityResolver", () => {
  const resolver = new IdentityResolver(buildSnapshot(), TEST_CONFIG);

  test("exact product barcode resolves to the base variant", async () => {
    const variant = await resolver.resolve("RICE01");

    expect(variant).toEqual(expect.objectContaining({
      isAlias: false,
      productId: "p-rice",
      displayName: "Rice",
      uom: "kg",
      price: 110,
      mrp: 120,
      factor: 1,
      loadQuantity: 1,
    }));
  });

  test("exact alias barcode resolves to the alias variant", async () => {
    const variant = await resolver.resolve("RICE5KG");

    expect(variant).toEqual(expect.objectContaining({
      isAlias: true,
      aliasId: "a-rice-5kg",
      productId: "p-rice",
      factor: 5,
      price: 540,
      // no stored MRP: 120 x 5
      mrp: 600,
      loadQuantity: 5,
      basePrice: 110,
    }));
  });

  test("alias variants carry the alias factor", async () => {
    const variant = await resolver.resolve("NOODBOX12");

    expect(variant?.isAlias).toBe(true);
    expect(variant?.factor).toBe(12);
    expect(variant?.price).toBe(144);
  });

  test("token is trimmed before matching", async () => {
    const variant = await resolver.resolve("  SUG01 ");
    expect(variant?.productId).toBe("p-sugar");
  });

  test("exact name match is case-insensitive and beats substring matches", async () => {
    // "Rice Bran Oil" also contains "rice"
    const variant = await resolver.resolve("rICE");
    expect(variant?.productId).toBe("p-rice");
  });

  test("substring match picks the lexicographically first name", async () => {
    // "Rice Bran Oil" < "Sunflower Oil 1L"
    const variant = await resolver.resolve("oil");
    expect(variant?.productId).toBe("p-bran");
  });

  test("substring match on a name fragment", async () => {
    const variant = await resolver.resolve("noodle");
    expect(variant?.productId).toBe(NOODLES.id);
  });

  test("fuzzy match prefers the alias when it scores higher", async () => {
    // alias RICE5KG scores 0.7, product "Rice" 0.4
    const variant = await resolver.resolve("RICE5KGX");

    expect(variant?.isAlias).toBe(true);
    expect(variant?.barcode).toBe("RICE5KG");
  });

  test("soft-deleted products resolve to nothing", async () => {
    expect(await resolver.resolve("BIS01")).toBeNull();
    expect(await resolver.resolve("BISCASE")).toBeNull();
    expect(await resolver.resolve("Old Biscuit")).toBeNull();
  });

  test("unknown token resolves to null", async () => {
    expect(await resolver.resolve("NOPE-XYZ")).toBeNull();
  });

  test("empty token resolves to null without touching the store", async () => {
    const store = stubStore();
    const variant = await new IdentityResolver(store, TEST_CONFIG).resolve("   ");

    expect(variant).toBeNull();
    expect(store.findByExactBarcode).not.toHaveBeenCalled();
  });

  test("first tier with a candidate wins", async () => {
    const store = stubStore({
      findByExactBarcode: async () => ({ kind: "product", product: SUGAR }),
    });
    const variant = await new IdentityResolver(store, TEST_CONFIG).resolve("SUG01");

    expect(variant?.productId).toBe("p-sugar");
    expect(store.findProductByName).not.toHaveBeenCalled();
    expect(store.findProductsByName).not.toHaveBeenCalled();
  });
});

describe("IdentityResolver fuzzy tier", () => {
  test("alias at 0.35 beats a product at 0.25 (below the 0.3 floor)", async () => {
    const variant = await new IdentityResolver(fuzzyStore(0.25, 0.35), TEST_CONFIG).resolve("whatever");

    expect(variant?.isAlias).toBe(true);
    expect(variant?.barcode).toBe("RICE5KG");
  });

  test("product wins when it scores higher", async () => {
    const variant = await new IdentityResolver(fuzzyStore(0.4, 0.35), TEST_CONFIG).resolve("whatever");
    expect(variant?.isAlias).toBe(false);
    expect(variant?.productId).toBe("p-sugar");
  });

  test("ties prefer the product", async () => {
    const variant = await new IdentityResolver(fuzzyStore(0.5, 0.5), TEST_CONFIG).resolve("whatever");
    expect(variant?.isAlias).toBe(false);
  });

  test("scores at the floor do not qualify", async () => {
    expect(await new IdentityResolver(fuzzyStore(0.3, 0.3), TEST_CONFIG).resolve("whatever")).toBeNull();
  });

  test("passes the configured threshold to the store", async () => {
    const store = stubStore();
    await new IdentityResolver(store, { ...TEST_CONFIG, resolveFuzzyThreshold: 0.45 }).resolve("whatever");

    expect(store.findProductsByName).toHaveBeenCalledWith("whatever", 0.45, 1);
    expect(store.findAliasesByBarcode).toHaveBeenCalledWith("whatever", 0.45, 1);
  });
});

describe("IdentityResolver.search", () => {
  const resolver = new IdentityResolver(buildSnapshot(), TEST_CONFIG);

  test("ranks by best similarity, then by name", async () => {
    const hits = await resolver.search("rice");
    expect(hits.map((hit) => hit.barcode)).toEqual(["RICE01", "RICE5KG", "RBO01"]);
  });

  test("alias hits carry derived pricing", async () => {
    const [hit] = await resolver.search("NOODBOX12");

    expect(hit).toEqual(expect.objectContaining({
      productId: "p-noodles",
      aliasId: "a-nood-box",
      uom: "box",
      price: 144,
      mrp: 168,
    }));
  });

  test("skips soft-deleted products", async () => {
    expect(await resolver.search("biscuit")).toEqual([]);
  });

  test("caps the result count", async () => {
    const capped = new IdentityResolver(buildSnapshot(), { ...TEST_CONFIG, searchLimit: 2 });
    expect(await capped.search("rice")).toHaveLength(2);
  });

  test("uses the search threshold and limit", async () => {
    const store = stubStore();
    await new IdentityResolver(store, TEST_CONFIG).search(" salt ");
    expect(store.searchCatalog).toHaveBeenCalledWith("salt", 0.15, 15);
  });
});
