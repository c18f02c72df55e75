/**
 * Catalog seeding from a JSON document of UOMs, products (with aliases) and
 * schemes. Re-running is safe: products are matched by barcode and schemes by
 * name, and existing rows are left as they are.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import {
  insertProductAliasSchema,
  insertProductSchema,
  insertSchemeSchema,
  insertUomSchema,
} from "@shared/schema";
import { toIsoDate } from "@shared/schemeRules";
import { logger as rootLogger, type Logger } from "../logger";
import { PricingError } from "../pricingErrors";
import type { CatalogRepository } from "../storage/catalog.repo";

const DAY_MS = 24 * 60 * 60 * 1000;

const seedCatalogSchema = z.object({
  uoms: z.array(insertUomSchema),
  products: z.array(insertProductSchema.extend({
    aliases: z.array(insertProductAliasSchema.omit({ productId: true })).default([]),
  })),
  schemes: z.array(z.object({
    name: z.string(),
    validForDays: z.number().int().positive().optional(),
    // rule fields, with `product` naming the target by barcode
    rules: z.array(z.object({ product: z.string() }).passthrough()),
  })),
});

export type SeedCatalog = z.output<typeof seedCatalogSchema>;

export type CatalogSeedTarget = Pick<
  CatalogRepository,
  "upsertUom" | "findByExactBarcode" | "createProduct" | "createAlias" | "findSchemeIdByName" | "createScheme"
>;

export type SeedSummary = {
  productsCreated: number;
  productsExisting: number;
  schemesCreated: number;
  schemesExisting: number;
};

export function parseSeedCatalog(raw: unknown): SeedCatalog {
  const parsed = seedCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid seed catalog: ${fromZodError(parsed.error).message}`);
  }
  return parsed.data;
}

export async function seedCatalog(
  target: CatalogSeedTarget,
  catalog: SeedCatalog,
  options: { now?: Date; logger?: Logger } = {},
): Promise<SeedSummary> {
  const log = options.logger ?? rootLogger;
  const now = options.now ?? new Date();
  const summary: SeedSummary = { productsCreated: 0, productsExisting: 0, schemesCreated: 0, schemesExisting: 0 };

  for (const uom of catalog.uoms) {
    await target.upsertUom(uom);
  }
  log.info("[seed] UOMs seeded", { count: catalog.uoms.length });

  const productIds = new Map<string, string>();
  for (const { aliases, ...product } of catalog.products) {
    const existing = await target.findByExactBarcode(product.barcode);
    if (existing) {
      productIds.set(product.barcode, existing.product.id);
      summary.productsExisting++;
      log.info("[seed] Product already present", { barcode: product.barcode });
      continue;
    }

    const created = await target.createProduct(product);
    productIds.set(product.barcode, created.id);
    summary.productsCreated++;

    for (const alias of aliases) {
      try {
        await target.createAlias({ ...alias, productId: created.id });
      } catch (error) {
        if (!(error instanceof PricingError) || error.code !== "DUPLICATE_BARCODE") throw error;
        log.warn("[seed] Alias barcode already in use", { barcode: alias.barcode });
      }
    }
  }
  log.info("[seed] Products seeded", { created: summary.productsCreated, existing: summary.productsExisting });

  for (const scheme of catalog.schemes) {
    const existingScheme = await target.findSchemeIdByName(scheme.name);
    if (existingScheme) {
      summary.schemesExisting++;
      log.info("[seed] Scheme already present", { schemeId: existingScheme, name: scheme.name });
      continue;
    }

    const rules = scheme.rules.map(({ product, ...rule }) => {
      const productId = productIds.get(product);
      if (!productId) throw new Error(`Scheme "${scheme.name}" targets unknown product ${product}`);
      return { ...rule, productId };
    });

    const input = insertSchemeSchema.parse({
      name: scheme.name,
      validFrom: toIsoDate(now),
      validTo: scheme.validForDays ? toIsoDate(new Date(now.getTime() + scheme.validForDays * DAY_MS)) : null,
      rules,
    });
    const schemeId = await target.createScheme(input);
    summary.schemesCreated++;
    log.info("[seed] Scheme created", { schemeId, name: scheme.name, rules: rules.length });
  }

  return summary;
}
