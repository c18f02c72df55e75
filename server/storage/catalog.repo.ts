import { db, type Database } from "../db";
import {
    products,
    productAliases,
    schemes,
    schemeProducts,
    uoms,
    type Product,
    type ProductAlias,
    type InsertProduct,
    type InsertProductAlias,
    type InsertScheme,
    type InsertUom,
    type Scheme,
    type SchemeProduct,
} from "@shared/schema";
import { and, asc, desc, eq, ilike, isNull, or, sql, type SQL } from "drizzle-orm";
import type {
    BarcodeMatch,
    CatalogSearchHit,
    CatalogStore,
    MrpTierRow,
    NameMatchMode,
    ScoredAlias,
    ScoredProduct,
    UnitRows,
} from "../catalog/catalogStore";
import { CatalogSnapshot } from "./catalogSnapshot";
import { PricingError } from "../pricingErrors";
import { logger } from "../logger";
import type { SchemeMatchCriteria, SchemeRuleRecord } from "@shared/schemeRules";
import { buildUomAliasMap, round3dp, type UomAliasMap } from "@shared/uomNames";
import { aliasMrp, aliasPrice, type AliasRecord, type ProductRecord } from "@shared/variant";

function toNumber(value: string | null): number | null {
    if (value === null) return null;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
}

function decimalOrNull(value: number | null | undefined): string | null {
    return value === null || value === undefined ? null : String(value);
}

function escapeLike(value: string): string {
    return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export function toProductRecord(row: Product): ProductRecord {
    return {
        id: row.id,
        name: row.name,
        barcode: row.barcode,
        baseUom: row.baseUom,
        price: toNumber(row.price) ?? 0,
        mrp: toNumber(row.mrp) ?? 0,
        category: row.category,
        isDeleted: row.isDeleted,
        deletedAt: row.deletedAt,
    };
}

export function toAliasRecord(row: ProductAlias): AliasRecord {
    return {
        id: row.id,
        productId: row.productId,
        barcode: row.barcode,
        uom: row.uom,
        price: toNumber(row.price),
        mrp: toNumber(row.mrp),
        factor: toNumber(row.factor) ?? 1,
        qty: toNumber(row.qty) ?? 1,
    };
}

export function toSchemeRuleRecord(rule: SchemeProduct, scheme: Scheme): SchemeRuleRecord {
    return {
        ruleId: rule.id,
        schemeId: scheme.id,
        schemeName: scheme.name,
        productId: rule.productId,
        isActive: scheme.isActive,
        validFrom: scheme.validFrom,
        validTo: scheme.validTo,
        minQty: toNumber(rule.minQty) ?? 0,
        maxQty: toNumber(rule.maxQty),
        targetUom: rule.targetUom,
        targetMrp: toNumber(rule.targetMrp),
        benefitType: rule.benefitType,
        benefitValue: toNumber(rule.benefitValue) ?? 0,
    };
}

const notDeleted = eq(products.isDeleted, false);

/**
 * PostgreSQL-backed catalog. Reads implement the CatalogStore contract
 * (similarity via pg_trgm); writes cover the inventory and scheme
 * maintenance the pricing data depends on.
 */
export class CatalogRepository implements CatalogStore {
    constructor(private readonly dbInstance: Database = db) { }

    // Resolution reads
    async findByExactBarcode(code: string): Promise<BarcodeMatch | null> {
        const [product] = await this.dbInstance.select()
            .from(products)
            .where(and(eq(products.barcode, code), notDeleted))
            .limit(1);
        if (product) return { kind: "product", product: toProductRecord(product) };

        const [row] = await this.dbInstance.select({ alias: productAliases, product: products })
            .from(productAliases)
            .innerJoin(products, eq(productAliases.productId, products.id))
            .where(and(eq(productAliases.barcode, code), notDeleted))
            .limit(1);
        if (row) return { kind: "alias", alias: toAliasRecord(row.alias), product: toProductRecord(row.product) };

        return null;
    }

    async findProductByName(name: string, mode: NameMatchMode): Promise<ProductRecord | null> {
        const condition = mode === "exact"
            ? sql`lower(${products.name}) = lower(${name})`
            : ilike(products.name, `%${escapeLike(name)}%`);

        const [product] = await this.dbInstance.select()
            .from(products)
            .where(and(condition, notDeleted))
            .orderBy(asc(products.name), asc(products.id))
            .limit(1);
        return product ? toProductRecord(product) : null;
    }

    async findProductsByName(pattern: string, fuzzyThreshold: number, limit: number): Promise<ScoredProduct[]> {
        const nameSim = sql<number>`similarity(${products.name}, ${pattern})`;
        const barcodeSim = sql<number>`similarity(${products.barcode}, ${pattern})`;
        const score = sql<number>`GREATEST(${nameSim}, ${barcodeSim})`.mapWith(Number);

        const rows = await this.dbInstance.select({ product: products, score })
            .from(products)
            .where(and(
                notDeleted,
                or(sql`${nameSim} > ${fuzzyThreshold}`, sql`${barcodeSim} > ${fuzzyThreshold}`),
            ))
            .orderBy(desc(score), asc(products.name))
            .limit(limit);

        return rows.map((row) => ({ product: toProductRecord(row.product), score: row.score }));
    }

    async findAliasesByBarcode(pattern: string, fuzzyThreshold: number, limit: number): Promise<ScoredAlias[]> {
        const score = sql<number>`similarity(${productAliases.barcode}, ${pattern})`.mapWith(Number);

        const rows = await this.dbInstance.select({ alias: productAliases, product: products, score })
            .from(productAliases)
            .innerJoin(products, eq(productAliases.productId, products.id))
            .where(and(notDeleted, sql`${score} > ${fuzzyThreshold}`))
            .orderBy(desc(score), asc(productAliases.barcode))
            .limit(limit);

        return rows.map((row) => ({
            alias: toAliasRecord(row.alias),
            product: toProductRecord(row.product),
            score: row.score,
        }));
    }

    async searchCatalog(query: string, fuzzyThreshold: number, limit: number): Promise<CatalogSearchHit[]> {
        const pattern = `%${escapeLike(query)}%`;

        const productNameSim = sql<number>`similarity(${products.name}, ${query})`.mapWith(Number);
        const productBarcodeSim = sql<number>`similarity(${products.barcode}, ${query})`.mapWith(Number);
        const productRows = await this.dbInstance.select({ product: products, nameSim: productNameSim, barcodeSim: productBarcodeSim })
            .from(products)
            .where(and(notDeleted, or(
                sql`${productNameSim} > ${fuzzyThreshold}`,
                sql`${productBarcodeSim} > ${fuzzyThreshold}`,
                ilike(products.name, pattern),
                ilike(products.barcode, pattern),
            )))
            .orderBy(desc(sql`GREATEST(${productNameSim}, ${productBarcodeSim})`), asc(products.name))
            .limit(limit);

        const aliasBarcodeSim = sql<number>`similarity(${productAliases.barcode}, ${query})`.mapWith(Number);
        const aliasRows = await this.dbInstance.select({ alias: productAliases, product: products, nameSim: productNameSim, barcodeSim: aliasBarcodeSim })
            .from(productAliases)
            .innerJoin(products, eq(productAliases.productId, products.id))
            .where(and(notDeleted, or(
                sql`${productNameSim} > ${fuzzyThreshold}`,
                sql`${aliasBarcodeSim} > ${fuzzyThreshold}`,
                ilike(products.name, pattern),
                ilike(productAliases.barcode, pattern),
            )))
            .orderBy(desc(sql`GREATEST(${productNameSim}, ${aliasBarcodeSim})`), asc(products.name))
            .limit(limit);

        const hits: CatalogSearchHit[] = [
            ...productRows.map((row) => {
                const product = toProductRecord(row.product);
                return {
                    productId: product.id,
                    aliasId: null,
                    name: product.name,
                    barcode: product.barcode,
                    uom: product.baseUom,
                    price: product.price,
                    mrp: product.mrp,
                    category: product.category,
                    nameSimilarity: row.nameSim,
                    barcodeSimilarity: row.barcodeSim,
                };
            }),
            ...aliasRows.map((row) => {
                const product = toProductRecord(row.product);
                const alias = toAliasRecord(row.alias);
                return {
                    productId: product.id,
                    aliasId: alias.id,
                    name: product.name,
                    barcode: alias.barcode,
                    uom: alias.uom,
                    price: aliasPrice(alias, product),
                    mrp: aliasMrp(alias, product),
                    category: product.category,
                    nameSimilarity: row.nameSim,
                    barcodeSimilarity: row.barcodeSim,
                };
            }),
        ];

        // Both halves are pre-ranked; merge them under the same ordering
        return hits
            .sort((a, b) =>
                Math.max(b.nameSimilarity, b.barcodeSimilarity) - Math.max(a.nameSimilarity, a.barcodeSimilarity) ||
                (a.name < b.name ? -1 : a.name > b.name ? 1 : 0),
            )
            .slice(0, limit);
    }

    // Unit reads
    async listUnits(productId: string): Promise<UnitRows | null> {
        const [product] = await this.dbInstance.select()
            .from(products)
            .where(and(eq(products.id, productId), notDeleted))
            .limit(1);
        if (!product) return null;

        const aliases = await this.dbInstance.select()
            .from(productAliases)
            .where(eq(productAliases.productId, productId))
            .orderBy(asc(productAliases.barcode));

        return { product: toProductRecord(product), aliases: aliases.map(toAliasRecord) };
    }

    async listMrpVariants(productId: string, uom: string): Promise<MrpTierRow[]> {
        const units = await this.listUnits(productId);
        if (!units) return [];

        const tiers: MrpTierRow[] = [];
        if (units.product.baseUom === uom) {
            tiers.push({ mrp: units.product.mrp, price: units.product.price });
        }
        for (const alias of units.aliases) {
            if (alias.uom === uom) {
                tiers.push({ mrp: aliasMrp(alias, units.product), price: aliasPrice(alias, units.product) });
            }
        }
        return tiers;
    }

    // Scheme reads
    async findBestSchemeRule(criteria: SchemeMatchCriteria): Promise<SchemeRuleRecord | null> {
        const { productId, quantity, uom, mrp, today } = criteria;

        const uomCondition: SQL | undefined = uom
            ? or(isNull(schemeProducts.targetUom), sql`lower(${schemeProducts.targetUom}) = lower(${uom})`)
            : isNull(schemeProducts.targetUom);
        const mrpCondition: SQL | undefined = mrp !== null
            ? or(isNull(schemeProducts.targetMrp), sql`${schemeProducts.targetMrp} = ${round3dp(mrp)}`)
            : isNull(schemeProducts.targetMrp);

        const [row] = await this.dbInstance.select({ rule: schemeProducts, scheme: schemes })
            .from(schemeProducts)
            .innerJoin(schemes, eq(schemeProducts.schemeId, schemes.id))
            .where(and(
                eq(schemeProducts.productId, productId),
                eq(schemes.isActive, true),
                sql`${quantity} >= ${schemeProducts.minQty}`,
                or(isNull(schemeProducts.maxQty), sql`${quantity} <= ${schemeProducts.maxQty}`),
                sql`${today}::date BETWEEN ${schemes.validFrom} AND COALESCE(${schemes.validTo}, '9999-12-31'::date)`,
                uomCondition,
                mrpCondition,
            ))
            .orderBy(desc(schemeProducts.minQty), desc(schemeProducts.benefitValue), asc(schemeProducts.id))
            .limit(1);

        return row ? toSchemeRuleRecord(row.rule, row.scheme) : null;
    }

    async getUomAliasMap(): Promise<UomAliasMap> {
        const rows = await this.dbInstance.select().from(uoms).orderBy(asc(uoms.name));
        return buildUomAliasMap(rows);
    }

    // Snapshot
    async loadSnapshot(): Promise<CatalogSnapshot> {
        const productRows = await this.dbInstance.select().from(products).where(notDeleted);
        const aliasRows = await this.dbInstance.select({ alias: productAliases })
            .from(productAliases)
            .innerJoin(products, eq(productAliases.productId, products.id))
            .where(notDeleted);
        const ruleRows = await this.dbInstance.select({ rule: schemeProducts, scheme: schemes })
            .from(schemeProducts)
            .innerJoin(schemes, eq(schemeProducts.schemeId, schemes.id));
        const uomRows = await this.dbInstance.select().from(uoms);

        logger.debug("Catalog snapshot loaded", {
            products: productRows.length,
            aliases: aliasRows.length,
            schemeRules: ruleRows.length,
        });

        return new CatalogSnapshot({
            products: productRows.map(toProductRecord),
            aliases: aliasRows.map((row) => toAliasRecord(row.alias)),
            schemeRules: ruleRows.map((row) => toSchemeRuleRecord(row.rule, row.scheme)),
            uoms: uomRows,
        });
    }

    // UOM master
    async upsertUom(input: InsertUom): Promise<void> {
        await this.dbInstance.insert(uoms)
            .values({ name: input.name, alias: input.alias ?? null })
            .onConflictDoUpdate({
                target: uoms.name,
                set: { alias: sql`COALESCE(excluded.alias, ${uoms.alias})` },
            });
    }

    // Product & alias maintenance
    private async assertBarcodeAvailable(barcode: string): Promise<void> {
        const [product] = await this.dbInstance.select({ id: products.id })
            .from(products)
            .where(eq(products.barcode, barcode))
            .limit(1);
        const [alias] = await this.dbInstance.select({ id: productAliases.id })
            .from(productAliases)
            .where(eq(productAliases.barcode, barcode))
            .limit(1);
        if (product || alias) {
            throw new PricingError("DUPLICATE_BARCODE", `Barcode ${barcode} is already in use`);
        }
    }

    async createProduct(input: InsertProduct): Promise<ProductRecord> {
        await this.assertBarcodeAvailable(input.barcode);
        const [created] = await this.dbInstance.insert(products).values({
            name: input.name,
            barcode: input.barcode,
            baseUom: input.baseUom,
            price: String(input.price),
            mrp: String(input.mrp),
            category: input.category ?? null,
        }).returning();
        if (!created) throw new Error('Product insert returned no row');
        return toProductRecord(created);
    }

    async createAlias(input: InsertProductAlias): Promise<AliasRecord> {
        await this.assertBarcodeAvailable(input.barcode);
        const [owner] = await this.dbInstance.select({ id: products.id })
            .from(products)
            .where(and(eq(products.id, input.productId), notDeleted))
            .limit(1);
        if (!owner) throw new PricingError("PRODUCT_NOT_FOUND", `Product ${input.productId} not found`);

        const [created] = await this.dbInstance.insert(productAliases).values({
            productId: input.productId,
            barcode: input.barcode,
            uom: input.uom,
            price: decimalOrNull(input.price),
            mrp: decimalOrNull(input.mrp),
            factor: String(input.factor),
            qty: String(input.qty),
        }).returning();
        if (!created) throw new Error('Alias insert returned no row');
        return toAliasRecord(created);
    }

    async deleteAlias(aliasId: string): Promise<void> {
        await this.dbInstance.delete(productAliases).where(eq(productAliases.id, aliasId));
    }

    async softDeleteProduct(productId: string): Promise<void> {
        const [updated] = await this.dbInstance.update(products)
            .set({ isDeleted: true, deletedAt: new Date() })
            .where(eq(products.id, productId))
            .returning({ id: products.id });
        if (!updated) throw new PricingError("PRODUCT_NOT_FOUND", `Product ${productId} not found`);
    }

    async restoreProduct(productId: string): Promise<void> {
        const [updated] = await this.dbInstance.update(products)
            .set({ isDeleted: false, deletedAt: null })
            .where(eq(products.id, productId))
            .returning({ id: products.id });
        if (!updated) throw new PricingError("PRODUCT_NOT_FOUND", `Product ${productId} not found`);
    }

    async listDeletedProducts(): Promise<ProductRecord[]> {
        const rows = await this.dbInstance.select()
            .from(products)
            .where(eq(products.isDeleted, true))
            .orderBy(desc(products.deletedAt));
        return rows.map(toProductRecord);
    }

    /**
     * Physically remove products soft-deleted longer than the retention window.
     * Aliases and scheme rules go with them (ON DELETE CASCADE).
     */
    async purgeDeletedProducts(retentionDays: number): Promise<number> {
        const purged = await this.dbInstance.delete(products)
            .where(and(
                eq(products.isDeleted, true),
                sql`${products.deletedAt} < now() - make_interval(days => ${retentionDays})`,
            ))
            .returning({ id: products.id });
        logger.info("Purged soft-deleted products", { count: purged.length, retentionDays });
        return purged.length;
    }

    // Scheme maintenance
    async findSchemeIdByName(name: string): Promise<string | null> {
        const [row] = await this.dbInstance.select({ id: schemes.id })
            .from(schemes)
            .where(eq(schemes.name, name))
            .orderBy(asc(schemes.id))
            .limit(1);
        return row?.id ?? null;
    }

    async createScheme(input: InsertScheme): Promise<string> {
        return await this.dbInstance.transaction(async (tx) => {
            const [scheme] = await tx.insert(schemes).values({
                name: input.name,
                validFrom: input.validFrom,
                validTo: input.validTo ?? null,
                isActive: input.isActive,
            }).returning({ id: schemes.id });
            if (!scheme) throw new Error('Scheme insert returned no row');

            if (input.rules.length > 0) {
                await tx.insert(schemeProducts).values(input.rules.map((rule) => ({
                    schemeId: scheme.id,
                    productId: rule.productId,
                    minQty: String(rule.minQty),
                    maxQty: decimalOrNull(rule.maxQty),
                    targetUom: rule.targetUom ?? null,
                    targetMrp: decimalOrNull(rule.targetMrp),
                    benefitType: rule.benefitType,
                    benefitValue: String(rule.benefitValue),
                })));
            }

            return scheme.id;
        });
    }

    async setSchemeActive(schemeId: string, isActive: boolean): Promise<void> {
        await this.dbInstance.update(schemes).set({ isActive }).where(eq(schemes.id, schemeId));
    }

    async deleteScheme(schemeId: string): Promise<void> {
        await this.dbInstance.delete(schemes).where(eq(schemes.id, schemeId));
    }
}
