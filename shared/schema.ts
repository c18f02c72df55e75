import { sql } from 'drizzle-orm';
import { relations } from 'drizzle-orm';
import {
  boolean,
  date,
  decimal,
  index,
  pgEnum,
  pgTable,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============================================================
// UNITS OF MEASURE
// ============================================================

// Unit master. `alias` is another spelling typed at the till ("kilo") that
// normalizes to the canonical `name` ("kg").
export const uoms = pgTable("uoms", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: varchar("name", { length: 20 }).notNull().unique(),
  alias: varchar("alias", { length: 10 }).unique(),
});

export const insertUomSchema = createInsertSchema(uoms).omit({
  id: true,
}).extend({
  name: z.string().trim().min(1).max(20),
  alias: z.string().trim().min(1).max(10).optional().nullable(),
});

export type InsertUom = z.infer<typeof insertUomSchema>;
export type Uom = typeof uoms.$inferSelect;

// ============================================================
// PRODUCTS & ALIASES
// ============================================================

export const products = pgTable("products", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: varchar("name", { length: 255 }).notNull(),
  barcode: varchar("barcode", { length: 50 }).notNull().unique(),
  baseUom: varchar("base_uom", { length: 20 }).default("pcs").notNull(),
  price: decimal("price", { precision: 12, scale: 3 }).notNull(),
  mrp: decimal("mrp", { precision: 12, scale: 3 }).default("0").notNull(),
  category: varchar("category", { length: 100 }).default("General"),
  // Soft delete: rows stay resolvable by history for the retention window,
  // but every lookup tier skips them.
  isDeleted: boolean("is_deleted").default(false).notNull(),
  deletedAt: timestamp("deleted_at"),
}, (table) => [
  index("products_name_idx").on(table.name),
  index("products_deleted_idx").on(table.isDeleted, table.deletedAt),
]);

export const insertProductSchema = createInsertSchema(products).omit({
  id: true,
  isDeleted: true,
  deletedAt: true,
}).extend({
  name: z.string().trim().min(1).max(255),
  barcode: z.string().trim().min(1).max(50),
  baseUom: z.string().trim().min(1).max(20).default("pcs"),
  price: z.coerce.number().nonnegative(),
  mrp: z.coerce.number().nonnegative().default(0),
  category: z.string().max(100).optional().nullable(),
});

export type InsertProduct = z.infer<typeof insertProductSchema>;
export type Product = typeof products.$inferSelect;

// Alternate pack sizes / units for a product ("case of 24"). A null price or
// MRP is derived from the base row times `factor` at read time.
export const productAliases = pgTable("product_aliases", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  productId: varchar("product_id").notNull().references(() => products.id, { onDelete: 'cascade' }),
  barcode: varchar("barcode", { length: 50 }).notNull().unique(),
  uom: varchar("uom", { length: 20 }).notNull(),
  price: decimal("price", { precision: 12, scale: 3 }),
  mrp: decimal("mrp", { precision: 12, scale: 3 }),
  factor: decimal("factor", { precision: 12, scale: 3 }).default("1").notNull(),
  // Load quantity: what a freshly scanned alias line starts with
  qty: decimal("qty", { precision: 12, scale: 3 }).default("1").notNull(),
}, (table) => [
  index("product_aliases_product_id_idx").on(table.productId),
  index("product_aliases_product_uom_idx").on(table.productId, table.uom),
]);

export const insertProductAliasSchema = createInsertSchema(productAliases).omit({
  id: true,
}).extend({
  barcode: z.string().trim().min(1).max(50),
  uom: z.string().trim().min(1).max(20),
  price: z.coerce.number().nonnegative().optional().nullable(),
  mrp: z.coerce.number().nonnegative().optional().nullable(),
  factor: z.coerce.number().positive().default(1),
  qty: z.coerce.number().positive().default(1),
});

export type InsertProductAlias = z.infer<typeof insertProductAliasSchema>;
export type ProductAlias = typeof productAliases.$inferSelect;

// ============================================================
// PROMOTIONAL SCHEMES
// ============================================================

export const SCHEME_BENEFIT_TYPES = ["percent", "amount", "absolute_rate"] as const;
export type SchemeBenefitType = (typeof SCHEME_BENEFIT_TYPES)[number];

export const schemeBenefitTypeEnum = pgEnum('scheme_benefit_type', SCHEME_BENEFIT_TYPES);

export const schemes = pgTable("schemes", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: varchar("name", { length: 100 }).notNull(),
  validFrom: date("valid_from").default(sql`CURRENT_DATE`).notNull(),
  validTo: date("valid_to"), // null = open-ended
  isActive: boolean("is_active").default(true).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => [
  index("schemes_active_validity_idx").on(table.isActive, table.validFrom, table.validTo),
]);

// One conditional discount clause of a scheme. Null target_uom / target_mrp
// act as wildcards over the product's variants.
export const schemeProducts = pgTable("scheme_products", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  schemeId: varchar("scheme_id").notNull().references(() => schemes.id, { onDelete: 'cascade' }),
  productId: varchar("product_id").notNull().references(() => products.id, { onDelete: 'cascade' }),
  minQty: decimal("min_qty", { precision: 12, scale: 3 }).default("0").notNull(),
  maxQty: decimal("max_qty", { precision: 12, scale: 3 }),
  targetUom: varchar("target_uom", { length: 20 }),
  targetMrp: decimal("target_mrp", { precision: 12, scale: 3 }),
  benefitType: schemeBenefitTypeEnum("benefit_type").default("percent").notNull(),
  benefitValue: decimal("benefit_value", { precision: 12, scale: 3 }).default("0").notNull(),
}, (table) => [
  index("scheme_products_product_idx").on(table.productId),
  index("scheme_products_scheme_idx").on(table.schemeId),
]);

const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

export const insertSchemeRuleSchema = createInsertSchema(schemeProducts).omit({
  id: true,
  schemeId: true,
}).extend({
  minQty: z.coerce.number().nonnegative().default(0),
  maxQty: z.coerce.number().nonnegative().optional().nullable(),
  targetUom: z.string().trim().min(1).max(20).optional().nullable(),
  targetMrp: z.coerce.number().nonnegative().optional().nullable(),
  benefitType: z.enum(SCHEME_BENEFIT_TYPES).default("percent"),
  benefitValue: z.coerce.number().nonnegative(),
}).refine(
  (rule) => rule.maxQty === null || rule.maxQty === undefined || rule.maxQty >= rule.minQty,
  { message: "maxQty must be >= minQty", path: ["maxQty"] },
);

export const insertSchemeSchema = createInsertSchema(schemes).omit({
  id: true,
  createdAt: true,
}).extend({
  name: z.string().trim().min(1).max(100),
  validFrom: isoDateSchema,
  validTo: isoDateSchema.optional().nullable(),
  isActive: z.boolean().default(true),
  rules: z.array(insertSchemeRuleSchema).default([]),
});

export type InsertSchemeRule = z.infer<typeof insertSchemeRuleSchema>;
export type InsertScheme = z.infer<typeof insertSchemeSchema>;
export type Scheme = typeof schemes.$inferSelect;
export type SchemeProduct = typeof schemeProducts.$inferSelect;

// ============================================================
// RELATIONS
// ============================================================

export const productsRelations = relations(products, ({ many }) => ({
  aliases: many(productAliases),
  schemeRules: many(schemeProducts),
}));

export const productAliasesRelations = relations(productAliases, ({ one }) => ({
  product: one(products, {
    fields: [productAliases.productId],
    references: [products.id],
  }),
}));

export const schemesRelations = relations(schemes, ({ many }) => ({
  rules: many(schemeProducts),
}));

export const schemeProductsRelations = relations(schemeProducts, ({ one }) => ({
  scheme: one(schemes, {
    fields: [schemeProducts.schemeId],
    references: [schemes.id],
  }),
  product: one(products, {
    fields: [schemeProducts.productId],
    references: [products.id],
  }),
}));
