import "dotenv/config";
import { Pool, neonConfig } from "@neondatabase/serverless";
import { drizzle } from "drizzle-orm/neon-serverless";
import ws from "ws";
import * as schema from "@shared/schema";
import { sql } from "drizzle-orm";
import { logger } from "./logger";

// Configure Neon to use WebSocket in Node
neonConfig.webSocketConstructor = ws;

const connectionString = process.env.DATABASE_URL;

if (!connectionString) {
  throw new Error(
    "DATABASE_URL must be set (in your environment or .env file) before opening the catalog or running migrations."
  );
}

export const pool = new Pool({ connectionString });
export const db = drizzle({ client: pool, schema });

export type Database = typeof db;

const CATALOG_TABLES = ["uoms", "products", "product_aliases", "schemes", "scheme_products"];

export type CatalogSchemaProbe = {
  hasTrigramExtension: boolean;
  missingTables: string[];
};

export async function enableTrigramExtension(): Promise<void> {
  await db.execute(sql`CREATE EXTENSION IF NOT EXISTS pg_trgm`);
}

/**
 * Probe the catalog schema at startup.
 * Fuzzy resolution and search rely on pg_trgm's similarity(); without it
 * those tiers fail, so report it loudly rather than at the first scan.
 */
export async function probeCatalogSchema(): Promise<CatalogSchemaProbe> {
  const extensionResult = await db.execute(sql`
    SELECT EXISTS (
      SELECT 1 FROM pg_extension WHERE extname = 'pg_trgm'
    ) as has_trgm
  `);
  const hasTrigramExtension = extensionResult.rows[0]?.has_trgm === true;

  const tableResult = await db.execute(sql`
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = current_schema()
  `);
  const present = new Set(tableResult.rows.map((row) => String(row.table_name)));
  const missingTables = CATALOG_TABLES.filter((table) => !present.has(table));

  if (!hasTrigramExtension) {
    logger.error("[DB] pg_trgm extension missing; run CREATE EXTENSION pg_trgm before fuzzy lookups");
  }
  if (missingTables.length > 0) {
    logger.error("[DB] catalog tables missing; run npm run db:push", { missingTables });
  } else {
    logger.info("[DB] catalog schema verified", { hasTrigramExtension });
  }

  return { hasTrigramExtension, missingTables };
}
