#!/usr/bin/env tsx
/**
 * Catalog maintenance from the shell.
 *
 * Usage:
 *   tsx scripts/catalog-maintenance.ts list-deleted
 *   tsx scripts/catalog-maintenance.ts delete-product --barcode=8901234001
 *   tsx scripts/catalog-maintenance.ts restore-product --id=<productId>
 *   tsx scripts/catalog-maintenance.ts delete-alias --id=<aliasId>
 *   tsx scripts/catalog-maintenance.ts scheme-active --id=<schemeId> --active=false
 *   tsx scripts/catalog-maintenance.ts delete-scheme --id=<schemeId>
 *   tsx scripts/catalog-maintenance.ts price --code=8901234003 --qty=6 --uom=pcs
 */

import "dotenv/config";
import { parseMaintenanceCommand, type MaintenanceCommand } from "../server/catalog/maintenanceCommand";
import { loadPricingConfig } from "../server/config";
import { validateEnvironmentOrExit } from "../server/envValidation";
import { logger } from "../server/logger";
import { PricingError } from "../server/pricingErrors";
import { PricingEngine } from "../server/services/pricing/PricingService";

async function run(command: MaintenanceCommand): Promise<void> {
  // Loaded after validation: opening the pool needs DATABASE_URL
  const storage = await import("../server/storage");

  switch (command.action) {
    case "list-deleted": {
      const deleted = await storage.listDeletedProducts();
      for (const product of deleted) {
        logger.info("[catalog] Deleted product", {
          productId: product.id,
          barcode: product.barcode,
          name: product.name,
          deletedAt: product.deletedAt,
        });
      }
      logger.info("[catalog] Deleted products listed", { count: deleted.length });
      return;
    }
    case "delete-product": {
      const match = await storage.findByExactBarcode(command.barcode);
      if (!match || match.kind !== "product") {
        throw new PricingError("PRODUCT_NOT_FOUND", `No product has barcode ${command.barcode}`);
      }
      await storage.softDeleteProduct(match.product.id);
      logger.info("[catalog] Product soft-deleted", { productId: match.product.id, barcode: command.barcode });
      return;
    }
    case "restore-product":
      await storage.restoreProduct(command.id);
      logger.info("[catalog] Product restored", { productId: command.id });
      return;
    case "delete-alias":
      await storage.deleteAlias(command.id);
      logger.info("[catalog] Alias deleted", { aliasId: command.id });
      return;
    case "scheme-active":
      await storage.setSchemeActive(command.id, command.active);
      logger.info("[catalog] Scheme updated", { schemeId: command.id, isActive: command.active });
      return;
    case "delete-scheme":
      await storage.deleteScheme(command.id);
      logger.info("[catalog] Scheme deleted", { schemeId: command.id });
      return;
    case "price": {
      const engine = new PricingEngine({
        store: await storage.loadCatalogSnapshot(),
        config: loadPricingConfig(),
      });
      const result = await engine.priceLine({ token: command.code, quantity: command.qty, uom: command.uom ?? null });
      if (!result.ok) {
        logger.warn("[catalog] Code does not resolve", { code: command.code });
        return;
      }
      const { line } = result;
      logger.info("[catalog] Line priced", {
        productId: line.productId,
        uom: line.uom,
        quantity: line.quantity,
        rate: line.rate,
        mrp: line.mrp,
        lineAmount: line.lineAmount,
        scheme: line.scheme?.schemeName ?? null,
        warnings: line.warnings.map((warning) => warning.code),
      });
      return;
    }
  }
}

async function main() {
  const command = parseMaintenanceCommand(process.argv.slice(2));
  validateEnvironmentOrExit();

  const { pool } = await import("../server/db");
  try {
    await run(command);
  } finally {
    await pool.end();
  }
}

main().catch((error) => {
  logger.error("[catalog] Failed", { error });
  process.exit(1);
});
