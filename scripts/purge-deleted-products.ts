import "dotenv/config";
import { loadPricingConfig } from "../server/config";
import { validateEnvironmentOrExit } from "../server/envValidation";
import { logger } from "../server/logger";

// Physically removes products soft-deleted longer than
// DELETED_PRODUCT_RETENTION_DAYS (default 30). Meant for a daily cron.
async function main() {
  validateEnvironmentOrExit();
  const config = loadPricingConfig();

  // Loaded after validation: opening the pool needs DATABASE_URL
  const { purgeDeletedProducts } = await import("../server/storage");
  const { pool } = await import("../server/db");

  try {
    const purged = await purgeDeletedProducts(config.deletedProductRetentionDays);
    logger.info("[purge] Done", { purged, retentionDays: config.deletedProductRetentionDays });
  } finally {
    await pool.end();
  }
}

main().catch((error) => {
  logger.error("[purge] Failed", { error });
  process.exit(1);
});
