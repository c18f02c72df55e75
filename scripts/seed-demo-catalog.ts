import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import { parseSeedCatalog, seedCatalog } from "../server/catalog/catalogSeed";
import { validateEnvironmentOrExit } from "../server/envValidation";
import { logger } from "../server/logger";

function readDemoCatalog() {
  const file = path.join(__dirname, "data", "demo-catalog.json");
  return parseSeedCatalog(JSON.parse(fs.readFileSync(file, "utf8")));
}

async function main() {
  validateEnvironmentOrExit();

  // Loaded after validation: opening the pool needs DATABASE_URL
  const { catalogRepo } = await import("../server/storage");
  const { enableTrigramExtension, probeCatalogSchema } = await import("../server/db");
  const catalog = readDemoCatalog();

  await enableTrigramExtension();
  const probe = await probeCatalogSchema();
  if (probe.missingTables.length > 0) {
    throw new Error(`Catalog tables missing: ${probe.missingTables.join(", ")}`);
  }

  const summary = await seedCatalog(catalogRepo, catalog);
  logger.info("[seed] Demo catalog ready", summary);
}

main()
  .then(() => process.exit(0))
  .catch((error) => {
    logger.error("[seed] Failed", { error });
    process.exit(1);
  });
