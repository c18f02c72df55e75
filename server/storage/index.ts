/**
 * Storage Layer Index
 *
 * Instantiates the catalog repository against the shared pool and re-exports
 * the methods the maintenance scripts call as top-level named exports. The
 * seed takes the repository itself.
 *
 * All methods are bound to the repository instance to preserve `this` context.
 */

import { db } from "../db";
import { CatalogRepository } from "./catalog.repo";

// Instantiate repositories
export const catalogRepo = new CatalogRepository(db);

// =============================
// Catalog Reads
// =============================
export const findByExactBarcode = catalogRepo.findByExactBarcode.bind(catalogRepo);
export const loadCatalogSnapshot = catalogRepo.loadSnapshot.bind(catalogRepo);

// =============================
// Catalog Maintenance
// =============================
export const deleteAlias = catalogRepo.deleteAlias.bind(catalogRepo);
export const softDeleteProduct = catalogRepo.softDeleteProduct.bind(catalogRepo);
export const restoreProduct = catalogRepo.restoreProduct.bind(catalogRepo);
export const listDeletedProducts = catalogRepo.listDeletedProducts.bind(catalogRepo);
export const purgeDeletedProducts = catalogRepo.purgeDeletedProducts.bind(catalogRepo);

// =============================
// Scheme Maintenance
// =============================
export const setSchemeActive = catalogRepo.setSchemeActive.bind(catalogRepo);
export const deleteScheme = catalogRepo.deleteScheme.bind(catalogRepo);
