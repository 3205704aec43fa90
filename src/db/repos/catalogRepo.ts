import type { CatalogRepo, LocationRow, ProductRow, Queryable } from "../types.js";

// Catalog tables are maintained by the admin tooling; the engine only reads them.
export function createCatalogRepo(db: Queryable): CatalogRepo {
  return {
    async getProductById(productId: string): Promise<ProductRow | null> {
      const q = await db.query<ProductRow>(
        "SELECT id, name, price_fiat, is_active FROM products WHERE id = $1 LIMIT 1",
        [productId]
      );
      return q.rows[0] ?? null;
    },

    async getLocationById(locationId: string): Promise<LocationRow | null> {
      const q = await db.query<LocationRow>(
        "SELECT id, product_id, name, content_links, is_active FROM locations WHERE id = $1 LIMIT 1",
        [locationId]
      );
      return q.rows[0] ?? null;
    }
  };
}
