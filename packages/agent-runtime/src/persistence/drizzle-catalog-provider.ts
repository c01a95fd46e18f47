/**
 * Catalog Provider on Postgres
 */
import { asc, eq } from 'drizzle-orm';
import { schema } from '@pedibot/core';
import type { Database } from '@pedibot/core';
import type { CatalogLocation, CatalogProduct, CatalogProvider } from '../types/index.js';

const { products, locations } = schema;

export class DrizzleCatalogProvider implements CatalogProvider {
  constructor(private db: Database) {}

  async activeProducts(): Promise<CatalogProduct[]> {
    const rows = await this.db
      .select()
      .from(products)
      .where(eq(products.active, true))
      .orderBy(asc(products.category), asc(products.name));
    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      description: row.description,
      price: row.basePrice,
      isCombo: row.isCombo,
      category: row.category,
    }));
  }

  async activeLocations(): Promise<CatalogLocation[]> {
    const rows = await this.db.select().from(locations).where(eq(locations.active, true)).orderBy(asc(locations.name));
    return rows.map((row) => ({ id: row.id, name: row.name, address: row.address, phone: row.phone }));
  }
}
