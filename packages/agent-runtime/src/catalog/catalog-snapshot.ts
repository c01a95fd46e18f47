/**
 * Catalog Snapshot
 * Read-only view of active products and locations, reloaded after a TTL
 */
import { DELIVERY_PRODUCT_NAME } from '@pedibot/shared';
import { ServiceUnavailableError, createChildLogger, errorMessage, withDeadline } from '@pedibot/core';
import type { CatalogLocation, CatalogProduct, CatalogProvider } from '../types/index.js';

const log = createChildLogger({ component: 'catalog' });

const DEFAULT_CATALOG_TTL_MS = 5 * 60 * 1000;

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

export class CatalogSnapshot {
  private productsByName = new Map<string, CatalogProduct>();
  private locationsByName = new Map<string, CatalogLocation>();

  constructor(
    readonly products: readonly CatalogProduct[],
    readonly locations: readonly CatalogLocation[],
    readonly loadedAt: Date
  ) {
    for (const product of products) {
      const key = normalizeName(product.name);
      // First active entry wins on name collisions
      if (!this.productsByName.has(key)) {
        this.productsByName.set(key, product);
      }
    }
    for (const location of locations) {
      const key = normalizeName(location.name);
      if (!this.locationsByName.has(key)) {
        this.locationsByName.set(key, location);
      }
    }
  }

  /**
   * Case-insensitive, trimmed name lookup
   */
  findProduct(name: string): CatalogProduct | undefined {
    return this.productsByName.get(normalizeName(name));
  }

  deliveryProduct(): CatalogProduct | undefined {
    return this.findProduct(DELIVERY_PRODUCT_NAME);
  }

  /**
   * Products the customer can order directly (everything but the delivery fee)
   */
  menu(): CatalogProduct[] {
    const delivery = normalizeName(DELIVERY_PRODUCT_NAME);
    return this.products.filter((product) => normalizeName(product.name) !== delivery);
  }

  findLocation(name: string): CatalogLocation | undefined {
    return this.locationsByName.get(normalizeName(name));
  }

  /**
   * The configured default location, or the first active one
   */
  defaultLocation(preferredName: string | null): CatalogLocation | undefined {
    if (preferredName) {
      const preferred = this.findLocation(preferredName);
      if (preferred) return preferred;
    }
    return this.locations[0];
  }
}

export interface RefreshingCatalogOptions {
  ttlMs?: number;
  timeoutMs: number;
}

/**
 * Caches a snapshot for `ttlMs` and reloads it from the provider on expiry.
 * Concurrent callers share one in-flight load.
 */
export class RefreshingCatalog {
  private snapshot: CatalogSnapshot | null = null;
  private loading: Promise<CatalogSnapshot> | null = null;
  private ttlMs: number;

  constructor(
    private provider: CatalogProvider,
    private options: RefreshingCatalogOptions
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CATALOG_TTL_MS;
  }

  /**
   * Current snapshot; throws ServiceUnavailableError when it cannot be loaded
   */
  async current(now: Date, signal?: AbortSignal): Promise<CatalogSnapshot> {
    if (this.snapshot && now.getTime() - this.snapshot.loadedAt.getTime() < this.ttlMs) {
      return this.snapshot;
    }

    if (!this.loading) {
      this.loading = this.load(now, signal).finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  /**
   * Drop the cached snapshot so the next read reloads
   */
  invalidate(): void {
    this.snapshot = null;
  }

  private async load(now: Date, signal?: AbortSignal): Promise<CatalogSnapshot> {
    try {
      const [products, locations] = await withDeadline(
        'catalog.load',
        () => Promise.all([this.provider.activeProducts(), this.provider.activeLocations()]),
        { timeoutMs: this.options.timeoutMs, signal }
      );
      const snapshot = new CatalogSnapshot(products, locations, now);
      this.snapshot = snapshot;
      log.info({ products: products.length, locations: locations.length }, 'Catalog loaded');
      return snapshot;
    } catch (error) {
      log.error({ err: error }, 'Catalog load failed');
      if (error instanceof ServiceUnavailableError) throw error;
      throw new ServiceUnavailableError(`Catalog unavailable: ${errorMessage(error)}`, 'SERVICE_UNAVAILABLE', error);
    }
  }
}
