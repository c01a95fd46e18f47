/**
 * Tests for Catalog Snapshot
 */
import { describe, it, expect } from 'vitest';
import { ServiceUnavailableError } from '@pedibot/core';
import { CatalogSnapshot, RefreshingCatalog } from '../../src/catalog/catalog-snapshot.js';
import { StaticCatalogProvider, T0, minutesAfter, mockLocations, mockProducts } from './mocks.js';

describe('CatalogSnapshot', () => {
  const snapshot = new CatalogSnapshot(mockProducts, mockLocations, T0);

  it('should find products ignoring case and surrounding spaces', () => {
    expect(snapshot.findProduct(' PHILADELPHIA roll')?.id).toBe('prod-002');
    expect(snapshot.findProduct('Tempura Roll')).toBeUndefined();
  });

  it('should keep the first product on name collisions', () => {
    const duplicated = new CatalogSnapshot(
      [
        ...mockProducts,
        { id: 'prod-999', name: 'california roll', description: null, price: 1, isCombo: false, category: null },
      ],
      mockLocations,
      T0
    );

    expect(duplicated.findProduct('California Roll')?.id).toBe('prod-001');
  });

  it('should leave the delivery fee out of the menu', () => {
    expect(snapshot.deliveryProduct()?.price).toBe(500);
    expect(snapshot.menu().map((p) => p.name)).toEqual(['California Roll', 'Philadelphia Roll', 'Combo Familiar']);
  });

  it('should pick the preferred location or fall back to the first one', () => {
    expect(snapshot.defaultLocation('puerto')?.id).toBe('loc-002');
    expect(snapshot.defaultLocation('Norte')?.id).toBe('loc-001');
    expect(snapshot.defaultLocation(null)?.id).toBe('loc-001');
    expect(new CatalogSnapshot(mockProducts, [], T0).defaultLocation(null)).toBeUndefined();
  });
});

describe('RefreshingCatalog', () => {
  it('should reuse the snapshot until the TTL expires', async () => {
    const provider = new StaticCatalogProvider();
    const catalog = new RefreshingCatalog(provider, { ttlMs: 60_000, timeoutMs: 1000 });

    const first = await catalog.current(T0);
    const cached = await catalog.current(minutesAfter(T0, 0.5));
    const reloaded = await catalog.current(minutesAfter(T0, 1));

    expect(cached).toBe(first);
    expect(reloaded).not.toBe(first);
    expect(provider.loads).toBe(2);
  });

  it('should share one load between concurrent readers', async () => {
    const provider = new StaticCatalogProvider();
    const catalog = new RefreshingCatalog(provider, { timeoutMs: 1000 });

    const [a, b] = await Promise.all([catalog.current(T0), catalog.current(T0)]);

    expect(a).toBe(b);
    expect(provider.loads).toBe(1);
  });

  it('should reload after being invalidated', async () => {
    const provider = new StaticCatalogProvider();
    const catalog = new RefreshingCatalog(provider, { timeoutMs: 1000 });
    await catalog.current(T0);

    provider.products = mockProducts.slice(0, 1);
    catalog.invalidate();

    expect((await catalog.current(T0)).products).toHaveLength(1);
  });

  it('should report the catalog as unavailable when the provider fails', async () => {
    const provider = new StaticCatalogProvider();
    provider.fail = true;
    const catalog = new RefreshingCatalog(provider, { timeoutMs: 1000 });

    await expect(catalog.current(T0)).rejects.toBeInstanceOf(ServiceUnavailableError);
    await expect(catalog.current(T0)).rejects.toThrow('Catalog unavailable: catalog offline');
  });
});
