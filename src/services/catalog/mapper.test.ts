import { describe, it, expect } from 'vitest';
import { ShopifyProduct, mapProduct, mapProductSummary, mapShop } from './mapper.js';

const DOMAIN = 'test-store.myshopify.com';

const glowBelt: ShopifyProduct = {
  id: 7001,
  title: 'Glow Belt',
  handle: 'glow-belt',
  product_type: 'Wellness',
  vendor: 'Test Vendor',
  tags: 'wellness, light therapy,  bestseller',
  status: 'active',
  created_at: '2024-03-01T10:00:00-05:00',
  variants: [
    { price: '89.50', compare_at_price: '119.00', sku: 'GB-S', inventory_quantity: 14 },
    { price: '94.50', compare_at_price: null, sku: 'GB-L', inventory_quantity: 3 },
  ],
  images: [{ src: 'https://cdn.example.com/glow-belt-front.jpg' }, { src: 'https://cdn.example.com/glow-belt-back.jpg' }],
};

describe('mapProduct', () => {
  it('uses the first variant and first image', () => {
    expect(mapProduct(glowBelt, DOMAIN)).toEqual({
      id: 7001,
      name: 'Glow Belt',
      price: 89.5,
      compareAtPrice: 119,
      sku: 'GB-S',
      inventoryQuantity: 14,
      productType: 'Wellness',
      vendor: 'Test Vendor',
      tags: ['wellness', 'light therapy', 'bestseller'],
      status: 'active',
      createdAt: '2024-03-01T10:00:00-05:00',
      imageUrl: 'https://cdn.example.com/glow-belt-front.jpg',
      variantsCount: 2,
      handle: 'glow-belt',
      url: 'https://test-store.myshopify.com/products/glow-belt',
    });
  });

  it('maps a product without variants to zero price, empty SKU and no stock', () => {
    const product = mapProduct({ ...glowBelt, variants: [] }, DOMAIN);

    expect(product).toMatchObject({
      price: 0,
      compareAtPrice: null,
      sku: '',
      inventoryQuantity: 0,
      variantsCount: 0,
    });
  });

  it('maps a product without images to a null image', () => {
    expect(mapProduct({ ...glowBelt, images: [] }, DOMAIN).imageUrl).toBeNull();
    expect(mapProduct({ ...glowBelt, images: undefined }, DOMAIN).imageUrl).toBeNull();
  });

  it('treats blank or missing variant fields as absent', () => {
    const product = mapProduct(
      { ...glowBelt, tags: '', variants: [{ price: '', compare_at_price: '', sku: null, inventory_quantity: null }] },
      DOMAIN
    );

    expect(product).toMatchObject({ price: 0, compareAtPrice: null, sku: '', inventoryQuantity: 0, tags: [] });
  });
});

describe('mapProductSummary', () => {
  it('keeps only the picker fields', () => {
    expect(mapProductSummary(glowBelt)).toEqual({
      id: 7001,
      name: 'Glow Belt',
      price: 89.5,
      sku: 'GB-S',
      vendor: 'Test Vendor',
      status: 'active',
    });
  });
});

describe('mapShop', () => {
  it('prefers the IANA timezone', () => {
    expect(
      mapShop({
        name: 'Test Store',
        email: 'owner@example.com',
        domain: 'shop.example.com',
        currency: 'USD',
        timezone: '(GMT-05:00) Eastern Time (US & Canada)',
        iana_timezone: 'America/New_York',
        plan_name: 'basic',
      })
    ).toEqual({
      name: 'Test Store',
      email: 'owner@example.com',
      domain: 'shop.example.com',
      currency: 'USD',
      timezone: 'America/New_York',
      planName: 'basic',
    });
  });
});
