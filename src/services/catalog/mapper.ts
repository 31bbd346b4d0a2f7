import { z } from 'zod';
import { CatalogProduct, CatalogProductSummary, ShopInfo } from '../../types/catalog.js';
import { parseCommaSeparated } from '../../utils/helpers.js';

// Shopify Admin REST shapes, limited to the fields the catalog reads.
// Money fields arrive as decimal strings.

const ShopifyVariantSchema = z.object({
  price: z.string().nullish(),
  compare_at_price: z.string().nullish(),
  sku: z.string().nullish(),
  inventory_quantity: z.number().nullish(),
});

const ShopifyImageSchema = z.object({
  src: z.string(),
});

export const ShopifyProductSchema = z.object({
  id: z.number(),
  title: z.string(),
  handle: z.string(),
  product_type: z.string().nullish(),
  vendor: z.string().nullish(),
  tags: z.string().nullish(),
  status: z.string().nullish(),
  created_at: z.string().nullish(),
  variants: z.array(ShopifyVariantSchema).nullish(),
  images: z.array(ShopifyImageSchema).nullish(),
});

export const ShopifyShopSchema = z.object({
  name: z.string(),
  email: z.string().nullish(),
  domain: z.string().nullish(),
  currency: z.string().nullish(),
  iana_timezone: z.string().nullish(),
  timezone: z.string().nullish(),
  plan_name: z.string().nullish(),
});

export type ShopifyProduct = z.infer<typeof ShopifyProductSchema>;
export type ShopifyShop = z.infer<typeof ShopifyShopSchema>;

function toAmount(value: string | null | undefined): number | null {
  if (value === null || value === undefined || value.trim() === '') {
    return null;
  }
  const amount = parseFloat(value);
  return isNaN(amount) ? null : amount;
}

/**
 * Flatten a Shopify product. The first variant stands in for price, SKU and stock;
 * the first image for the picture.
 */
export function mapProduct(product: ShopifyProduct, shopDomain: string): CatalogProduct {
  const variants = product.variants ?? [];
  const images = product.images ?? [];
  const variant = variants.length > 0 ? variants[0] : null;

  return {
    id: product.id,
    name: product.title,
    price: toAmount(variant?.price) ?? 0,
    compareAtPrice: toAmount(variant?.compare_at_price),
    sku: variant?.sku ?? '',
    inventoryQuantity: variant?.inventory_quantity ?? 0,
    productType: product.product_type ?? '',
    vendor: product.vendor ?? '',
    tags: parseCommaSeparated(product.tags ?? ''),
    status: product.status ?? '',
    createdAt: product.created_at ?? '',
    imageUrl: images.length > 0 ? images[0].src : null,
    variantsCount: variants.length,
    handle: product.handle,
    url: `https://${shopDomain}/products/${product.handle}`,
  };
}

export function mapProductSummary(product: ShopifyProduct): CatalogProductSummary {
  const variant = product.variants?.[0];
  return {
    id: product.id,
    name: product.title,
    price: toAmount(variant?.price) ?? 0,
    sku: variant?.sku ?? '',
    vendor: product.vendor ?? '',
    status: product.status ?? '',
  };
}

export function mapShop(shop: ShopifyShop): ShopInfo {
  return {
    name: shop.name,
    email: shop.email ?? '',
    domain: shop.domain ?? '',
    currency: shop.currency ?? '',
    timezone: shop.iana_timezone ?? shop.timezone ?? '',
    planName: shop.plan_name ?? '',
  };
}
