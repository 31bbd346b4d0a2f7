import { config } from '../../utils/config.js';

/**
 * Reduce a user-supplied shop identifier to a bare Shopify domain.
 * "mystore" and "https://mystore.myshopify.com/" both become "mystore.myshopify.com";
 * custom domains ("shop.example.com") are kept as given.
 */
export function normalizeShopDomain(identifier: string, suffix: string = config.shopify.domainSuffix): string {
  const domain = identifier
    .trim()
    .replace(/^https?:\/\//i, '')
    .replace(/\/+$/, '');

  if (domain.endsWith(suffix) || domain.includes('.')) {
    return domain;
  }
  return `${domain}${suffix}`;
}
