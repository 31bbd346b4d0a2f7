export interface CatalogProduct {
  id: number;
  name: string;
  price: number;
  compareAtPrice: number | null;
  sku: string;
  inventoryQuantity: number;
  productType: string;
  vendor: string;
  tags: string[];
  status: string;
  createdAt: string;
  imageUrl: string | null;
  variantsCount: number;
  handle: string;
  url: string;
}

// Search results carry only the fields a picker needs
export type CatalogProductSummary = Pick<CatalogProduct, 'id' | 'name' | 'price' | 'sku' | 'vendor' | 'status'>;

export interface ShopInfo {
  name: string;
  email: string;
  domain: string;
  currency: string;
  timezone: string;
  planName: string;
}

export interface CatalogSession {
  shopDomain: string;
  accessToken: string;
  apiVersion: string;
}

export type CatalogErrorKind = 'auth' | 'connection' | 'not_found';

export interface CatalogError {
  kind: CatalogErrorKind;
  message: string;
  status?: number;
}

export type CatalogResult<T> = { ok: true; value: T } | { ok: false; error: CatalogError };

export interface ConnectionTestResult {
  success: boolean;
  message: string;
}
