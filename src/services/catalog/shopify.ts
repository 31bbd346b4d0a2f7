import { z } from 'zod';
import {
  CatalogError,
  CatalogProduct,
  CatalogProductSummary,
  CatalogResult,
  CatalogSession,
  ConnectionTestResult,
  ShopInfo,
} from '../../types/catalog.js';
import { config } from '../../utils/config.js';
import { describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { normalizeShopDomain } from './domain.js';
import { ShopifyProductSchema, ShopifyShopSchema, mapProduct, mapProductSummary, mapShop } from './mapper.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ShopifyConnectorOptions {
  apiVersion?: string;
  fetch?: FetchLike;
}

const ProductListSchema = z.object({ products: z.array(ShopifyProductSchema) });
const ProductEnvelopeSchema = z.object({ product: ShopifyProductSchema });
const ShopEnvelopeSchema = z.object({ shop: ShopifyShopSchema });

function ok<T>(value: T): CatalogResult<T> {
  return { ok: true, value };
}

function fail<T>(error: CatalogError): CatalogResult<T> {
  return { ok: false, error };
}

/**
 * Read-only Shopify Admin REST client. Holds one session at a time and is not
 * meant to be shared between concurrent callers.
 */
export class ShopifyConnector {
  readonly shopDomain: string;
  private accessToken: string;
  private apiVersion: string;
  private fetchImpl: FetchLike;
  private session: CatalogSession | null = null;

  constructor(shop: string, accessToken: string, options: ShopifyConnectorOptions = {}) {
    this.shopDomain = normalizeShopDomain(shop);
    this.accessToken = accessToken;
    this.apiVersion = options.apiVersion ?? config.shopify.apiVersion;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get isConnected(): boolean {
    return this.session !== null;
  }

  /**
   * Open a session and verify it with a shop lookup.
   */
  async connect(): Promise<CatalogResult<CatalogSession>> {
    const session: CatalogSession = {
      shopDomain: this.shopDomain,
      accessToken: this.accessToken,
      apiVersion: this.apiVersion,
    };

    const probe = await this.request(session, 'shop.json', ShopEnvelopeSchema);
    if (!probe.ok) {
      logger.warn('Shopify connection failed', { shop: this.shopDomain, kind: probe.error.kind });
      return probe;
    }

    this.session = session;
    logger.info('Connected to Shopify', { shop: this.shopDomain, apiVersion: this.apiVersion });
    return ok(session);
  }

  async listProducts(limit: number = 50): Promise<CatalogResult<CatalogProduct[]>> {
    const result = await this.call(`products.json?limit=${limit}`, ProductListSchema);
    if (!result.ok) return result;

    const products = result.value.products.map((p) => mapProduct(p, this.shopDomain));
    logger.info('Fetched products from Shopify', { shop: this.shopDomain, count: products.length });
    return ok(products);
  }

  async getProduct(id: number | string): Promise<CatalogResult<CatalogProduct>> {
    const result = await this.call(`products/${encodeURIComponent(String(id))}.json`, ProductEnvelopeSchema);
    if (!result.ok) return result;
    return ok(mapProduct(result.value.product, this.shopDomain));
  }

  async searchByTitle(query: string, limit: number = 20): Promise<CatalogResult<CatalogProductSummary[]>> {
    const params = new URLSearchParams({ title: query, limit: String(limit) });
    const result = await this.call(`products.json?${params.toString()}`, ProductListSchema);
    if (!result.ok) return result;

    logger.debug('Shopify title search', { query, count: result.value.products.length });
    return ok(result.value.products.map(mapProductSummary));
  }

  async getShopInfo(): Promise<CatalogResult<ShopInfo>> {
    const result = await this.call('shop.json', ShopEnvelopeSchema);
    if (!result.ok) return result;
    return ok(mapShop(result.value.shop));
  }

  disconnect(): void {
    if (this.session) {
      this.session = null;
      logger.debug('Shopify session cleared', { shop: this.shopDomain });
    }
  }

  private async call<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<CatalogResult<T>> {
    if (!this.session) {
      return fail({ kind: 'connection', message: 'Not connected to a Shopify store' });
    }
    const result = await this.request(this.session, path, schema);
    if (!result.ok) {
      logger.error('Shopify request failed', { shop: this.shopDomain, path, ...result.error });
    }
    return result;
  }

  private async request<T>(
    session: CatalogSession,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<CatalogResult<T>> {
    const url = `https://${session.shopDomain}/admin/api/${session.apiVersion}/${path}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          'X-Shopify-Access-Token': session.accessToken,
          Accept: 'application/json',
        },
      });
    } catch (error) {
      return fail({ kind: 'connection', message: describeError(error) });
    }

    const { status } = response;
    if (status === 401 || status === 403) {
      return fail({ kind: 'auth', message: 'Shopify rejected the access token', status });
    }
    if (status === 404) {
      return fail({ kind: 'not_found', message: `Not found: ${path}`, status });
    }
    if (!response.ok) {
      return fail({ kind: 'connection', message: `Shopify responded with HTTP ${status}`, status });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return fail({ kind: 'connection', message: `Invalid JSON from Shopify: ${describeError(error)}`, status });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return fail({ kind: 'connection', message: 'Unexpected response shape from Shopify', status });
    }
    return ok(parsed.data);
  }
}

/**
 * Connect, read the shop name, and disconnect.
 */
export async function testConnection(
  shop: string,
  accessToken: string,
  options: ShopifyConnectorOptions = {}
): Promise<ConnectionTestResult> {
  const connector = new ShopifyConnector(shop, accessToken, options);

  const connected = await connector.connect();
  if (!connected.ok) {
    return connected.error.kind === 'auth'
      ? { success: false, message: 'Failed to connect. Check your credentials.' }
      : { success: false, message: `Connection error: ${connected.error.message}` };
  }

  const shopInfo = await connector.getShopInfo();
  connector.disconnect();

  return shopInfo.ok
    ? { success: true, message: `Connected to ${shopInfo.value.name}` }
    : { success: true, message: 'Connection successful' };
}
