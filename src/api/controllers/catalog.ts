import { Request, Response, NextFunction } from 'express';
import {
  ShopifyConnector,
  analysisEngine,
  buildDashboard,
  createCatalogAnalysisContext,
  productInputFromCatalog,
  requireCredential,
  resolveProvider,
  testConnection,
} from '../../services/index.js';
import { AnalysisResponse, CatalogAnalysisRequest, CatalogConnectionRequest } from '../../types/api.js';
import { CatalogError, CatalogResult } from '../../types/catalog.js';
import {
  AppError,
  CatalogAuthError,
  CatalogConnectionError,
  CatalogNotFoundError,
  createError,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

// Shopify caps REST page size at 250
const MAX_LIMIT = 250;

function toHttpError(error: CatalogError): AppError {
  switch (error.kind) {
    case 'auth':
      return new CatalogAuthError(error.message);
    case 'not_found':
      return new CatalogNotFoundError(error.message);
    case 'connection':
      return new CatalogConnectionError(error.message, { details: { status: error.status } });
  }
}

function unwrap<T>(result: CatalogResult<T>): T {
  if (!result.ok) {
    throw toHttpError(result.error);
  }
  return result.value;
}

function parseLimit(value: unknown, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const limit = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
    throw createError(`limit must be between 1 and ${MAX_LIMIT}`, 400, 'INVALID_REQUEST', { field: 'limit' });
  }
  return limit;
}

function credentialsFrom(req: Request): { shop: string; accessToken: string } {
  const shop = req.get('x-shop-domain');
  const accessToken = req.get('x-shop-access-token');
  if (!shop || !accessToken) {
    throw createError(
      'Missing shop credentials. Provide X-Shop-Domain and X-Shop-Access-Token headers.',
      400,
      'INVALID_REQUEST'
    );
  }
  return { shop, accessToken };
}

/**
 * Open a fresh session for one request and always release it.
 */
async function withConnector<T>(req: Request, work: (connector: ShopifyConnector) => Promise<T>): Promise<T> {
  const { shop, accessToken } = credentialsFrom(req);
  const connector = new ShopifyConnector(shop, accessToken);
  unwrap(await connector.connect());
  try {
    return await work(connector);
  } finally {
    connector.disconnect();
  }
}

/**
 * POST /api/catalog/test-connection
 */
export async function testCatalogConnection(
  req: Request<{}, {}, CatalogConnectionRequest>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const { shop, accessToken } = req.body;
    if (typeof shop !== 'string' || !shop || typeof accessToken !== 'string' || !accessToken) {
      throw createError('shop and accessToken are required', 400, 'INVALID_REQUEST', {
        fields: ['shop', 'accessToken'],
      });
    }

    const result = await testConnection(shop, accessToken);
    logger.info('Catalog connection test', { shop, success: result.success });

    res.json({ success: true, data: result });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/catalog/shop
 */
export async function getShop(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const shop = await withConnector(req, async (connector) => unwrap(await connector.getShopInfo()));
    res.json({ success: true, data: shop });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/catalog/products?limit=
 */
export async function listCatalogProducts(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const limit = parseLimit(req.query.limit, 50);
    const products = await withConnector(req, async (connector) => unwrap(await connector.listProducts(limit)));
    res.json({ success: true, data: { products, total: products.length } });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/catalog/products/search?q=&limit=
 */
export async function searchCatalogProducts(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const query = typeof req.query.q === 'string' ? req.query.q.trim() : '';
    if (!query) {
      throw createError('Query is required', 400, 'INVALID_REQUEST', { field: 'q' });
    }
    const limit = parseLimit(req.query.limit, 20);

    const products = await withConnector(req, async (connector) =>
      unwrap(await connector.searchByTitle(query, limit))
    );
    res.json({ success: true, data: { query, products, total: products.length } });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/catalog/products/:id
 */
export async function getCatalogProduct(
  req: Request<{ id: string }>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const product = await withConnector(req, async (connector) => unwrap(await connector.getProduct(req.params.id)));
    res.json({ success: true, data: product });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/catalog/products/:id/analysis
 * Analyse a store product; name and price come from Shopify, the rest from the body
 */
export async function analyzeCatalogProduct(
  req: Request<{ id: string }, {}, CatalogAnalysisRequest>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const { businessModel, platform, cost } = req.body;
    const provider = typeof req.body.provider === 'string' ? req.body.provider : '';
    const credential = typeof req.body.credential === 'string' ? req.body.credential : '';

    // Reject bad options before opening a store session
    const context = createCatalogAnalysisContext({ businessModel, platform, cost });
    requireCredential(credential);

    const catalogProduct = await withConnector(req, async (connector) =>
      unwrap(await connector.getProduct(req.params.id))
    );
    const product = productInputFromCatalog(catalogProduct, context);
    const { definition, fallback } = resolveProvider(provider);

    const result = await analysisEngine.evaluate(product, provider, credential);

    const response: AnalysisResponse = {
      provider: { id: definition.id, label: definition.label, model: definition.model, fallback },
      result,
      dashboard: buildDashboard(product, result),
    };

    res.json({ success: true, data: response });
  } catch (error) {
    next(error);
  }
}
