import { Router, Request, Response } from 'express';
import { authMiddleware } from './middleware/auth.js';
import { analyzeProduct, getAnalysisOptions } from './controllers/analysis.js';
import {
  analyzeCatalogProduct,
  getCatalogProduct,
  getShop,
  listCatalogProducts,
  searchCatalogProducts,
  testCatalogConnection,
} from './controllers/catalog.js';
import { listProviders } from '../services/index.js';
import { HealthCheckResponse } from '../types/api.js';

const router = Router();

// Health check (no auth required)
router.get('/health', (_req: Request, res: Response) => {
  const response: HealthCheckResponse = {
    status: 'ok',
    timestamp: new Date().toISOString(),
    providers: listProviders().map((p) => p.id),
  };

  res.json(response);
});

// Protected routes
router.use('/api', authMiddleware);

// Analysis endpoints
router.get('/api/analysis/options', getAnalysisOptions);
router.post('/api/analysis', analyzeProduct);

// Catalog endpoints; search is registered before :id so it is not taken as an id
router.post('/api/catalog/test-connection', testCatalogConnection);
router.get('/api/catalog/shop', getShop);
router.get('/api/catalog/products', listCatalogProducts);
router.get('/api/catalog/products/search', searchCatalogProducts);
router.get('/api/catalog/products/:id', getCatalogProduct);
router.post('/api/catalog/products/:id/analysis', analyzeCatalogProduct);

export { router };
