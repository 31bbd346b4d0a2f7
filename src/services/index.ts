export { analysisEngine, AnalysisEngine, requireCredential } from './analysis/engine.js';
export { buildAnalysisPrompt } from './analysis/prompt.js';
export { createCatalogAnalysisContext, createProductInput, productInputFromCatalog } from './analysis/product.js';
export { getFormatInstructions, parseAnalysis } from './analysis/schema.js';
export { ShopifyConnector, testConnection } from './catalog/shopify.js';
export { normalizeShopDomain } from './catalog/domain.js';
export { buildDashboard, verdictBand } from './dashboard.js';
export { listProviders, providerRegistry, resolveProvider } from './providers/registry.js';
