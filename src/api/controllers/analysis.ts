import { Request, Response, NextFunction } from 'express';
import { analysisEngine, buildDashboard, createProductInput, listProviders, resolveProvider } from '../../services/index.js';
import { BUSINESS_MODELS, BUSINESS_MODEL_IDS, PLATFORMS, PLATFORM_IDS } from '../../types/analysis.js';
import { AnalysisOptionsResponse, AnalysisRequest, AnalysisResponse } from '../../types/api.js';
import { logger } from '../../utils/logger.js';

/**
 * GET /api/analysis/options
 * Choices for the analysis form
 */
export function getAnalysisOptions(_req: Request, res: Response): void {
  const response: AnalysisOptionsResponse = {
    providers: listProviders().map((p) => ({ id: p.id, label: p.label, model: p.model })),
    businessModels: BUSINESS_MODEL_IDS.map((id) => ({ id, label: BUSINESS_MODELS[id] })),
    platforms: PLATFORM_IDS.map((id) => ({ id, label: PLATFORMS[id] })),
  };

  res.json({ success: true, data: response });
}

/**
 * POST /api/analysis
 * Run the 9-point analysis for a manually entered product
 */
export async function analyzeProduct(
  req: Request<{}, {}, AnalysisRequest>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const { product: rawProduct } = req.body;
    const provider = typeof req.body.provider === 'string' ? req.body.provider : '';
    const credential = typeof req.body.credential === 'string' ? req.body.credential : '';

    const product = createProductInput(rawProduct);
    const { definition, fallback } = resolveProvider(provider);

    logger.info('Analysis request', { product: product.name, provider: definition.id, fallback });

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
