import { z } from 'zod';
import {
  BUSINESS_MODELS,
  BUSINESS_MODEL_IDS,
  BusinessModel,
  PLATFORMS,
  PLATFORM_IDS,
  Platform,
  ProductInput,
} from '../../types/analysis.js';
import { CatalogProduct } from '../../types/catalog.js';
import { AppError, createError } from '../../utils/errors.js';

// Forms post display labels ("Amazon FBA"); the API also accepts the keys ("AmazonFBA")
function labelToKey(labels: Record<string, string>) {
  return (value: unknown): unknown => {
    if (typeof value !== 'string') return value;
    const entry = Object.entries(labels).find(([, label]) => label === value);
    return entry ? entry[0] : value;
  };
}

const BusinessModelSchema = z.preprocess(
  labelToKey(BUSINESS_MODELS),
  z.enum(BUSINESS_MODEL_IDS)
);

const PlatformSchema = z.preprocess(
  labelToKey(PLATFORMS),
  z.enum(PLATFORM_IDS)
);

// Numbers, or numeric strings from form fields; blanks, booleans and null are not amounts
const AmountSchema = z
  .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
  .pipe(z.number().finite().nonnegative());

export const ProductInputSchema = z.object({
  name: z.string().trim().min(1),
  price: AmountSchema,
  cost: AmountSchema,
  businessModel: BusinessModelSchema,
  platform: PlatformSchema,
});

const CatalogAnalysisContextSchema = z.object({
  businessModel: BusinessModelSchema,
  platform: PlatformSchema,
  cost: AmountSchema.optional(),
});

function invalidInput(message: string, error: z.ZodError): AppError {
  return createError(message, 400, 'INVALID_REQUEST', {
    issues: error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  });
}

/**
 * Validate raw request input into a frozen ProductInput.
 */
export function createProductInput(raw: unknown): ProductInput {
  const result = ProductInputSchema.safeParse(raw);
  if (!result.success) {
    throw invalidInput('Invalid product input', result.error);
  }
  return Object.freeze({ ...result.data });
}

export interface CatalogAnalysisContext {
  readonly businessModel: BusinessModel;
  readonly platform: Platform;
  // Shopify does not expose landed cost; unknown cost is analysed as 0
  readonly cost?: number;
}

/**
 * Validate the caller-supplied half of a catalog analysis, so a bad request
 * is rejected before the store is contacted.
 */
export function createCatalogAnalysisContext(raw: unknown): CatalogAnalysisContext {
  const result = CatalogAnalysisContextSchema.safeParse(raw);
  if (!result.success) {
    throw invalidInput('Invalid analysis options', result.error);
  }
  return Object.freeze({ ...result.data });
}

export function productInputFromCatalog(product: CatalogProduct, context: CatalogAnalysisContext): ProductInput {
  return createProductInput({
    name: product.name,
    price: product.price,
    cost: context.cost ?? 0,
    businessModel: context.businessModel,
    platform: context.platform,
  });
}
