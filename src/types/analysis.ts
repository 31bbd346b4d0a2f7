export const BUSINESS_MODEL_IDS = ['Dropshipping', 'AmazonFBA', 'TikTokShop', 'PrivateLabel', 'WholesaleB2B'] as const;

export type BusinessModel = (typeof BUSINESS_MODEL_IDS)[number];

// Display labels, as shown in the form and written into the prompt
export const BUSINESS_MODELS: Record<BusinessModel, string> = {
  Dropshipping: 'Dropshipping',
  AmazonFBA: 'Amazon FBA',
  TikTokShop: 'TikTok Shop',
  PrivateLabel: 'Private Label',
  WholesaleB2B: 'Wholesale/B2B',
};

export const PLATFORM_IDS = ['Shopify', 'Amazon', 'TikTokShop', 'Etsy', 'WooCommerce', 'NativeAds'] as const;

export type Platform = (typeof PLATFORM_IDS)[number];

export const PLATFORMS: Record<Platform, string> = {
  Shopify: 'Shopify',
  Amazon: 'Amazon',
  TikTokShop: 'TikTok Shop',
  Etsy: 'Etsy',
  WooCommerce: 'WooCommerce',
  NativeAds: 'Native Ads (Taboola/Outbrain)',
};

export const VERDICTS = ['GREENLIGHT', 'GO', 'FIX', 'KILL'] as const;

export type Verdict = (typeof VERDICTS)[number];

// Order matters: the dashboard renders scorecards in this order
export const CRITERIA = [
  'margin',
  'platform_fit',
  'trend',
  'competition',
  'content',
  'shipping',
  'scalability',
  'brand',
  'risk',
] as const;

export type Criterion = (typeof CRITERIA)[number];

export interface ProductInput {
  readonly name: string;
  readonly price: number;
  readonly cost: number;
  readonly businessModel: BusinessModel;
  readonly platform: Platform;
}

export interface CriterionScore {
  readonly score: number;
  readonly insight: string;
}

export interface AnalysisResult {
  readonly verdict: Verdict;
  readonly actionPlan: readonly string[];
  readonly scores: Readonly<Record<Criterion, CriterionScore>>;
}
