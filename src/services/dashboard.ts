import { AnalysisResult, CRITERIA, Criterion, ProductInput, Verdict } from '../types/analysis.js';

export type VerdictBand = 'success' | 'warning' | 'danger';

const BAND_COLORS: Record<VerdictBand, string> = {
  success: '#28a745',
  warning: '#ffc107',
  danger: '#dc3545',
};

const VERDICT_BANDS: Record<Verdict, VerdictBand> = {
  GREENLIGHT: 'success',
  GO: 'success',
  FIX: 'warning',
  KILL: 'danger',
};

const CRITERION_LABELS: Record<Criterion, string> = {
  margin: 'Profit Margin',
  platform_fit: 'Platform Fit',
  trend: 'Trend Velocity',
  competition: 'Competition',
  content: 'Content Difficulty',
  shipping: 'Shipping Risk',
  scalability: 'Scalability',
  brand: 'Brand Potential',
  risk: 'Risk Factors',
};

export interface Scorecard {
  key: Criterion;
  label: string;
  score: number;
  display: string;
  insight: string;
}

export interface DashboardView {
  banner: {
    verdict: Verdict;
    band: VerdictBand;
    color: string;
    headline: string;
  };
  scorecards: Scorecard[];
  actionPlan: string[];
  unitEconomics: {
    grossProfit: number;
    grossMarginPct: number | null;
  };
}

export function verdictBand(verdict: Verdict): VerdictBand {
  return VERDICT_BANDS[verdict];
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * View model for the results page: banner, the 9 scorecards in fixed order, and the action plan.
 */
export function buildDashboard(product: ProductInput, result: AnalysisResult): DashboardView {
  const band = verdictBand(result.verdict);
  const grossProfit = round(product.price - product.cost, 2);

  return {
    banner: {
      verdict: result.verdict,
      band,
      color: BAND_COLORS[band],
      headline: result.actionPlan[0] ?? '',
    },
    scorecards: CRITERIA.map((key) => ({
      key,
      label: CRITERION_LABELS[key],
      score: result.scores[key].score,
      display: `${result.scores[key].score}/10`,
      insight: result.scores[key].insight,
    })),
    actionPlan: [...result.actionPlan],
    unitEconomics: {
      grossProfit,
      grossMarginPct: product.price > 0 ? round((grossProfit / product.price) * 100, 1) : null,
    },
  };
}
