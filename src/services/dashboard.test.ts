import { describe, it, expect } from 'vitest';
import { SAMPLE_ACTION_PLAN, SAMPLE_SCORES } from '../__fixtures__/analysis.js';
import { AnalysisResult, ProductInput } from '../types/analysis.js';
import { buildDashboard, verdictBand } from './dashboard.js';

const belt: ProductInput = {
  name: 'Red Light Therapy Belt',
  price: 129,
  cost: 28,
  businessModel: 'PrivateLabel',
  platform: 'Shopify',
};

const result: AnalysisResult = {
  verdict: 'FIX',
  actionPlan: SAMPLE_ACTION_PLAN,
  scores: SAMPLE_SCORES,
};

describe('verdictBand', () => {
  it('maps verdicts to colour bands', () => {
    expect(verdictBand('GREENLIGHT')).toBe('success');
    expect(verdictBand('GO')).toBe('success');
    expect(verdictBand('FIX')).toBe('warning');
    expect(verdictBand('KILL')).toBe('danger');
  });
});

describe('buildDashboard', () => {
  it('builds the banner from the verdict and first action', () => {
    expect(buildDashboard(belt, result).banner).toEqual({
      verdict: 'FIX',
      band: 'warning',
      color: '#ffc107',
      headline: 'Order three supplier samples and compare build quality',
    });
  });

  it('lists the 9 scorecards in display order', () => {
    const { scorecards } = buildDashboard(belt, result);

    expect(scorecards.map((card) => card.label)).toEqual([
      'Profit Margin',
      'Platform Fit',
      'Trend Velocity',
      'Competition',
      'Content Difficulty',
      'Shipping Risk',
      'Scalability',
      'Brand Potential',
      'Risk Factors',
    ]);
    expect(scorecards[0]).toEqual({
      key: 'margin',
      label: 'Profit Margin',
      score: 8,
      display: '8/10',
      insight: 'Roughly 70% gross before ad spend',
    });
  });

  it('uses an empty headline when there is no action plan', () => {
    const dashboard = buildDashboard(belt, { ...result, verdict: 'KILL', actionPlan: [] });
    expect(dashboard.banner).toMatchObject({ band: 'danger', color: '#dc3545', headline: '' });
    expect(dashboard.actionPlan).toEqual([]);
  });

  it('computes unit economics', () => {
    expect(buildDashboard(belt, result).unitEconomics).toEqual({ grossProfit: 101, grossMarginPct: 78.3 });
  });

  it('leaves the margin empty for a zero price', () => {
    expect(buildDashboard({ ...belt, price: 0, cost: 5 }, result).unitEconomics).toEqual({
      grossProfit: -5,
      grossMarginPct: null,
    });
  });
});
