import { Criterion } from '../types/analysis.js';

export const SAMPLE_SCORES: Record<Criterion, { score: number; insight: string }> = {
  margin: { score: 8, insight: 'Roughly 70% gross before ad spend' },
  platform_fit: { score: 7, insight: 'Strong visual hook for a storefront funnel' },
  trend: { score: 6, insight: 'Steady interest, not spiking' },
  competition: { score: 5, insight: 'Several established sellers' },
  content: { score: 8, insight: 'Passes 3 of 4 viral questions' },
  shipping: { score: 7, insight: 'Light and hard to break' },
  scalability: { score: 6, insight: 'Paid social can carry it past early sales' },
  brand: { score: 7, insight: 'Room for a wellness sub-brand' },
  risk: { score: 6, insight: 'Health claims need careful wording' },
};

export const SAMPLE_ACTION_PLAN = [
  'Order three supplier samples and compare build quality',
  'Shoot a 10-second before/after hook',
  'Launch a small test campaign on one ad set',
];

export function buildPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    verdict: 'GO',
    action_plan: SAMPLE_ACTION_PLAN,
    scores: SAMPLE_SCORES,
    ...overrides,
  };
}

// Shaped the way the format instructions ask models to reply
export function fenced(payload: unknown): string {
  return 'Here is the analysis:\n\n```json\n' + JSON.stringify(payload, null, 2) + '\n```\n';
}
