import { z } from 'zod';
import { AnalysisResult, CRITERIA, Criterion, CriterionScore, VERDICTS } from '../../types/analysis.js';
import { SchemaValidationError } from '../../utils/errors.js';

interface ResponseField {
  name: string;
  type: string;
  description: string;
  children?: ResponseField[];
}

const CRITERION_DESCRIPTIONS: Record<Criterion, string> = {
  margin: 'Net profit margin after platform and fulfilment fees',
  platform_fit: 'Native fit for the platform and native/image ad potential',
  trend: 'Trend velocity: rising, flat or falling',
  competition: 'Market saturation',
  content: 'Content difficulty judged by the 4 viral questions',
  shipping: 'Breakage, returns and weight',
  scalability: 'Ability to reach $100k/month',
  brand: 'Potential to build a defensible brand',
  risk: 'IP, liability and seasonality exposure',
};

export const RESPONSE_FIELDS: ResponseField[] = [
  { name: 'verdict', type: 'string', description: `One of ${VERDICTS.join(', ')}` },
  { name: 'action_plan', type: 'string[]', description: '3 short steps on what to do next' },
  {
    name: 'scores',
    type: 'object',
    description: `All ${CRITERIA.length} criteria are required`,
    children: CRITERIA.map((criterion) => ({
      name: criterion,
      type: '{ "score": integer, "insight": string }',
      description: CRITERION_DESCRIPTIONS[criterion],
    })),
  },
];

function renderFields(fields: ResponseField[], depth: number): string[] {
  const indent = '\t'.repeat(depth);
  return fields.flatMap((field) => {
    if (field.children) {
      return [
        `${indent}"${field.name}": {  // ${field.description}`,
        ...renderFields(field.children, depth + 1),
        `${indent}}`,
      ];
    }
    return [`${indent}"${field.name}": ${field.type}  // ${field.description}`];
  });
}

/**
 * Text embedded in the prompt telling the model how to shape its reply.
 * Derived from RESPONSE_FIELDS so it never drifts from what `parseAnalysis` accepts.
 */
export function getFormatInstructions(fields: ResponseField[] = RESPONSE_FIELDS): string {
  return [
    'The output should be a markdown code snippet formatted in the following schema, including the leading and trailing "```json" and "```":',
    '',
    '```json',
    '{',
    ...renderFields(fields, 1),
    '}',
    '```',
    '',
    'Every "score" is an integer from 0 to 10. Return only the JSON snippet.',
  ].join('\n');
}

const CriterionScoreSchema = z.object({
  score: z.number().int().min(0).max(10),
  insight: z.string(),
});

const ScoresSchema = z
  .object({
    margin: CriterionScoreSchema,
    platform_fit: CriterionScoreSchema,
    trend: CriterionScoreSchema,
    competition: CriterionScoreSchema,
    content: CriterionScoreSchema,
    shipping: CriterionScoreSchema,
    scalability: CriterionScoreSchema,
    brand: CriterionScoreSchema,
    risk: CriterionScoreSchema,
  })
  .strict();

const AnalysisResponseSchema = z.object({
  verdict: z.enum(VERDICTS),
  action_plan: z.array(z.string()),
  scores: ScoresSchema,
});

const JSON_FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Body of the first fenced block, or the whole text when there is none.
 */
export function extractJsonBlock(rawText: string): string {
  const match = rawText.match(JSON_FENCE);
  return (match ? match[1] : rawText).trim();
}

/**
 * Decode and validate a model reply. No repair is attempted: anything short of
 * a complete analysis is a SchemaValidationError.
 */
export function parseAnalysis(rawText: string): AnalysisResult {
  const body = extractJsonBlock(rawText);
  if (!body) {
    throw new SchemaValidationError('Model response was empty');
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch (error) {
    throw new SchemaValidationError('Model response is not valid JSON', { cause: error });
  }

  const result = AnalysisResponseSchema.safeParse(decoded);
  if (!result.success) {
    throw new SchemaValidationError('Model response does not match the analysis schema', {
      details: {
        issues: result.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
    });
  }

  const { verdict, action_plan, scores } = result.data;
  const frozenScores: Record<Criterion, CriterionScore> = { ...scores };
  for (const criterion of CRITERIA) {
    frozenScores[criterion] = Object.freeze({ ...scores[criterion] });
  }
  return Object.freeze({
    verdict,
    actionPlan: Object.freeze([...action_plan]),
    scores: Object.freeze(frozenScores),
  });
}
