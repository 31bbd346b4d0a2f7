import { BUSINESS_MODELS, PLATFORMS, ProductInput } from '../../types/analysis.js';
import { getFormatInstructions } from './schema.js';

export const ANALYSIS_PROMPT = `You are a product intelligence analyst. Analyze this product for the {model} business model on {platform}.

Product: {product_name}
Price: {price}
Cost: {cost}

Perform a deep 9-point analysis.

1. Profit Margin: Calculate Net Margin after fees (estimate FBA/TikTok fees if applicable).

2. Platform Fit & Native Ad Potential:
   - Is this product native to {platform}? (e.g. visual for TikTok, search-heavy for Amazon).
   - Native/Image Ad Suitability: does this product work for Native Advertising (Taboola/Outbrain) or Image Advertising (Pinterest/Instagram)?
   - Does it have a "weird" or "shocking" visual that stops the scroll in a news feed?

3. Trend Velocity: Is this trending up, down, or flat?
4. Competition: Estimate saturation level.

5. Content Difficulty (THE VIRAL TEST):
   Evaluate the product against these 4 'viral' questions. If the answer to any is 'No', lower the score significantly:
   - Can I show a clear before and after in under 10 seconds?
   - Does the product solve a problem people already know they have?
   - Can I demonstrate 3-5 different use cases without losing clarity?
   - Would someone understand what this does if they saw it used once with zero explanation?

6. Shipping Risk: Breakage/Returns/Weight.
7. Scalability: Can this go to $100k/month?
8. Brand Potential: Can we build a moat?
9. Risk Factors: IP, Liability, Seasonality.

Output a JSON with scores (0-10) for each, a short insight, and a Final Verdict:
- GREENLIGHT (Perfect)
- GO (Good, proceed)
- FIX (Good but needs tweaks)
- KILL (Do not touch)

{format_instructions}`;

/**
 * Single-pass substitution of `{name}` placeholders. Substituted values are not
 * scanned again, so JSON braces in the format instructions survive untouched.
 */
export function renderTemplate(template: string, variables: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
    const value = variables[name];
    if (value === undefined) {
      throw new Error(`No value for prompt placeholder ${placeholder}`);
    }
    return value;
  });
}

export function buildAnalysisPrompt(product: ProductInput): string {
  return renderTemplate(ANALYSIS_PROMPT, {
    model: BUSINESS_MODELS[product.businessModel],
    platform: PLATFORMS[product.platform],
    product_name: product.name,
    price: String(product.price),
    cost: String(product.cost),
    format_instructions: getFormatInstructions(),
  });
}
