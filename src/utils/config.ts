import dotenv from 'dotenv';

dotenv.config();

function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

export const config = {
  // Server
  port: parseInt(optionalEnv('PORT', '3001'), 10),
  nodeEnv: optionalEnv('NODE_ENV', 'development'),
  logLevel: optionalEnv('LOG_LEVEL', 'info'),
  // Empty means the /api routes are open
  apiKey: optionalEnv('API_KEY', ''),

  // Model identifiers. Credentials are supplied per request, never from the environment.
  models: {
    openai: optionalEnv('OPENAI_MODEL', 'gpt-4o'),
    gemini: optionalEnv('GEMINI_MODEL', 'gemini-1.5-pro'),
    anthropic: optionalEnv('ANTHROPIC_MODEL', 'claude-3-5-sonnet-20240620'),
  },

  // Shopify
  shopify: {
    apiVersion: '2024-01',
    domainSuffix: '.myshopify.com',
  },
};
