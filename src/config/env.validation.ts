import * as Joi from 'joi';
import { LOG_LEVELS } from './log-level';

export const DEFAULT_TOKENS = 'bitcoin,ethereum';
export const DEFAULT_COINGECKO_URL = 'https://api.coingecko.com/api/v3/simple/price';

/** Splits a comma-separated token list into trimmed, lower-cased symbols */
export function parseTokenList(raw: string): string[] {
  return raw
    .split(',')
    .map(token => token.trim().toLowerCase())
    .filter(token => token !== '');
}

function validateTokenList(value: string, helpers: Joi.CustomHelpers): string | Joi.ErrorReport {
  if (value.split(',').some(token => token.trim() === '')) {
    return helpers.error('any.invalid');
  }
  return value;
}

/**
 * Environment variable validation schema
 */
export const envValidationSchema = Joi.object({
  // Node
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  PORT: Joi.number().port().default(8080),

  // Symbol registry
  TOKENS: Joi.string().custom(validateTokenList, 'token list').default(DEFAULT_TOKENS),

  // Upstream feed
  PRECISION: Joi.number().integer().min(0).max(18).default(6),
  COINGECKO_URL: Joi.string().uri().default(DEFAULT_COINGECKO_URL),
  PRICE_FEED_ENABLED: Joi.boolean().default(false),
  PRICE_FEED_INTERVAL_MS: Joi.number().integer().min(1000).default(61000),

  // HTTP
  CORS_ORIGIN: Joi.string().default('*'),
  LOG_LEVEL: Joi.string().valid(...LOG_LEVELS).default('log'),
});
