/**
 * Gemini API Configuration
 *
 * Only the JSON "fast" mode is used here: the cross-encoder asks for one
 * relevance score per (query, document) pair.
 */

import { z } from 'zod';
import { ConfigurationError } from '../search/errors.js';
import { formatZodError } from '../../utils/validation.js';

export const GEMINI_MODELS = {
  FLASH_2: 'gemini-2.0-flash',
  FLASH_25: 'gemini-2.5-flash',
  PRO: 'gemini-2.5-pro',
} as const;

export type GeminiModelId = (typeof GEMINI_MODELS)[keyof typeof GEMINI_MODELS];

export const DEFAULT_GEMINI_MODEL: GeminiModelId = GEMINI_MODELS.FLASH_2;

// Configuration schema
export const GeminiConfigSchema = z.object({
  apiKey: z.string().min(1, 'GEMINI_API_KEY is required'),
  model: z.string().min(1).default(DEFAULT_GEMINI_MODEL),

  // Generation defaults
  maxOutputTokens: z.number().int().positive().default(256),
  temperature: z.number().min(0).max(2).default(0.0),

  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      baseDelayMs: z.number().min(0).default(500),
      maxDelayMs: z.number().min(0).default(10000),
    })
    .default({}),

  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().min(1).default(5),
      recoveryTimeMs: z.number().min(0).default(60000),
    })
    .default({}),
});

export type GeminiConfig = z.infer<typeof GeminiConfigSchema>;
export type GeminiConfigInput = z.input<typeof GeminiConfigSchema>;

function envInt(name: string): number | undefined {
  const value = process.env[name];
  return value ? parseInt(value, 10) : undefined;
}

function envFloat(name: string): number | undefined {
  const value = process.env[name];
  return value ? parseFloat(value) : undefined;
}

/**
 * Load configuration from environment variables
 *
 * @throws ConfigurationError when GEMINI_API_KEY is missing or a value is invalid
 */
export function loadGeminiConfig(overrides?: Partial<GeminiConfigInput>): GeminiConfig {
  const envConfig: GeminiConfigInput = {
    apiKey: process.env.GEMINI_API_KEY || '',
    model: process.env.GEMINI_MODEL || DEFAULT_GEMINI_MODEL,
    maxOutputTokens: envInt('GEMINI_MAX_OUTPUT_TOKENS'),
    temperature: envFloat('GEMINI_TEMPERATURE'),
  };

  const result = GeminiConfigSchema.safeParse({ ...envConfig, ...overrides });
  if (!result.success) {
    throw new ConfigurationError(`Invalid Gemini config: ${formatZodError(result.error)}`);
  }
  return result.data;
}

/**
 * Generation config preset: temperature 0.0, JSON output
 */
export const FAST_PRESET = {
  temperature: 0.0,
  responseMimeType: 'application/json' as const,
} as const;
