/**
 * Gemini API Service
 * Exports client and configuration for the Gemini cross-encoder
 */

// Client
export { GeminiClient, type GeminiResponse, type TokenUsage, CircuitBreakerOpenError } from './client.js';

// Configuration
export {
  type GeminiConfig,
  type GeminiConfigInput,
  GeminiConfigSchema,
  loadGeminiConfig,
  GEMINI_MODELS,
  DEFAULT_GEMINI_MODEL,
  FAST_PRESET,
  type GeminiModelId,
} from './config.js';

// Circuit Breaker
export { CircuitBreaker, CircuitState, type CircuitBreakerConfig, type CircuitBreakerStatus } from './circuit-breaker.js';
