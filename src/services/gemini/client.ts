/**
 * Gemini API Client
 *
 * fast(): temperature 0.0, JSON output. Every request runs inside the circuit
 * breaker and is retried with exponential backoff.
 */

import {
  GoogleGenerativeAI,
  type GenerationConfig,
  type GenerativeModel,
  type ResponseSchema,
} from '@google/generative-ai';

import { loadGeminiConfig, FAST_PRESET, type GeminiConfig, type GeminiConfigInput } from './config.js';
import { CircuitBreaker, CircuitBreakerOpenError, type CircuitBreakerStatus } from './circuit-breaker.js';

// Re-export error type
export { CircuitBreakerOpenError };

/**
 * Token usage from a Gemini response
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Response from Gemini API
 */
export interface GeminiResponse {
  text: string;
  usage: TokenUsage;
  model: string;
  processingTimeMs: number;
}

/**
 * Gemini Client with retry and circuit breaker
 */
export class GeminiClient {
  private readonly model: GenerativeModel;
  private readonly config: GeminiConfig;
  private readonly circuitBreaker: CircuitBreaker;

  /**
   * @throws ConfigurationError when GEMINI_API_KEY is missing or the config is invalid
   */
  constructor(configOverrides?: Partial<GeminiConfigInput>) {
    this.config = loadGeminiConfig(configOverrides);

    const client = new GoogleGenerativeAI(this.config.apiKey);
    this.model = client.getGenerativeModel({ model: this.config.model });

    this.circuitBreaker = new CircuitBreaker({
      failureThreshold: this.config.circuitBreaker.failureThreshold,
      recoveryTimeMs: this.config.circuitBreaker.recoveryTimeMs,
    });
  }

  get modelName(): string {
    return this.config.model;
  }

  /**
   * Fast mode: temperature 0.0, JSON output
   */
  async fast(prompt: string, schema?: ResponseSchema): Promise<GeminiResponse> {
    const generationConfig: GenerationConfig = {
      ...FAST_PRESET,
      maxOutputTokens: this.config.maxOutputTokens,
      temperature: this.config.temperature,
    };
    if (schema) {
      generationConfig.responseSchema = schema;
    }

    const startTime = Date.now();
    const response = await this.circuitBreaker.execute(() => this.executeWithRetry(prompt, generationConfig));
    return { ...response, processingTimeMs: Date.now() - startTime };
  }

  getCircuitBreakerStatus(): CircuitBreakerStatus {
    return this.circuitBreaker.getStatus();
  }

  /**
   * Execute request with exponential backoff retry
   */
  private async executeWithRetry(
    prompt: string,
    generationConfig: GenerationConfig
  ): Promise<Omit<GeminiResponse, 'processingTimeMs'>> {
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.config.retry;

    let lastError: Error | null = null;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        const result = await this.model.generateContent({
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig,
        });

        const usageMetadata = result.response.usageMetadata;
        return {
          text: result.response.text(),
          usage: {
            inputTokens: usageMetadata?.promptTokenCount ?? 0,
            outputTokens: usageMetadata?.candidatesTokenCount ?? 0,
            totalTokens: usageMetadata?.totalTokenCount ?? 0,
          },
          model: this.config.model,
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        const errorMessage = lastError.message;

        console.error(`[GeminiClient] Attempt ${attempt + 1}/${maxAttempts} failed: ${errorMessage}`);

        // Rate limited: back off one step further than usual
        if (errorMessage.includes('429') || errorMessage.toLowerCase().includes('rate limit')) {
          const delay = Math.min(baseDelayMs * Math.pow(2, attempt + 1), maxDelayMs);
          console.error(`[GeminiClient] Rate limited, waiting ${delay}ms`);
          await this.sleep(delay);
          continue;
        }

        if (attempt < maxAttempts - 1) {
          const delay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
          console.error(`[GeminiClient] Retrying in ${delay}ms`);
          await this.sleep(delay);
        }
      }
    }

    throw lastError ?? new Error('All retry attempts failed');
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
