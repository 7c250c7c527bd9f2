/**
 * Base class for AI providers - provides common functionality for HTTP requests with timeout
 */
import type {
  AIProvider,
  AIProviderConfig,
  AIProviderResponse,
  GenerationRequest,
} from '../types/index';
import { fetchWithTimeout, readJson } from '../utils/fetch';

/**
 * Raised when a provider answers but the body has no usable text
 */
export class ProviderParseError extends Error {
  constructor(providerName: string) {
    super(`Unable to parse ${providerName} response`);
    this.name = 'ProviderParseError';
  }
}

/**
 * Abstract base class for hosted AI provider implementations
 * Handles HTTP requests, timeouts, and common provider logic
 */
export abstract class BaseAIProvider implements AIProvider {
  abstract readonly name: string;
  protected readonly config: AIProviderConfig;

  constructor(config: AIProviderConfig) {
    this.config = config;
  }

  /**
   * Checks if provider is properly configured (has API key)
   */
  get isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  /**
   * Hosted vendors have no cheap probe; a credential is the best signal
   */
  async health(): Promise<boolean> {
    return this.isConfigured;
  }

  /**
   * Request headers; vendors that do not use bearer auth override this
   */
  protected buildHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.config.apiKey}`,
    };
  }

  /**
   * Makes authenticated POST request to AI provider API
   * Handles errors and JSON parsing
   */
  protected async makeRequest<T>(endpoint: string, body: unknown): Promise<T> {
    const url = `${this.config.baseUrl}${endpoint}`;
    return fetchWithTimeout(
      url,
      {
        method: 'POST',
        headers: this.buildHeaders(),
        body: JSON.stringify(body),
      },
      this.config.timeout,
      (response) => readJson<T>(response)
    );
  }

  /**
   * Wraps trimmed text in the standard response
   * A missing text field is a parse failure; blank text is an empty reply.
   */
  protected toResponse(
    content: string | undefined,
    usage?: AIProviderResponse['usage']
  ): AIProviderResponse {
    if (typeof content !== 'string') {
      throw new ProviderParseError(this.name);
    }
    return { content: content.trim(), usage };
  }

  /**
   * Sends one turn to the provider and returns its reply
   */
  abstract generate(request: GenerationRequest): Promise<AIProviderResponse>;
}
