/**
 * Ollama provider implementation for local LLM
 */
import type { AIProvider, AIProviderResponse, GenerationRequest } from '../types/index';
import { LoggerService } from '../services/logger';
import { fetchWithTimeout, readJson } from '../utils/fetch';
import { ProviderParseError } from './base';

/**
 * Ollama /api/generate response format
 */
interface OllamaGenerateResponse {
  response?: string;
  prompt_eval_count?: number;
  eval_count?: number;
}

export interface OllamaOptions {
  baseUrl: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeout: number;
  /**
   * Budget for the startup probe against /api/tags
   */
  healthTimeout?: number;
}

/**
 * Builds the single-string completion prompt local models receive
 */
export function buildCompletionPrompt(request: GenerationRequest): string {
  return `${request.systemPrompt}\n\nHuman: ${request.userMessage}\n\nAssistant:`;
}

/**
 * Ollama provider - plain completion against a local Ollama instance
 */
export class OllamaProvider implements AIProvider {
  readonly name = 'Ollama';
  protected readonly options: OllamaOptions;
  protected readonly logger: LoggerService;

  constructor(options: OllamaOptions, logger: LoggerService) {
    this.options = options;
    this.logger = logger;
    this.logger.info(`Ollama provider initialized: model=${options.model}, baseUrl=${options.baseUrl}`);
  }

  /**
   * Ollama doesn't require API key authentication
   */
  get isConfigured(): boolean {
    return true;
  }

  /**
   * Checks that the local server answers on /api/tags
   */
  async health(): Promise<boolean> {
    try {
      return await fetchWithTimeout(
        `${this.options.baseUrl}/api/tags`,
        { method: 'GET' },
        this.options.healthTimeout ?? 5000,
        async (response) => response.ok
      );
    } catch (error) {
      this.logger.debug('Ollama health probe failed', error);
      return false;
    }
  }

  /**
   * Sends the persona prompt and user message as one completion prompt
   */
  async generate(request: GenerationRequest): Promise<AIProviderResponse> {
    this.logger.debug(`Sending request to Ollama (model: ${this.options.model})`);

    const data = await fetchWithTimeout(
      `${this.options.baseUrl}/api/generate`,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.options.model,
          prompt: buildCompletionPrompt(request),
          stream: false,
          options: {
            temperature: this.options.temperature,
            num_predict: this.options.maxTokens,
          },
        }),
      },
      this.options.timeout,
      (response) => readJson<OllamaGenerateResponse>(response)
    );
    const result = this.parseResponse(data);
    this.logger.debug('Response received from Ollama', {
      contentLength: result.content.length,
      usage: result.usage,
    });

    return result;
  }

  /**
   * Parses Ollama response into standard format
   */
  protected parseResponse(data: OllamaGenerateResponse): AIProviderResponse {
    if (typeof data.response !== 'string') {
      throw new ProviderParseError(this.name);
    }
    const content = data.response.trim();

    const promptTokens = data.prompt_eval_count;
    const completionTokens = data.eval_count;
    return {
      content,
      usage:
        promptTokens !== undefined && completionTokens !== undefined
          ? { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens }
          : undefined,
    };
  }
}
