/**
 * Anthropic Messages API provider
 */
import { BaseAIProvider } from './base';
import type { HostedProviderOptions } from './openai';
import type { AIProviderResponse, GenerationRequest } from '../types/index';

const ANTHROPIC_VERSION = '2023-06-01';

interface AnthropicResponse {
  content?: Array<{
    type?: string;
    text?: string;
  }>;
  usage?: {
    input_tokens: number;
    output_tokens: number;
  };
}

/**
 * Anthropic provider - system prompt is a top-level field, not a message
 */
export class AnthropicProvider extends BaseAIProvider {
  readonly name = 'Anthropic';

  constructor(options: HostedProviderOptions) {
    super(options);
  }

  protected buildHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'x-api-key': this.config.apiKey,
      'anthropic-version': ANTHROPIC_VERSION,
    };
  }

  async generate(request: GenerationRequest): Promise<AIProviderResponse> {
    const data = await this.makeRequest<AnthropicResponse>('/messages', {
      model: this.config.model,
      system: request.systemPrompt,
      messages: [{ role: 'user', content: request.userMessage }],
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
    });

    return this.parseResponse(data);
  }

  protected parseResponse(data: AnthropicResponse): AIProviderResponse {
    const textBlock = data.content?.find((block) => block.type === undefined || block.type === 'text');
    return this.toResponse(
      textBlock?.text,
      data.usage
        ? {
            promptTokens: data.usage.input_tokens,
            completionTokens: data.usage.output_tokens,
            totalTokens: data.usage.input_tokens + data.usage.output_tokens,
          }
        : undefined
    );
  }
}
