/**
 * OpenAI chat completions provider
 */
import { BaseAIProvider } from './base';
import type {
  AIProviderConfig,
  AIProviderResponse,
  GenerationRequest,
  Message,
} from '../types/index';

/**
 * OpenAI chat completions response format
 */
interface OpenAIResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

export type HostedProviderOptions = AIProviderConfig;

/**
 * OpenAI provider - system prompt travels as its own message
 */
export class OpenAIProvider extends BaseAIProvider {
  readonly name = 'OpenAI';

  constructor(options: HostedProviderOptions) {
    super(options);
  }

  async generate(request: GenerationRequest): Promise<AIProviderResponse> {
    const messages: Message[] = [
      { role: 'system', content: request.systemPrompt },
      { role: 'user', content: request.userMessage },
    ];

    const data = await this.makeRequest<OpenAIResponse>('/chat/completions', {
      model: this.config.model,
      messages,
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
    });

    return this.parseResponse(data);
  }

  protected parseResponse(data: OpenAIResponse): AIProviderResponse {
    return this.toResponse(
      data.choices?.[0]?.message?.content ?? undefined,
      data.usage
        ? {
            promptTokens: data.usage.prompt_tokens,
            completionTokens: data.usage.completion_tokens,
            totalTokens: data.usage.total_tokens,
          }
        : undefined
    );
  }
}
