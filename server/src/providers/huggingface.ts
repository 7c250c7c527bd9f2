/**
 * Hugging Face Inference API provider
 */
import { BaseAIProvider } from './base';
import type { HostedProviderOptions } from './openai';
import type { AIProviderResponse, GenerationRequest } from '../types/index';

interface GeneratedText {
  generated_text?: string;
}

type HuggingFaceResponse = GeneratedText | GeneratedText[];

/**
 * Builds a Mistral-instruct style prompt
 */
export function buildInstructPrompt(request: GenerationRequest): string {
  return `<s>[INST] ${request.systemPrompt}\n\n${request.userMessage} [/INST]`;
}

/**
 * Hugging Face provider - text-generation models behind the serverless Inference API
 */
export class HuggingFaceProvider extends BaseAIProvider {
  readonly name = 'HuggingFace';

  constructor(options: HostedProviderOptions) {
    super(options);
  }

  async generate(request: GenerationRequest): Promise<AIProviderResponse> {
    const data = await this.makeRequest<HuggingFaceResponse>(`/models/${this.config.model}`, {
      inputs: buildInstructPrompt(request),
      parameters: {
        max_new_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        top_p: this.config.topP,
        return_full_text: false,
      },
    });

    return this.parseResponse(data);
  }

  /**
   * The API answers with either a list of generations or a single object
   */
  protected parseResponse(data: HuggingFaceResponse): AIProviderResponse {
    const first = Array.isArray(data) ? data[0] : data;
    return this.toResponse(first?.generated_text);
  }
}
