/**
 * AI provider factory - creates provider instances based on configuration
 */
import type { AIProvider, BackendKind, DemoResponseTable } from '../types/index';
import type { AppConfig, VendorConfig } from '../config/index';
import { LoggerService } from '../services/logger';
import { OllamaProvider } from './ollama';
import { OpenAIProvider, type HostedProviderOptions } from './openai';
import { AnthropicProvider } from './anthropic';
import { HuggingFaceProvider } from './huggingface';
import { DemoProvider, type DemoOptions } from './demo';

type LLMConfig = AppConfig['llm'];

/**
 * Backends that talk to a model server
 */
export type RemoteBackendKind = Exclude<BackendKind, 'demo'>;

function hostedOptions(llm: LLMConfig, vendor: VendorConfig): HostedProviderOptions {
  return {
    apiKey: vendor.apiKey,
    model: vendor.model,
    baseUrl: vendor.baseUrl,
    maxTokens: llm.maxTokens,
    temperature: llm.temperature,
    topP: llm.topP,
    timeout: llm.timeout,
  };
}

/**
 * Creates a model-backed provider of the specified type
 * @param type - Backend to build
 * @param llm - LLM section of the application config
 * @param logger - Logger service instance
 */
export function createProvider(
  type: RemoteBackendKind,
  llm: LLMConfig,
  logger: LoggerService
): AIProvider {
  switch (type) {
    case 'ollama':
      return new OllamaProvider(
        {
          baseUrl: llm.ollama.baseUrl,
          model: llm.ollama.model,
          maxTokens: llm.maxTokens,
          temperature: llm.temperature,
          timeout: llm.ollama.timeout,
        },
        logger
      );
    case 'openai':
      return new OpenAIProvider(hostedOptions(llm, llm.openai));
    case 'anthropic':
      return new AnthropicProvider(hostedOptions(llm, llm.anthropic));
    case 'huggingface':
      return new HuggingFaceProvider(hostedOptions(llm, llm.huggingface));
  }
}

/**
 * Model name reported for a backend, for banners and health output
 */
export function modelNameFor(type: BackendKind, llm: LLMConfig): string {
  switch (type) {
    case 'demo':
      return 'canned responses';
    case 'ollama':
      return llm.ollama.model;
    default:
      return llm[type].model;
  }
}

/**
 * Creates the demo provider from its response table
 */
export function createDemoProvider(table: DemoResponseTable, options: DemoOptions): DemoProvider {
  return new DemoProvider(table, options);
}

export { OllamaProvider } from './ollama';
export { OpenAIProvider } from './openai';
export { AnthropicProvider } from './anthropic';
export { HuggingFaceProvider } from './huggingface';
export { DemoProvider } from './demo';
