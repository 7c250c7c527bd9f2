/**
 * AI provider type definitions and interfaces
 */
import type { GenerationRequest } from './conversation';

/**
 * Configuration required for AI provider initialization
 */
export interface AIProviderConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  topP: number;
  baseUrl: string;
  timeout: number;
}

/**
 * Standardized response format from AI providers
 */
export interface AIProviderResponse {
  content: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

/**
 * Interface that all AI providers must implement
 */
export interface AIProvider {
  readonly name: string;
  readonly isConfigured: boolean;
  generate(request: GenerationRequest): Promise<AIProviderResponse>;
  /**
   * Startup probe; resolves false when the backend should not be used
   */
  health(): Promise<boolean>;
}

/**
 * Supported generation backends
 */
export type BackendKind = 'demo' | 'ollama' | 'openai' | 'anthropic' | 'huggingface';

/**
 * Why a provider call failed, reduced to what the fallback policy needs
 */
export interface CallFailure {
  reason: 'http' | 'timeout' | 'transport' | 'parse';
  status?: number;
}

/**
 * What to do once a provider call has failed
 */
export type FallbackAction = { type: 'text'; text: string } | { type: 'demo' };
