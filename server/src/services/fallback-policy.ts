/**
 * Fallback policy - what the persona says when a backend call fails
 *
 * Failures never surface as errors to the person chatting. Each backend has its own
 * in-character answer, and Anthropic failures are served from the demo table instead.
 */
import type { BackendKind, CallFailure, FallbackAction } from '../types/index';
import { HttpError, TimeoutError } from '../utils/fetch';
import { ProviderParseError } from '../providers/base';

export const FALLBACK_TEXT = {
  silent: '...the conch remains silent...',
  ollama:
    "*the Conch's shell creaks softly, as if stirred by ancient memories* I fear my knowledge of the surface world grows dimmer with each passing generation. But I shall endeavor to recall what I can, in the hopes of rekindling your curiosity about the world your ancestors once inhabited.",
  openai: "...the connection to the conch's archive wavers...",
  huggingfaceLoading:
    'The conch is awakening... The model is loading. Please try again in a moment.',
  huggingfaceHttp: "...the conch's light flickers...",
  huggingfaceTransport:
    "*the Conch's voice resonates with a pensive tone* The memories of the surface world grow distant, as the currents of Amphitopia flow ever onward. Tell me, young one, what do you know of the lands above the waves? I sense you harbor a curiosity about the world your ancestors once inhabited.",
} as const;

/**
 * Reduces a thrown value to the facts the policy branches on
 */
export function classifyFailure(error: unknown): CallFailure {
  if (error instanceof HttpError) {
    return { reason: 'http', status: error.status };
  }
  if (error instanceof TimeoutError) {
    return { reason: 'timeout' };
  }
  if (error instanceof ProviderParseError) {
    return { reason: 'parse' };
  }
  return { reason: 'transport' };
}

/**
 * Decides the fallback for a failed call
 * @param kind - Backend that failed
 * @param failure - Classified failure
 */
export function resolveFallback(kind: BackendKind, failure: CallFailure): FallbackAction {
  switch (kind) {
    case 'ollama':
      return { type: 'text', text: FALLBACK_TEXT.ollama };
    case 'openai':
      return { type: 'text', text: FALLBACK_TEXT.openai };
    case 'anthropic':
      return { type: 'demo' };
    case 'huggingface':
      if (failure.reason === 'http' && failure.status === 503) {
        return { type: 'text', text: FALLBACK_TEXT.huggingfaceLoading };
      }
      if (failure.reason === 'http' || failure.reason === 'parse') {
        return { type: 'text', text: FALLBACK_TEXT.huggingfaceHttp };
      }
      return { type: 'text', text: FALLBACK_TEXT.huggingfaceTransport };
    case 'demo':
      return { type: 'text', text: FALLBACK_TEXT.silent };
  }
}
