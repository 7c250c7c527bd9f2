/**
 * Health route handler - reports effective backends and which credentials are present
 */
import { Router, Request, Response } from 'express';
import type { HealthReply } from '../types/index';
import type { AppContext } from '../app';
import type { AppConfig } from '../config/index';

/**
 * Presence of each credential, never its value
 */
export function checkCredentials(config: AppConfig): HealthReply['env_check'] {
  const presence = (value: string): 'set' | 'missing' => (value ? 'set' : 'missing');

  return {
    OPENAI_API_KEY: presence(config.llm.openai.apiKey),
    ANTHROPIC_API_KEY: presence(config.llm.anthropic.apiKey),
    HUGGINGFACE_API_KEY: presence(config.llm.huggingface.apiKey),
    MURF_API_KEY: presence(config.tts.apiKey),
    GOOGLE_SPEECH_API_KEY: presence(config.stt.googleApiKey),
  };
}

export function createHealthRouter(context: AppContext): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response<HealthReply>): void => {
    res.json({
      status: 'ok',
      llm_backend: context.generation.backendKind,
      tts_enabled: context.synthesis.enabled,
      stt_enabled: context.recognition?.enabled ?? false,
      audio_cache_size: context.audioCache.size,
      env_check: checkCredentials(context.config),
    });
  });

  return router;
}
