/**
 * API request/response type definitions
 */

/**
 * Request body for POST /api/chat
 */
export interface ChatRequest {
  message?: unknown;
}

export interface ChatReply {
  message: string;
  audio_url: string | null;
  success: true;
}

export interface GoodbyeReply {
  message: string;
  is_goodbye: true;
  success: true;
}

export interface ApiError {
  error: string;
  success?: false;
}

/**
 * Response body for GET /api/welcome
 */
export type WelcomeReply = ChatReply;

export interface HealthReply {
  status: 'ok';
  llm_backend: string;
  tts_enabled: boolean;
  stt_enabled: boolean;
  audio_cache_size: number;
  env_check: Record<string, 'set' | 'missing'>;
}
