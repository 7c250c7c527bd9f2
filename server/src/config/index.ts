/**
 * Application configuration - loads environment variables and provides type-safe config
 * Supports .env and key.env files (key.env overrides .env)
 */
import path from 'path';
import dotenv from 'dotenv';
import type { BackendKind } from '../types/index';

dotenv.config({ path: path.join(process.cwd(), '.env') });
dotenv.config({ path: path.join(process.cwd(), 'key.env'), override: true });

type Env = Record<string, string | undefined>;

/**
 * Parses string to integer, returns default if invalid
 */
function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parses string to float, returns default if invalid
 */
function parseDecimal(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parses boolean from environment variable
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

const BACKENDS: readonly BackendKind[] = ['demo', 'ollama', 'openai', 'anthropic', 'huggingface'];

function isBackendKind(value: string): value is BackendKind {
  return (BACKENDS as readonly string[]).includes(value);
}

/**
 * Validates backend name; anything unrecognised runs in demo mode
 */
export function parseBackendKind(value: string | undefined): BackendKind {
  const normalized = (value ?? '').trim().toLowerCase();
  return isBackendKind(normalized) ? normalized : 'demo';
}

/**
 * Normalizes STT backend name; unknown names are kept so the service can report them
 */
function parseSttBackend(value: string | undefined): string {
  const normalized = (value ?? 'whisper').trim().toLowerCase();
  return normalized || 'whisper';
}

export interface VendorConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
}

/**
 * Type-safe application configuration structure
 */
export interface AppConfig {
  server: {
    port: number;
    nodeEnv: string;
    publicDir: string;
  };
  llm: {
    backend: BackendKind;
    maxTokens: number;
    temperature: number;
    topP: number;
    timeout: number;
    maxRetries: number;
    ollama: {
      baseUrl: string;
      model: string;
      timeout: number;
    };
    openai: VendorConfig;
    anthropic: VendorConfig;
    huggingface: VendorConfig;
    demo: {
      minDelayMs: number;
      maxDelayMs: number;
    };
  };
  tts: {
    enabled: boolean;
    apiKey: string;
    voiceId: string;
    style: string;
    model: string;
    timeout: number;
    downloadTimeout: number;
  };
  stt: {
    enabled: boolean;
    backend: string;
    whisperModel: string;
    whisperCommand: string;
    recordCommand: string;
    googleApiKey: string;
    durationSeconds: number;
    timeout: number;
  };
  persona: {
    personasDir: string;
    personaFile: string;
    demoResponsesFile: string;
  };
  logging: {
    logLevel: string;
    timezone: string;
  };
}

/**
 * Builds configuration from an environment map
 * @param env - Environment variables (defaults to process.env)
 */
export function buildConfig(env: Env = process.env): AppConfig {
  const optionalEnv = (key: string, defaultValue: string): string => env[key] ?? defaultValue;

  return {
    server: {
      port: parseNumber(env.PORT, 8080),
      nodeEnv: optionalEnv('NODE_ENV', 'development'),
      publicDir: optionalEnv('PUBLIC_DIR', path.join(process.cwd(), 'public')),
    },
    llm: {
      backend: parseBackendKind(env.LLM_BACKEND ?? 'demo'),
      maxTokens: parseNumber(env.LLM_MAX_TOKENS, 150),
      temperature: parseDecimal(env.LLM_TEMPERATURE, 0.8),
      topP: parseDecimal(env.LLM_TOP_P, 0.9),
      timeout: parseNumber(env.LLM_TIMEOUT_MS, 60000),
      maxRetries: Math.max(0, parseNumber(env.LLM_MAX_RETRIES, 0)),
      ollama: {
        baseUrl: optionalEnv('OLLAMA_BASE_URL', 'http://localhost:11434'),
        model: optionalEnv('OLLAMA_MODEL', 'llama2'),
        timeout: parseNumber(env.OLLAMA_TIMEOUT_MS, 30000),
      },
      openai: {
        apiKey: optionalEnv('OPENAI_API_KEY', ''),
        model: optionalEnv('OPENAI_MODEL', 'gpt-3.5-turbo'),
        baseUrl: optionalEnv('OPENAI_BASE_URL', 'https://api.openai.com/v1'),
      },
      anthropic: {
        apiKey: optionalEnv('ANTHROPIC_API_KEY', ''),
        model: optionalEnv('ANTHROPIC_MODEL', 'claude-3-haiku-20240307'),
        baseUrl: optionalEnv('ANTHROPIC_BASE_URL', 'https://api.anthropic.com/v1'),
      },
      huggingface: {
        apiKey: optionalEnv('HUGGINGFACE_API_KEY', ''),
        model: optionalEnv('HUGGINGFACE_MODEL', 'mistralai/Mistral-7B-Instruct-v0.2'),
        baseUrl: optionalEnv('HUGGINGFACE_BASE_URL', 'https://api-inference.huggingface.co'),
      },
      demo: {
        minDelayMs: parseNumber(env.DEMO_MIN_DELAY_MS, 1000),
        maxDelayMs: parseNumber(env.DEMO_MAX_DELAY_MS, 2500),
      },
    },
    tts: {
      enabled: parseBoolean(env.TTS_ENABLED, false),
      apiKey: optionalEnv('MURF_API_KEY', ''),
      voiceId: optionalEnv('MURF_VOICE_ID', 'en-US-ryan'),
      style: optionalEnv('MURF_STYLE', 'Conversational'),
      model: optionalEnv('MURF_MODEL', 'GEN2'),
      timeout: parseNumber(env.TTS_TIMEOUT_MS, 120000),
      downloadTimeout: parseNumber(env.TTS_DOWNLOAD_TIMEOUT_MS, 60000),
    },
    stt: {
      enabled: parseBoolean(env.STT_ENABLED, false),
      backend: parseSttBackend(env.STT_BACKEND),
      whisperModel: optionalEnv('WHISPER_MODEL', 'base'),
      whisperCommand: optionalEnv('WHISPER_COMMAND', 'whisper'),
      recordCommand: optionalEnv('RECORD_COMMAND', 'sox'),
      googleApiKey: optionalEnv('GOOGLE_SPEECH_API_KEY', ''),
      durationSeconds: parseNumber(env.STT_DURATION_SECONDS, 5),
      timeout: parseNumber(env.STT_TIMEOUT_MS, 120000),
    },
    persona: {
      personasDir: optionalEnv('PERSONAS_DIR', path.join(process.cwd(), 'personas')),
      personaFile: optionalEnv('PERSONA_FILE', 'conch.md'),
      demoResponsesFile: optionalEnv('DEMO_RESPONSES_FILE', 'conch-demo.json'),
    },
    logging: {
      logLevel: optionalEnv('LOG_LEVEL', 'INFO'),
      timezone: optionalEnv('LOG_TIMEZONE', 'UTC'),
    },
  };
}

export const config: AppConfig = buildConfig();
