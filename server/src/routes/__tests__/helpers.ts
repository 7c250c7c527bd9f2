import path from 'path';
import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { AppContext } from '../../app';
import { buildConfig } from '../../config/index';
import { AudioCacheService } from '../../services/audio-cache';
import { LoggerService } from '../../services/logger';
import type { AudioHandle, GenerationRequest, Persona } from '../../types';

export const testPersona: Persona = Object.freeze({
  name: 'Test Shell',
  backstory: '',
  systemPrompt: 'Answer as a shell.',
  welcomeMessage: 'Welcome, swimmer.',
  goodbyeMessage: 'Farewell.\n\nSwim safely.',
});

export interface FakeContext {
  context: AppContext;
  generate: Mock<(request: GenerationRequest) => Promise<string>>;
  synthesize: Mock<(text: string) => Promise<AudioHandle | null>>;
}

/**
 * Context with scripted generation and synthesis, nothing touching the network
 */
export function createFakeContext(options: { ttsEnabled?: boolean; env?: Record<string, string> } = {}): FakeContext {
  const generate = vi.fn<(request: GenerationRequest) => Promise<string>>(async () => 'A reply.');
  const synthesize = vi.fn<(text: string) => Promise<AudioHandle | null>>(async () => null);

  const context: AppContext = {
    config: buildConfig({ PUBLIC_DIR: path.join(process.cwd(), 'public'), ...options.env }),
    logger: new LoggerService({ level: 'ERROR' }),
    persona: testPersona,
    generation: { backendKind: 'demo', generate },
    synthesis: {
      enabled: options.ttsEnabled ?? false,
      synthesize,
      play: async () => undefined,
    },
    audioCache: new AudioCacheService(),
  };

  return { context, generate, synthesize };
}
