/**
 * Express application factory - builds the shared context and mounts routes
 */
import express, { Application, NextFunction, Request, Response } from 'express';
import type { ApiError, Persona, SpeechRecognizer, SpeechSynthesizer } from './types/index';
import type { AppConfig } from './config/index';
import {
  createAudioRouter,
  createChatRouter,
  createHealthRouter,
  createWelcomeRouter,
} from './routes/index';
import {
  AudioCacheService,
  GenerationService,
  LoggerService,
  PersonaService,
  SpeechRecognitionService,
  SpeechSynthesisService,
  type ReplyGenerator,
} from './services/index';
import { createDemoProvider } from './providers/index';

/**
 * Everything a front end needs for one process
 */
export interface AppContext {
  config: AppConfig;
  logger: LoggerService;
  persona: Persona;
  generation: ReplyGenerator;
  synthesis: SpeechSynthesizer;
  recognition?: SpeechRecognizer;
  audioCache: AudioCacheService;
}

export interface ContextOptions {
  logger?: LoggerService;
  /**
   * Build the speech recognizer (the console needs it, the web server does not)
   */
  withRecognition?: boolean;
}

/**
 * Loads the persona, picks the generation backend and wires the speech services
 * Rejects when the persona or demo table cannot be loaded
 */
export async function createAppContext(
  config: AppConfig,
  options: ContextOptions = {}
): Promise<AppContext> {
  const logger =
    options.logger ??
    new LoggerService({ level: config.logging.logLevel, timezone: config.logging.timezone });

  const personas = new PersonaService(config.persona.personasDir);
  const persona = await personas.loadPersona(config.persona.personaFile);
  const demoTable = await personas.loadDemoResponses(config.persona.demoResponsesFile);
  logger.info(`Active persona: ${persona.name}`);

  const demo = createDemoProvider(demoTable, config.llm.demo);
  const generation = new GenerationService(config.llm, logger, { demo });
  await generation.verify();

  const synthesis = new SpeechSynthesisService(config.tts, logger);
  const recognition = options.withRecognition
    ? new SpeechRecognitionService(config.stt, logger)
    : undefined;

  return {
    config,
    logger,
    persona,
    generation,
    synthesis,
    recognition,
    audioCache: new AudioCacheService(),
  };
}

/**
 * Status carried by body-parser errors (400 for malformed JSON, 413 for oversized bodies)
 */
function statusOf(error: unknown): number {
  if (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number'
  ) {
    return error.status;
  }
  return 500;
}

/**
 * Allows the API to be called from any origin; preflight requests end here
 */
function allowCrossOrigin(req: Request, res: Response, next: NextFunction): void {
  res.header('Access-Control-Allow-Origin', '*');
  res.header('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
  res.header('Access-Control-Allow-Headers', 'Content-Type');
  if (req.method === 'OPTIONS') {
    res.sendStatus(204);
    return;
  }
  next();
}

/**
 * Creates the Express app for a prepared context
 */
export function createApp(context: AppContext): { app: Application; context: AppContext } {
  const app = express();

  app.use(allowCrossOrigin);
  app.use(express.json());
  app.use(express.static(context.config.server.publicDir));

  app.use('/api/welcome', createWelcomeRouter(context));
  app.use('/api/chat', createChatRouter(context));
  app.use('/api/audio', createAudioRouter(context.audioCache, context.logger));
  app.use('/api/health', createHealthRouter(context));

  app.use(
    (error: unknown, _req: Request, res: Response<ApiError>, next: NextFunction): void => {
      if (res.headersSent) {
        next(error);
        return;
      }
      const status = statusOf(error);
      context.logger.warn(`Request failed with status ${status}`, error);
      const message = error instanceof Error ? error.message : 'Internal server error';
      res.status(status).json({ error: message, success: false });
    }
  );

  return { app, context };
}
