/**
 * Welcome route handler - greets new visitors, with the greeting spoken once per process
 */
import { Router, Request, Response } from 'express';
import type { ApiError, WelcomeReply } from '../types/index';
import type { AppContext } from '../app';
import { synthesizeToUrl } from './chat';

const WELCOME_AUDIO_KEY = 'welcome';

export function createWelcomeRouter(context: AppContext): Router {
  const router = Router();
  const { logger, persona, audioCache } = context;

  router.get(
    '/',
    // eslint-disable-next-line @typescript-eslint/no-misused-promises
    async (_req: Request, res: Response<WelcomeReply | ApiError>): Promise<void> => {
      try {
        const audioUrl = await audioCache.memoize(WELCOME_AUDIO_KEY, () =>
          synthesizeToUrl(context, persona.welcomeMessage)
        );
        res.json({ message: persona.welcomeMessage, audio_url: audioUrl, success: true });
      } catch (error) {
        logger.error('Error occurred during welcome request', error);
        const message = error instanceof Error ? error.message : String(error);
        res.status(500).json({ error: message, success: false });
      }
    }
  );

  return router;
}
