/**
 * Chat route handler - turns a user message into a normalized persona reply
 */
import { Router, Request, Response } from 'express';
import type { ApiError, ChatReply, ChatRequest, GoodbyeReply } from '../types/index';
import type { AppContext } from '../app';
import { isExitCommand } from '../utils/commands';
import { normalizeResponse } from '../utils/response-normalizer';

type ChatResponseBody = ChatReply | GoodbyeReply | ApiError;

/**
 * Synthesizes text and registers it for the audio route
 * @returns Audio URL, or null when TTS is off or failed
 */
export async function synthesizeToUrl(
  context: Pick<AppContext, 'synthesis' | 'audioCache'>,
  text: string
): Promise<string | null> {
  if (!context.synthesis.enabled) {
    return null;
  }
  const handle = await context.synthesis.synthesize(text);
  return handle ? context.audioCache.register(handle) : null;
}

/**
 * Creates Express router for the chat endpoint
 * @returns Configured Express router
 */
export function createChatRouter(context: AppContext): Router {
  const router = Router();
  const { logger, persona, generation } = context;

  router.post(
    '/',
    // eslint-disable-next-line @typescript-eslint/no-misused-promises
    async (
      req: Request<object, ChatResponseBody, ChatRequest | undefined>,
      res: Response<ChatResponseBody>
    ): Promise<void> => {
      try {
        const raw = req.body?.message;
        const userMessage = typeof raw === 'string' ? raw.trim() : '';

        if (!userMessage) {
          logger.warn('Request received with no message content');
          res.status(400).json({ error: 'Empty message', success: false });
          return;
        }

        if (isExitCommand(userMessage)) {
          logger.info('Exit command received, sending goodbye');
          res.json({ message: persona.goodbyeMessage, is_goodbye: true, success: true });
          return;
        }

        logger.info(`Received message: ${userMessage}`);
        const reply = await generation.generate({
          userMessage,
          systemPrompt: persona.systemPrompt,
        });
        const message = normalizeResponse(reply);
        const audioUrl = await synthesizeToUrl(context, message);

        logger.info(`Reply sent (${message.length} chars, audio: ${audioUrl ? 'yes' : 'no'})`);
        res.json({ message, audio_url: audioUrl, success: true });
      } catch (error) {
        logger.error('Error occurred during chat request', error);
        const message = error instanceof Error ? error.message : String(error);
        res.status(500).json({ error: message, success: false });
      }
    }
  );

  return router;
}
