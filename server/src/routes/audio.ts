/**
 * Audio route handler - serves synthesized MP3 files by id
 */
import { Router, Request, Response } from 'express';
import type { ApiError } from '../types/index';
import { AudioCacheService } from '../services/audio-cache';
import { LoggerService } from '../services/logger';
import { fileExists } from '../utils/files';

export function createAudioRouter(audioCache: AudioCacheService, logger: LoggerService): Router {
  const router = Router();

  router.get(
    '/:id',
    // eslint-disable-next-line @typescript-eslint/no-misused-promises
    async (req: Request<{ id: string }>, res: Response<ApiError>): Promise<void> => {
      const handle = audioCache.get(req.params.id);

      if (!handle || !(await fileExists(handle.filePath))) {
        logger.debug(`Audio not found: ${req.params.id}`);
        res.status(404).json({ error: 'Audio not found' });
        return;
      }

      res.type('audio/mpeg');
      res.sendFile(handle.filePath, (error?: Error) => {
        if (error && !res.headersSent) {
          logger.error(`Error serving audio ${handle.id}`, error);
          res.status(500).json({ error: error.message });
        }
      });
    }
  );

  return router;
}
