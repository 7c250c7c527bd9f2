import express from 'express';
import request from 'supertest';
import { describe, it, expect } from 'vitest';
import { createWelcomeRouter } from '../welcome';
import { createFakeContext } from './helpers';

function buildApp(fake: ReturnType<typeof createFakeContext>): express.Application {
  const app = express();
  app.use('/api/welcome', createWelcomeRouter(fake.context));
  return app;
}

describe('Welcome Router', () => {
  describe('GET /api/welcome', () => {
    it('should return the welcome text without audio when TTS is off', async () => {
      const fake = createFakeContext();

      const response = await request(buildApp(fake)).get('/api/welcome');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ message: 'Welcome, swimmer.', audio_url: null, success: true });
      expect(fake.synthesize).not.toHaveBeenCalled();
    });

    it('should synthesize the greeting once and reuse its url', async () => {
      const fake = createFakeContext({ ttsEnabled: true });
      fake.synthesize.mockResolvedValue({ id: 'welcome-1', filePath: '/tmp/welcome-1.mp3', createdAt: 0 });
      const app = buildApp(fake);

      const [first, second] = await Promise.all([
        request(app).get('/api/welcome'),
        request(app).get('/api/welcome'),
      ]);
      const third = await request(app).get('/api/welcome');

      expect(first.body.audio_url).toBe('/api/audio/welcome-1');
      expect(second.body.audio_url).toBe('/api/audio/welcome-1');
      expect(third.body.audio_url).toBe('/api/audio/welcome-1');
      expect(fake.synthesize).toHaveBeenCalledTimes(1);
      expect(fake.synthesize).toHaveBeenCalledWith('Welcome, swimmer.');
    });

    it('should try again after a failed synthesis', async () => {
      const fake = createFakeContext({ ttsEnabled: true });
      fake.synthesize
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce({ id: 'welcome-2', filePath: '/tmp/welcome-2.mp3', createdAt: 0 });
      const app = buildApp(fake);

      const first = await request(app).get('/api/welcome');
      const second = await request(app).get('/api/welcome');

      expect(first.body.audio_url).toBeNull();
      expect(second.body.audio_url).toBe('/api/audio/welcome-2');
      expect(fake.synthesize).toHaveBeenCalledTimes(2);
    });

    it('should return 500 when synthesis throws', async () => {
      const fake = createFakeContext({ ttsEnabled: true });
      fake.synthesize.mockRejectedValueOnce(new Error('disk full'));

      const response = await request(buildApp(fake)).get('/api/welcome');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ error: 'disk full', success: false });
    });
  });
});
