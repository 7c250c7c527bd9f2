import path from 'path';
import os from 'os';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { MURF_GENERATE_URL, SpeechSynthesisService, cleanTextForSpeech } from '../speech-synthesis';
import { LoggerService } from '../logger';
import { buildConfig } from '../../config/index';
import { fileExists } from '../../utils/files';
import { TimeoutError } from '../../utils/fetch';

const enabledTts = buildConfig({ TTS_ENABLED: 'true', MURF_API_KEY: 'test-key' }).tts;

describe('cleanTextForSpeech', () => {
  it('should strip markup characters', () => {
    expect(cleanTextForSpeech('A *soft* `shell` of _sand_')).toBe('A soft shell of sand');
  });

  it('should strip leading and trailing ellipses', () => {
    expect(cleanTextForSpeech('...... the shell creaks ...')).toBe('the shell creaks');
  });

  it('should join lines with single spaces', () => {
    expect(cleanTextForSpeech('The archive remains.\n\n  May you swim safely.  ')).toBe(
      'The archive remains. May you swim safely.'
    );
  });
});

describe('SpeechSynthesisService', () => {
  let logger: LoggerService;
  let fetchMock: Mock<typeof fetch>;
  let outputDir: string;

  beforeEach(async () => {
    logger = new LoggerService({ level: 'ERROR' });
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
    outputDir = await mkdtemp(path.join(os.tmpdir(), 'tts-test-'));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    await rm(outputDir, { recursive: true, force: true });
  });

  describe('constructor', () => {
    it('should stay disabled when TTS is off', async () => {
      const service = new SpeechSynthesisService(buildConfig({}).tts, logger);

      expect(service.enabled).toBe(false);
      expect(await service.synthesize('Hello')).toBeNull();
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should warn and disable when the key is missing', () => {
      const warn = vi.spyOn(logger, 'warn');
      const service = new SpeechSynthesisService(buildConfig({ TTS_ENABLED: 'true' }).tts, logger);

      expect(service.enabled).toBe(false);
      expect(warn).toHaveBeenCalledWith(
        'TTS enabled but MURF_API_KEY is not set. Voice output disabled.'
      );
    });
  });

  describe('synthesize', () => {
    it('should request, download and stage the audio', async () => {
      fetchMock
        .mockResolvedValueOnce(
          new Response(JSON.stringify({ audioFile: 'https://cdn.test/voice.mp3' }), { status: 200 })
        )
        .mockResolvedValueOnce(new Response(new Uint8Array([1, 2, 3]), { status: 200 }));
      const service = new SpeechSynthesisService(enabledTts, logger, {
        outputDir,
        createId: () => 'clip-1',
      });

      const handle = await service.synthesize('*The sky* is blue.');

      expect(handle?.id).toBe('clip-1');
      expect(handle?.filePath).toBe(path.join(outputDir, 'clip-1.mp3'));
      expect([...(await readFile(path.join(outputDir, 'clip-1.mp3')))]).toEqual([1, 2, 3]);

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(MURF_GENERATE_URL);
      expect(init?.headers).toEqual({
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'api-key': 'test-key',
      });
      expect(JSON.parse(String(init?.body))).toEqual({
        text: 'The sky is blue.',
        voiceId: 'en-US-ryan',
        style: 'Conversational',
        modelVersion: 'GEN2',
        format: 'MP3',
        sampleRate: 44100,
      });
      expect(fetchMock.mock.calls[1][0]).toBe('https://cdn.test/voice.mp3');
    });

    it('should skip text that cleans down to nothing', async () => {
      const service = new SpeechSynthesisService(enabledTts, logger, { outputDir });

      expect(await service.synthesize('... ** ...')).toBeNull();
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should return null when Murf rejects the request', async () => {
      fetchMock.mockResolvedValueOnce(new Response('bad key', { status: 401 }));
      const warn = vi.spyOn(logger, 'warn');
      const service = new SpeechSynthesisService(enabledTts, logger, { outputDir });

      expect(await service.synthesize('Hello')).toBeNull();
      expect(warn.mock.calls[0][0]).toBe('TTS error, continuing without voice');
    });

    it('should return null when the response has no audio file', async () => {
      fetchMock.mockResolvedValueOnce(new Response('{}', { status: 200 }));
      const service = new SpeechSynthesisService(enabledTts, logger, { outputDir });

      expect(await service.synthesize('Hello')).toBeNull();
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should report timeouts separately', async () => {
      fetchMock.mockRejectedValueOnce(new TimeoutError(120000));
      const warn = vi.spyOn(logger, 'warn');
      const service = new SpeechSynthesisService(enabledTts, logger, { outputDir });

      expect(await service.synthesize('Hello')).toBeNull();
      expect(warn).toHaveBeenCalledWith('TTS generation timed out, continuing without voice');
    });

    it('should give up on a download whose body stalls', async () => {
      const download = new Response('partial', { status: 200 });
      vi.spyOn(download, 'arrayBuffer').mockReturnValue(new Promise<ArrayBuffer>(() => undefined));
      fetchMock
        .mockResolvedValueOnce(
          new Response(JSON.stringify({ audioFile: 'https://cdn.test/voice.mp3' }), { status: 200 })
        )
        .mockResolvedValueOnce(download);
      const warn = vi.spyOn(logger, 'warn');
      const tts = buildConfig({
        TTS_ENABLED: 'true',
        MURF_API_KEY: 'test-key',
        TTS_DOWNLOAD_TIMEOUT_MS: '50',
      }).tts;
      const service = new SpeechSynthesisService(tts, logger, { outputDir });

      expect(await service.synthesize('Hello')).toBeNull();
      expect(warn).toHaveBeenCalledWith('TTS generation timed out, continuing without voice');
    });
  });

  describe('play', () => {
    it('should play the file and then remove it', async () => {
      const filePath = path.join(outputDir, 'clip.mp3');
      await writeFile(filePath, 'mp3');
      const player = vi.fn(async () => undefined);
      const service = new SpeechSynthesisService(enabledTts, logger, { player, outputDir });

      await service.play({ id: 'clip', filePath, createdAt: 0 });

      expect(player).toHaveBeenCalledWith(filePath);
      expect(await fileExists(filePath)).toBe(false);
    });

    it('should still remove the file when playback fails', async () => {
      const filePath = path.join(outputDir, 'clip.mp3');
      await writeFile(filePath, 'mp3');
      const warn = vi.spyOn(logger, 'warn');
      const player = vi.fn(async () => {
        throw new Error('no player');
      });
      const service = new SpeechSynthesisService(enabledTts, logger, { player, outputDir });

      await service.play({ id: 'clip', filePath, createdAt: 0 });

      expect(warn.mock.calls[0][0]).toBe('Audio playback error');
      expect(await fileExists(filePath)).toBe(false);
    });
  });
});
