/**
 * Speech synthesis service - turns reply text into MP3 audio through the Murf API
 */
import { randomUUID } from 'crypto';
import { mkdtemp, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { AudioHandle, SpeechSynthesizer } from '../types/index';
import type { AppConfig } from '../config/index';
import { LoggerService } from './logger';
import { TimeoutError, ensureOk, fetchWithTimeout, readJson } from '../utils/fetch';
import { playAudioFile } from '../utils/audio-player';
import { removeFile } from '../utils/files';

export const MURF_GENERATE_URL = 'https://api.murf.ai/v1/speech/generate';

interface MurfGenerateResponse {
  audioFile?: string;
}

export interface SpeechSynthesisDeps {
  /**
   * Plays a file; defaults to the host player
   */
  player?: (filePath: string) => Promise<void>;
  /**
   * Directory for downloaded audio; a fresh temp directory is created when omitted
   */
  outputDir?: string;
  createId?: () => string;
}

/**
 * Strips markup and edge ellipses so the voice reads only the words
 */
export function cleanTextForSpeech(text: string): string {
  let cleaned = text.replace(/[*_`]/g, '').trim();

  while (cleaned.startsWith('...')) {
    cleaned = cleaned.slice(3).trim();
  }
  while (cleaned.endsWith('...')) {
    cleaned = cleaned.slice(0, -3).trim();
  }

  return cleaned
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join(' ');
}

/**
 * Murf-backed synthesizer; every failure becomes a null handle
 */
export class SpeechSynthesisService implements SpeechSynthesizer {
  readonly enabled: boolean;
  private readonly tts: AppConfig['tts'];
  private readonly logger: LoggerService;
  private readonly player: (filePath: string) => Promise<void>;
  private readonly createId: () => string;
  private outputDir: Promise<string> | null;

  constructor(tts: AppConfig['tts'], logger: LoggerService, deps: SpeechSynthesisDeps = {}) {
    this.tts = tts;
    this.logger = logger;
    this.player = deps.player ?? ((filePath) => playAudioFile(filePath));
    this.createId = deps.createId ?? randomUUID;
    this.outputDir = deps.outputDir !== undefined ? Promise.resolve(deps.outputDir) : null;

    if (tts.enabled && !tts.apiKey) {
      this.logger.warn('TTS enabled but MURF_API_KEY is not set. Voice output disabled.');
    }
    this.enabled = tts.enabled && Boolean(tts.apiKey);

    if (this.enabled) {
      this.logger.info(`TTS enabled - Murf voice: ${tts.voiceId} (${tts.style})`);
    }
  }

  /**
   * Synthesizes text into a staged MP3 file
   * @returns Handle to the file, or null when disabled, empty or failed
   */
  async synthesize(text: string): Promise<AudioHandle | null> {
    if (!this.enabled) {
      return null;
    }

    const cleaned = cleanTextForSpeech(text);
    if (!cleaned) {
      return null;
    }

    try {
      const audioUrl = await this.requestAudio(cleaned);
      const audio = await fetchWithTimeout(
        audioUrl,
        { method: 'GET' },
        this.tts.downloadTimeout,
        async (download) => {
          await ensureOk(download);
          return Buffer.from(await download.arrayBuffer());
        }
      );

      const id = this.createId();
      const filePath = path.join(await this.getOutputDir(), `${id}.mp3`);
      await writeFile(filePath, audio);

      this.logger.debug('Speech synthesized', { id, bytes: audio.length });
      return { id, filePath, createdAt: Date.now() };
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.logger.warn('TTS generation timed out, continuing without voice');
      } else {
        this.logger.warn('TTS error, continuing without voice', error);
      }
      return null;
    }
  }

  /**
   * Plays a handle through the host player, then deletes the file
   */
  async play(handle: AudioHandle): Promise<void> {
    try {
      await this.player(handle.filePath);
    } catch (error) {
      this.logger.warn('Audio playback error', error);
    }

    const failure = await removeFile(handle.filePath);
    if (failure) {
      this.logger.debug(`Could not remove audio file ${handle.filePath}`, failure);
    }
  }

  private async requestAudio(text: string): Promise<string> {
    const data = await fetchWithTimeout(
      MURF_GENERATE_URL,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          'api-key': this.tts.apiKey,
        },
        body: JSON.stringify({
          text,
          voiceId: this.tts.voiceId,
          style: this.tts.style,
          modelVersion: this.tts.model,
          format: 'MP3',
          sampleRate: 44100,
        }),
      },
      this.tts.timeout,
      (response) => readJson<MurfGenerateResponse>(response)
    );
    if (!data.audioFile) {
      throw new Error('Murf response has no audioFile');
    }
    return data.audioFile;
  }

  private getOutputDir(): Promise<string> {
    if (!this.outputDir) {
      this.outputDir = mkdtemp(path.join(os.tmpdir(), 'conch-'));
    }
    return this.outputDir;
  }
}
