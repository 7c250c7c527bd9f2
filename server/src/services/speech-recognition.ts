/**
 * Speech recognition service - records the microphone and transcribes it
 * Backends: local whisper CLI or Google Cloud Speech REST
 */
import { randomUUID } from 'crypto';
import { mkdtemp, readFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { SpeechRecognizer, Transcriber } from '../types/index';
import type { AppConfig } from '../config/index';
import { LoggerService } from './logger';
import { fetchWithTimeout, readJson } from '../utils/fetch';
import { removeFile } from '../utils/files';
import { SAMPLE_RATE, recordAudio } from '../utils/audio-recorder';
import { runChecked, runCommand, type CommandRunner } from '../utils/process';

export const GOOGLE_SPEECH_URL = 'https://speech.googleapis.com/v1/speech:recognize';

const PROGRESS_WIDTH = 20;

/**
 * Renders the recording countdown, e.g. `[████░░░░] 3.2s remaining `
 */
export function renderProgressBar(
  elapsedSeconds: number,
  durationSeconds: number,
  width: number = PROGRESS_WIDTH
): string {
  const ratio = durationSeconds > 0 ? elapsedSeconds / durationSeconds : 1;
  const filled = Math.min(width, Math.max(0, Math.floor(ratio * width)));
  const remaining = Math.max(0, durationSeconds - elapsedSeconds);
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}] ${remaining.toFixed(1)}s remaining `;
}

export interface WhisperOptions {
  command: string;
  model: string;
  timeoutMs: number;
  runner?: CommandRunner;
}

/**
 * Runs the whisper CLI and reads back its .txt output
 */
export class WhisperTranscriber implements Transcriber {
  readonly name = 'whisper';
  private readonly options: WhisperOptions;
  private readonly runner: CommandRunner;

  constructor(options: WhisperOptions) {
    this.options = options;
    this.runner = options.runner ?? runCommand;
  }

  async transcribe(audioFile: string): Promise<string | null> {
    const outputDir = path.dirname(audioFile);
    const transcriptFile = path.join(outputDir, `${path.parse(audioFile).name}.txt`);

    await runChecked(
      this.runner,
      this.options.command,
      [
        audioFile,
        '--model',
        this.options.model,
        '--language',
        'en',
        '--output_format',
        'txt',
        '--output_dir',
        outputDir,
        '--fp16',
        'False',
      ],
      { timeoutMs: this.options.timeoutMs }
    );

    try {
      const text = (await readFile(transcriptFile, 'utf-8')).trim();
      return text || null;
    } finally {
      await removeFile(transcriptFile);
    }
  }
}

interface GoogleRecognizeResponse {
  results?: Array<{
    alternatives?: Array<{ transcript?: string }>;
  }>;
}

/**
 * Google Cloud Speech-to-Text v1 recognize call
 */
export class GoogleTranscriber implements Transcriber {
  readonly name = 'google';
  private readonly apiKey: string;
  private readonly timeout: number;

  constructor(apiKey: string, timeout: number) {
    this.apiKey = apiKey;
    this.timeout = timeout;
  }

  async transcribe(audioFile: string): Promise<string | null> {
    const audio = await readFile(audioFile);

    const data = await fetchWithTimeout(
      `${GOOGLE_SPEECH_URL}?key=${encodeURIComponent(this.apiKey)}`,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          config: {
            encoding: 'LINEAR16',
            sampleRateHertz: SAMPLE_RATE,
            languageCode: 'en-US',
          },
          audio: { content: audio.toString('base64') },
        }),
      },
      this.timeout,
      (response) => readJson<GoogleRecognizeResponse>(response)
    );
    const transcript = data.results?.[0]?.alternatives?.[0]?.transcript?.trim();
    return transcript || null;
  }
}

export interface SpeechRecognitionDeps {
  runner?: CommandRunner;
  /**
   * Overrides the backend picked from config
   */
  transcriber?: Transcriber;
  /**
   * Receives progress lines while recording; defaults to stdout
   */
  progress?: (line: string) => void;
  workDir?: string;
}

/**
 * Records a fixed-length clip and transcribes it; every failure becomes null
 */
export class SpeechRecognitionService implements SpeechRecognizer {
  readonly enabled: boolean;
  private readonly stt: AppConfig['stt'];
  private readonly logger: LoggerService;
  private readonly runner: CommandRunner;
  private readonly transcriber: Transcriber | null;
  private readonly progress: (line: string) => void;
  private workDir: Promise<string> | null;

  constructor(stt: AppConfig['stt'], logger: LoggerService, deps: SpeechRecognitionDeps = {}) {
    this.stt = stt;
    this.logger = logger;
    this.runner = deps.runner ?? runCommand;
    this.progress = deps.progress ?? ((line) => process.stdout.write(line));
    this.workDir = deps.workDir !== undefined ? Promise.resolve(deps.workDir) : null;
    this.transcriber = stt.enabled ? (deps.transcriber ?? this.createTranscriber()) : null;
    this.enabled = this.transcriber !== null;

    if (this.transcriber) {
      this.logger.info(`STT enabled - backend: ${this.transcriber.name}`);
    }
  }

  /**
   * Records `durationSeconds` of audio and returns the transcript
   * @returns Transcript, or null on silence, unintelligible audio or failure
   */
  async transcribe(durationSeconds: number): Promise<string | null> {
    if (!this.transcriber) {
      return null;
    }

    let audioFile: string | null = null;
    try {
      audioFile = path.join(await this.getWorkDir(), `${randomUUID()}.wav`);

      this.progress(`\nRecording for ${durationSeconds} seconds... SPEAK NOW!\n\n`);
      await recordAudio({
        command: this.stt.recordCommand,
        filePath: audioFile,
        durationSeconds,
        runner: this.runner,
        onProgress: (elapsed) => this.progress(`\r${renderProgressBar(elapsed, durationSeconds)}`),
      });
      this.progress(`\r${renderProgressBar(durationSeconds, durationSeconds)}\nRecording complete! Processing...\n\n`);

      const text = await this.transcriber.transcribe(audioFile);
      if (!text) {
        this.logger.info('No speech recognized');
      }
      return text;
    } catch (error) {
      this.logger.warn(`Speech recognition failed (${this.transcriber.name})`, error);
      return null;
    } finally {
      const failure = audioFile ? await removeFile(audioFile) : null;
      if (failure) {
        this.logger.debug(`Could not remove recording ${audioFile}`, failure);
      }
    }
  }

  private createTranscriber(): Transcriber | null {
    switch (this.stt.backend) {
      case 'whisper':
        return new WhisperTranscriber({
          command: this.stt.whisperCommand,
          model: this.stt.whisperModel,
          timeoutMs: this.stt.timeout,
          runner: this.runner,
        });
      case 'google':
        if (!this.stt.googleApiKey) {
          this.logger.warn('STT backend google needs GOOGLE_SPEECH_API_KEY. Voice input disabled.');
          return null;
        }
        return new GoogleTranscriber(this.stt.googleApiKey, this.stt.timeout);
      default:
        this.logger.warn(`Unknown STT backend: ${this.stt.backend}. Voice input disabled.`);
        return null;
    }
  }

  private getWorkDir(): Promise<string> {
    if (!this.workDir) {
      this.workDir = mkdtemp(path.join(os.tmpdir(), 'conch-stt-'));
    }
    return this.workDir;
  }
}
