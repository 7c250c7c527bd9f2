/**
 * Microphone recording through sox
 */
import { runChecked, runCommand, type CommandRunner } from './process';

export const SAMPLE_RATE = 16000;

export interface RecordOptions {
  command: string;
  filePath: string;
  durationSeconds: number;
  runner?: CommandRunner;
  /**
   * Called with elapsed seconds while recording
   */
  onProgress?: (elapsedSeconds: number) => void;
  tickMs?: number;
}

/**
 * sox arguments for a 16 kHz mono 16-bit WAV from the default input device
 */
export function recordArgs(filePath: string, durationSeconds: number): string[] {
  return [
    '-q',
    '-d',
    '-r',
    String(SAMPLE_RATE),
    '-c',
    '1',
    '-b',
    '16',
    filePath,
    'trim',
    '0',
    String(durationSeconds),
  ];
}

/**
 * Records for a fixed duration; rejects if the recorder is missing or fails
 */
export async function recordAudio(options: RecordOptions): Promise<void> {
  const runner = options.runner ?? runCommand;
  const { onProgress } = options;
  const startedAt = Date.now();

  onProgress?.(0);
  const ticker = onProgress
    ? setInterval(() => onProgress((Date.now() - startedAt) / 1000), options.tickMs ?? 100)
    : undefined;

  try {
    await runChecked(runner, options.command, recordArgs(options.filePath, options.durationSeconds), {
      // sox should stop by itself; the margin covers device start-up
      timeoutMs: (options.durationSeconds + 10) * 1000,
    });
  } finally {
    clearInterval(ticker);
  }
}
