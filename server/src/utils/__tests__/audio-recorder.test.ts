import { describe, it, expect, vi, afterEach } from 'vitest';
import { recordArgs, recordAudio } from '../audio-recorder';
import type { CommandRunner } from '../process';

describe('recordArgs', () => {
  it('should record 16 kHz mono 16-bit audio for the duration', () => {
    expect(recordArgs('/tmp/in.wav', 5)).toEqual([
      '-q',
      '-d',
      '-r',
      '16000',
      '-c',
      '1',
      '-b',
      '16',
      '/tmp/in.wav',
      'trim',
      '0',
      '5',
    ]);
  });
});

describe('recordAudio', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should run the recorder with a timeout margin', async () => {
    const runner = vi.fn<CommandRunner>(async () => ({ code: 0, stderr: '' }));

    await recordAudio({ command: 'sox', filePath: '/tmp/in.wav', durationSeconds: 3, runner });

    expect(runner).toHaveBeenCalledWith('sox', recordArgs('/tmp/in.wav', 3), { timeoutMs: 13000 });
  });

  it('should report progress while recording', async () => {
    vi.useFakeTimers();
    let finish: () => void = () => undefined;
    const runner = vi.fn<CommandRunner>(
      () =>
        new Promise((resolve) => {
          finish = () => resolve({ code: 0, stderr: '' });
        })
    );
    const onProgress = vi.fn<(elapsedSeconds: number) => void>();

    const recording = recordAudio({
      command: 'sox',
      filePath: '/tmp/in.wav',
      durationSeconds: 1,
      runner,
      onProgress,
      tickMs: 250,
    });
    await vi.advanceTimersByTimeAsync(500);
    finish();
    await recording;

    expect(onProgress.mock.calls.map(([elapsed]) => elapsed)).toEqual([0, 0.25, 0.5]);
  });

  it('should reject when the recorder is missing', async () => {
    const runner = vi.fn<CommandRunner>(async () => {
      throw new Error('spawn sox ENOENT');
    });

    await expect(
      recordAudio({ command: 'sox', filePath: '/tmp/in.wav', durationSeconds: 1, runner })
    ).rejects.toThrow('spawn sox ENOENT');
  });
});
