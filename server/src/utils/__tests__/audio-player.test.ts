import { describe, it, expect, vi } from 'vitest';
import { playAudioFile, playerCommands } from '../audio-player';
import { runChecked, type CommandRunner } from '../process';

describe('playerCommands', () => {
  it('should use afplay on macOS', () => {
    expect(playerCommands('darwin', '/tmp/a.mp3')).toEqual([
      { command: 'afplay', args: ['/tmp/a.mp3'] },
    ]);
  });

  it('should use PowerShell on Windows', () => {
    expect(playerCommands('win32', 'C:\\a.mp3')).toEqual([
      {
        command: 'powershell',
        args: ['-c', "(New-Object Media.SoundPlayer 'C:\\a.mp3').PlaySync()"],
      },
    ]);
  });

  it('should try mpg123 then ffplay on Linux', () => {
    const commands = playerCommands('linux', '/tmp/a.mp3').map((player) => player.command);
    expect(commands).toEqual(['mpg123', 'ffplay']);
  });
});

describe('playAudioFile', () => {
  it('should fall back to ffplay when mpg123 fails', async () => {
    const runner = vi.fn<CommandRunner>(async (command) =>
      command === 'mpg123' ? { code: 1, stderr: 'no device' } : { code: 0, stderr: '' }
    );

    await playAudioFile('/tmp/a.mp3', 'linux', runner);

    expect(runner.mock.calls.map(([command]) => command)).toEqual(['mpg123', 'ffplay']);
  });

  it('should reject with the last error when no player works', async () => {
    const runner = vi.fn<CommandRunner>(async (command) => {
      if (command === 'mpg123') {
        throw new Error('spawn mpg123 ENOENT');
      }
      return { code: 1, stderr: 'ffplay failed' };
    });

    await expect(playAudioFile('/tmp/a.mp3', 'linux', runner)).rejects.toThrow('ffplay failed');
  });
});

describe('runChecked', () => {
  it('should describe a silent non-zero exit', async () => {
    const runner: CommandRunner = async () => ({ code: 2, stderr: '  ' });
    await expect(runChecked(runner, 'sox', [])).rejects.toThrow('sox exited with code 2');
  });
});
