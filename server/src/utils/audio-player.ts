/**
 * Plays an audio file through the host's command-line player
 */
import { runChecked, runCommand, type CommandRunner } from './process';

interface PlayerCommand {
  command: string;
  args: string[];
}

/**
 * Player candidates for a platform, tried in order
 */
export function playerCommands(platform: NodeJS.Platform, filePath: string): PlayerCommand[] {
  switch (platform) {
    case 'darwin':
      return [{ command: 'afplay', args: [filePath] }];
    case 'win32':
      return [
        {
          command: 'powershell',
          args: ['-c', `(New-Object Media.SoundPlayer '${filePath}').PlaySync()`],
        },
      ];
    default:
      return [
        { command: 'mpg123', args: ['-q', filePath] },
        { command: 'ffplay', args: ['-nodisp', '-autoexit', '-loglevel', 'quiet', filePath] },
      ];
  }
}

/**
 * Plays the file with the first player that succeeds
 * Rejects with the last player's error when none works
 */
export async function playAudioFile(
  filePath: string,
  platform: NodeJS.Platform = process.platform,
  runner: CommandRunner = runCommand
): Promise<void> {
  let lastError: unknown = new Error(`No audio player for platform ${platform}`);

  for (const player of playerCommands(platform, filePath)) {
    try {
      await runChecked(runner, player.command, player.args);
      return;
    } catch (error) {
      lastError = error;
    }
  }

  throw lastError;
}
