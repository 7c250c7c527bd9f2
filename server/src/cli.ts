/**
 * Console entry point - talk to the persona in the terminal
 */
import { createAppContext } from './app';
import { config, type AppConfig } from './config/index';
import { createTerminalIO } from './console/io';
import { ConsoleSession } from './console/session';
import { isEntryModule } from './utils/entry';

export async function runConsole(appConfig: AppConfig): Promise<number> {
  const context = await createAppContext(appConfig, { withRecognition: true });
  const io = createTerminalIO();

  try {
    const session = new ConsoleSession({
      io,
      persona: context.persona,
      generation: context.generation,
      synthesis: context.synthesis,
      recognition: context.recognition,
      logger: context.logger,
      sttDurationSeconds: appConfig.stt.durationSeconds,
    });
    return await session.run();
  } finally {
    io.close();
  }
}

if (isEntryModule(import.meta.url)) {
  runConsole(config)
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error(`\nError: ${error instanceof Error ? error.message : String(error)}\n`);
      process.exit(1);
    });
}
