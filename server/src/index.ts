/**
 * Server entry point - builds the context and starts the Express application
 */
import type { Server } from 'http';
import { createApp, createAppContext, type AppContext } from './app';
import { config, type AppConfig } from './config/index';
import { modelNameFor } from './providers/index';
import { generateBanner } from './utils/banner';
import { isEntryModule } from './utils/entry';

export function startupBanner(context: AppContext): string[] {
  const backend = context.generation.backendKind;
  return generateBanner({
    title: `🐚 ${context.persona.name} Server`,
    port: context.config.server.port,
    backend,
    model: modelNameFor(backend, context.config.llm),
    tts: context.synthesis.enabled,
    stt: false,
  });
}

/**
 * Builds the context and listens on the configured port
 */
export async function startServer(appConfig: AppConfig): Promise<{ server: Server; context: AppContext }> {
  const context = await createAppContext(appConfig);
  const { app } = createApp(context);
  const { port } = appConfig.server;

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, () => resolve(listening));
    listening.on('error', reject);
  });

  startupBanner(context).forEach((line) => console.log(line));
  context.logger.info(`Server started successfully on port ${port}`);
  context.logger.info(`Environment: ${appConfig.server.nodeEnv}`);
  context.logger.info(`Log level: ${appConfig.logging.logLevel}`);

  return { server, context };
}

// Only start server if this file is run directly (not imported in tests)
if (isEntryModule(import.meta.url)) {
  startServer(config)
    .then(({ server, context }) => {
      // Graceful shutdown
      const cleanup = (): void => {
        context.logger.info('Server shutting down');
        server.close(() => process.exit(0));
      };

      process.on('SIGTERM', cleanup);
      process.on('SIGINT', cleanup);
    })
    .catch((error: unknown) => {
      console.error('Failed to start server:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
