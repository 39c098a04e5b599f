import process from 'node:process';

import { createA2AServer, shutdownServer } from './a2a/server.js';
import { TaskEngine } from './a2a/tasks/engine.js';
import { GenerationAdapter } from './ai/generation.js';
import { AIService } from './ai/service.js';
import { loadServiceConfig } from './config.js';
import { LoggingTaskObserver } from './observability/hooks.js';
import { Logger } from './utils/logger.js';

async function main(): Promise<void> {
  const serviceConfig = loadServiceConfig();
  Logger.configure(serviceConfig.logging);
  const logger = Logger.getInstance('Server');

  const observer = new LoggingTaskObserver();
  const backend = new AIService(serviceConfig.ai);
  const generator = new GenerationAdapter(backend, serviceConfig.generation, { observer });
  const engine = new TaskEngine(generator, serviceConfig.tasks, { observer });
  engine.start();

  logger.info('=== AI Configuration ===');
  logger.info(`Provider: ${Logger.colorValue(backend.provider)}`);
  logger.info(`Model: ${Logger.colorValue(backend.modelName)}`);
  if (!backend.available) {
    logger.warn(
      serviceConfig.generation.fallbackEnabled
        ? `No API key for ${backend.provider}; requests are answered from the fallback set`
        : `No API key for ${backend.provider}; requests will fail`,
    );
  }
  logger.info(
    `Fallback quotes: ${Logger.colorValue(serviceConfig.generation.fallbackEnabled ? 'enabled' : 'disabled')}`,
  );

  const server = await createA2AServer({ serviceConfig, engine });

  const handleSignal = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down server...`);
    void shutdownServer(server, engine)
      .catch((error: unknown) => {
        logger.error('Error during server shutdown', error);
      })
      .finally(() => {
        process.exit(0);
      });
  };

  process.on('SIGINT', handleSignal);
  process.on('SIGTERM', handleSignal);
}

void main().catch((error: unknown) => {
  const logger = Logger.getInstance('Server');
  logger.error('Failed to start quote agent', error);
  process.exit(1);
});
