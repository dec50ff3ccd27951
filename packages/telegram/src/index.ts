import './config/load-env.js';

import { getErrorMessage, logger } from '@tutorbot/shared';
import { createTutorBot } from './app.js';
import { loadConfig, type BotConfig } from './config/env.js';

async function main(): Promise<void> {
  logger.info('🚀 Starting Language Tutor Bot...');

  let config: BotConfig;
  try {
    config = loadConfig();
  } catch (error) {
    logger.error(`❌ ${getErrorMessage(error)}`);
    process.exit(1);
  }

  const app = createTutorBot(config);

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, shutting down Telegram bot`);
    void app.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error during shutdown:', { error: getErrorMessage(error) });
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await app.start();
}

main().catch((error: unknown) => {
  logger.error('💥 Telegram bot failed to start:', { error: getErrorMessage(error) });
  process.exit(1);
});
