import { Bot } from 'grammy';
import { getErrorMessage, logger } from '@tutorbot/shared';
import {
  CompletionRunner,
  ContextStore,
  MessagePipeline,
  OpenRouterCompletionService,
} from '@tutorbot/tutor';
import type { BotConfig } from './config/env.js';
import {
  createTelegramDownloader,
  setupMessageHandler,
  type MessageDispatcher,
} from './handlers/message-handler.js';
import { HealthServer } from './services/health-server.js';
import { Supervisor } from './services/supervisor.js';
import { BotTelemetry } from './services/telemetry.js';

export interface TutorBotApp {
  bot: Bot;
  store: ContextStore;
  pipeline: MessagePipeline;
  dispatcher: MessageDispatcher;
  telemetry: BotTelemetry;
  healthServer: HealthServer | null;
  supervisor: Supervisor;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Build the completion runner, or null when the backend cannot be set up.
 * The bot still starts and answers with the service-unavailable reply.
 */
export function createCompletionRunner(config: BotConfig): CompletionRunner | null {
  try {
    const service = new OpenRouterCompletionService(config.openRouter);
    return new CompletionRunner(service, config.completion);
  } catch (error) {
    logger.error(`❌ Completion backend unavailable: ${getErrorMessage(error)}`);
    return null;
  }
}

export function createTutorBot(config: BotConfig): TutorBotApp {
  const bot = new Bot(config.telegramToken);
  const store = new ContextStore();
  const telemetry = new BotTelemetry();
  const pipeline = new MessagePipeline({ store, completion: createCompletionRunner(config) });

  const dispatcher = setupMessageHandler(bot, {
    pipeline,
    telemetry,
    download: createTelegramDownloader(bot.api, config.telegramToken),
  });

  const healthServer =
    config.healthPort > 0
      ? new HealthServer(config.healthPort, {
          telemetry,
          isPolling: () => bot.isRunning(),
          isBackendAvailable: () => pipeline.isBackendAvailable,
          getStats: () => store.getStats(),
        })
      : null;

  const supervisor = new Supervisor(
    () =>
      bot.start({
        drop_pending_updates: true,
        onStart: (botInfo) => {
          logger.info(`✅ telegram: @${botInfo.username} is polling for messages`);
        },
      }),
    {
      startupDelayMs: config.startupDelayMs,
      onRestart: () => telemetry.incrementRestarts(),
    }
  );

  return {
    bot,
    store,
    pipeline,
    dispatcher,
    telemetry,
    healthServer,
    supervisor,

    async start() {
      await healthServer?.start();
      telemetry.startHealthLog(config.healthLogIntervalMs, () => store.getStats());
      await supervisor.run();
    },

    async stop() {
      supervisor.stop();
      telemetry.stopHealthLog();
      if (bot.isRunning()) {
        await bot.stop();
      }
      await dispatcher.drain();
      await healthServer?.stop();
    },
  };
}
