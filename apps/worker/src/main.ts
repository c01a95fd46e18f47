/**
 * Pedibot Worker
 * Consumes inbound chat messages and enqueues the replies
 */
import { Redis } from 'ioredis';
import { QueueService, applyMigrations, createChildLogger, createDatabase } from '@pedibot/core';
import {
  AnthropicReplyGenerator,
  ConversationOrchestrator,
  DrizzleCatalogProvider,
  DrizzleMessageLedger,
  DrizzleOrderStore,
  DrizzleUserDirectory,
  InboundWorker,
  createInboundProcessor,
} from '@pedibot/agent-runtime';
import { loadConfig } from './config.js';

const log = createChildLogger({ component: 'worker' });

async function startWorker(): Promise<void> {
  const config = loadConfig();

  const database = createDatabase(config.DATABASE_URL);
  await applyMigrations(database.pool);
  // BullMQ blocking connections need maxRetriesPerRequest disabled
  const connection = new Redis({
    host: config.REDIS_HOST,
    port: config.REDIS_PORT,
    password: config.REDIS_PASSWORD,
    maxRetriesPerRequest: null,
  });
  connection.on('error', (error) => {
    log.error({ err: error }, 'Redis connection error');
  });

  QueueService.initialize(connection);
  const messageQueue = QueueService.getMessageQueue();

  const orchestrator = new ConversationOrchestrator(
    {
      ledger: new DrizzleMessageLedger(database.db),
      users: new DrizzleUserDirectory(database.db),
      orders: new DrizzleOrderStore(database.db),
      catalog: new DrizzleCatalogProvider(database.db),
      replies: new AnthropicReplyGenerator({
        apiKey: config.ANTHROPIC_API_KEY,
        model: config.ANTHROPIC_MODEL,
        storeName: config.STORE_NAME,
        defaultLocationName: config.DEFAULT_LOCATION_NAME,
      }),
    },
    {
      ioTimeoutMs: config.IO_TIMEOUT_MS,
      replyTimeoutMs: config.REPLY_TIMEOUT_MS,
      sessionMessageCap: config.SESSION_MESSAGE_CAP,
      defaultLocationName: config.DEFAULT_LOCATION_NAME,
      catalogTtlMs: config.CATALOG_TTL_MS,
    }
  );

  const processor = createInboundProcessor({
    handleInbound: (message) => orchestrator.handleInbound(message),
    send: async (payload) => {
      await messageQueue.add('send', payload);
    },
    recordApology: (message, text) =>
      orchestrator.recordApology(message.phone, message.channel, text, { now: message.now }),
  });

  const inboundWorker = new InboundWorker(processor, {
    connection,
    concurrency: config.WORKER_CONCURRENCY,
  });
  inboundWorker.start();

  log.info(
    { sessionMessageCap: config.SESSION_MESSAGE_CAP, concurrency: config.WORKER_CONCURRENCY },
    'Worker started'
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    log.info({ signal }, 'Shutting down');

    await inboundWorker.stop();
    await QueueService.closeAll();
    await connection.quit();
    await database.close();

    log.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      log.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

// Start
startWorker().catch((error: unknown) => {
  log.fatal({ err: error }, 'Failed to start worker');
  process.exit(1);
});
