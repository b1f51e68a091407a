import { startReaper, type DurableMessageStore } from '@roomcast/domain';
import {
  loadConfig,
  GatewayConfigSchema,
  createLogger,
  initRedis,
  closeRedis,
  RedisMessageStore,
  errorMessage,
} from '@roomcast/shared';
import { createGateway } from './server';
import {
  createBroadcastContext,
  createGatewayLogger,
  toConnectionOptions,
  toReaperSchedule,
} from './context';

// Only used until the config (and with it LOG_LEVEL) has loaded.
const bootLogger = createLogger({ name: 'gateway' });

async function main(): Promise<void> {
  const config = loadConfig(GatewayConfigSchema);
  const logger = createGatewayLogger(config);

  let durable: DurableMessageStore | null = null;
  if (config.REDIS_URL) {
    const redis = initRedis(config.REDIS_URL, {
      commandTimeoutMs: config.DURABLE_TIMEOUT_MS,
      logger,
    });
    durable = new RedisMessageStore(redis, {
      ttlSeconds: config.MESSAGE_TTL_SECONDS,
      maxRoomMessages: config.MAX_ROOM_MESSAGES,
      logger: logger.child({ component: 'message-store' }),
    });
  } else {
    logger.warn({}, 'REDIS_URL not set, history is kept in memory only');
  }

  const context = createBroadcastContext({ config, durable, logger });
  const reaper = startReaper(context.reaperDeps, toReaperSchedule(config));

  const gateway = createGateway({
    port: config.GATEWAY_PORT,
    host: config.GATEWAY_HOST,
    maxFrameBytes: config.MAX_FRAME_BYTES,
    connection: toConnectionOptions(config),
    context,
    logger,
  });

  await gateway.start();

  const shutdown = async () => {
    logger.info({}, 'Shutting down gateway');
    reaper.stop();
    await gateway.stop();
    await closeRedis();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.fatal({ err: errorMessage(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  bootLogger.fatal({ err: errorMessage(err) }, 'Failed to start gateway');
  process.exit(1);
});
