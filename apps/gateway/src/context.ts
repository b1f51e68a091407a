import {
  Broadcaster,
  HistoryStore,
  RoomRegistry,
  type BroadcastConfig,
  type DurableMessageStore,
  type ReaperDeps,
  type ReaperSchedule,
} from '@roomcast/domain';
import {
  MessageIdGenerator,
  TokenBucketRateLimiter,
  createLogger,
  type GatewayConfig,
  type SafeLogger,
} from '@roomcast/shared';
import { type ConnectionOptions } from './connection';

export const DEFAULT_ROOM_NAME = 'Chat Room';

/**
 * Everything the upgrade handler needs, built once at process start and
 * passed explicitly; there is no module-level broadcaster state.
 */
export interface BroadcastContext {
  broadcaster: Broadcaster;
  registry: RoomRegistry;
  history: HistoryStore;
  rateLimiter: TokenBucketRateLimiter;
  reaperDeps: ReaperDeps;
}

export function createGatewayLogger(config: Pick<GatewayConfig, 'LOG_LEVEL'>): SafeLogger {
  return createLogger({ name: 'gateway', level: config.LOG_LEVEL });
}

export function toBroadcastConfig(config: GatewayConfig): BroadcastConfig {
  return {
    maxPayloadBytes: config.MAX_PAYLOAD_BYTES,
    messageTtlMs: config.MESSAGE_TTL_SECONDS * 1000,
    historyReplayLimit: config.HISTORY_REPLAY_LIMIT,
    defaultRoomName: DEFAULT_ROOM_NAME,
  };
}

export function toConnectionOptions(config: GatewayConfig): ConnectionOptions {
  return {
    queueSize: config.OUTBOUND_QUEUE_SIZE,
    keepaliveIntervalMs: config.KEEPALIVE_INTERVAL_MS,
    pongTimeoutMs: config.PONG_TIMEOUT_MS,
    writeTimeoutMs: config.WRITE_TIMEOUT_MS,
  };
}

export function toReaperSchedule(config: GatewayConfig): ReaperSchedule {
  return {
    roomSweepIntervalMs: config.ROOM_SWEEP_INTERVAL_MS,
    roomMaxIdleMs: config.ROOM_MAX_IDLE_MS,
    historySweepIntervalMs: config.HISTORY_SWEEP_INTERVAL_MS,
    limiterSweepIntervalMs: config.LIMITER_SWEEP_INTERVAL_MS,
    limiterMaxIdleMs: config.LIMITER_MAX_IDLE_MS,
  };
}

export function createBroadcastContext(opts: {
  config: GatewayConfig;
  durable: DurableMessageStore | null;
  logger: SafeLogger;
}): BroadcastContext {
  const { config, durable, logger } = opts;
  const idGen = new MessageIdGenerator();

  const history = new HistoryStore({
    durable,
    memoryCapacity: config.MEMORY_HISTORY_SIZE,
    durableTimeoutMs: config.DURABLE_TIMEOUT_MS,
    logger: logger.child({ component: 'history' }),
  });
  const registry = new RoomRegistry({
    history,
    logger: logger.child({ component: 'registry' }),
  });
  const rateLimiter = new TokenBucketRateLimiter(config.RATE_LIMIT_PER_MINUTE);
  const broadcaster = new Broadcaster({
    registry,
    history,
    rateLimiter,
    config: toBroadcastConfig(config),
    generateId: () => idGen.generate(),
    logger: logger.child({ component: 'broadcaster' }),
  });

  return {
    broadcaster,
    registry,
    history,
    rateLimiter,
    reaperDeps: {
      registry,
      history,
      rateLimiter,
      logger: logger.child({ component: 'reaper' }),
    },
  };
}
