import { describe, it, expect } from 'vitest';
import { GatewayConfigSchema, createLogger } from '@roomcast/shared';
import {
  DEFAULT_ROOM_NAME,
  createBroadcastContext,
  createGatewayLogger,
  toBroadcastConfig,
  toConnectionOptions,
  toReaperSchedule,
} from '../context';

const config = GatewayConfigSchema.parse({ MESSAGE_TTL_SECONDS: '60', OUTBOUND_QUEUE_SIZE: '8' });

describe('context', () => {
  it('maps config onto the broadcast settings', () => {
    expect(toBroadcastConfig(config)).toEqual({
      maxPayloadBytes: 4096,
      messageTtlMs: 60_000,
      historyReplayLimit: 50,
      defaultRoomName: DEFAULT_ROOM_NAME,
    });
  });

  it('maps config onto connection options', () => {
    expect(toConnectionOptions(config)).toEqual({
      queueSize: 8,
      keepaliveIntervalMs: 54_000,
      pongTimeoutMs: 60_000,
      writeTimeoutMs: 10_000,
    });
  });

  it('maps config onto the reaper schedule', () => {
    expect(toReaperSchedule(config)).toEqual({
      roomSweepIntervalMs: 1_800_000,
      roomMaxIdleMs: 86_400_000,
      historySweepIntervalMs: 3_600_000,
      limiterSweepIntervalMs: 3_600_000,
      limiterMaxIdleMs: 86_400_000,
    });
  });

  it('builds the gateway logger at the configured level', () => {
    const logger = createGatewayLogger(GatewayConfigSchema.parse({ LOG_LEVEL: 'warn' }));

    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.isLevelEnabled('warn')).toBe(true);
  });

  it('passes the durable timeout through to the history store', async () => {
    const context = createBroadcastContext({
      config: GatewayConfigSchema.parse({ DURABLE_TIMEOUT_MS: '20' }),
      durable: {
        save: () => new Promise<void>(() => {}),
        listRecent: () => Promise.resolve([]),
        pruneIndex: () => Promise.resolve(0),
      },
      logger: createLogger({ name: 'test', level: 'silent' }),
    });
    const room = context.registry.getOrCreate('r1', DEFAULT_ROOM_NAME);
    const started = Date.now();

    const message = await context.broadcaster.send(
      room,
      { user: 'alice', encrypted: 'P1', iv: '' },
      'user-alice',
    );

    expect(Date.now() - started).toBeLessThan(1_000);
    expect(context.history.bufferFor('r1').size).toBe(1);
    expect(message.encrypted).toBe('P1');
  });

  it('wires one registry, history and limiter through every component', () => {
    const context = createBroadcastContext({
      config,
      durable: null,
      logger: createLogger({ name: 'test', level: 'silent' }),
    });

    expect(context.reaperDeps.registry).toBe(context.registry);
    expect(context.reaperDeps.history).toBe(context.history);
    expect(context.reaperDeps.rateLimiter).toBe(context.rateLimiter);
    expect(context.history.hasDurableTier).toBe(false);
    expect(context.broadcaster.stats()).toEqual({ rooms: 0, members: 0 });
  });
});
