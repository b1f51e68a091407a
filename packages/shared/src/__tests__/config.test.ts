import { describe, it, expect } from 'vitest';
import { loadConfig, BaseConfigSchema, GatewayConfigSchema } from '../config';

describe('loadConfig', () => {
  it('parses valid base config with defaults', () => {
    const config = loadConfig(BaseConfigSchema, {});

    expect(config.NODE_ENV).toBe('development');
    expect(config.LOG_LEVEL).toBe('info');
  });

  it('parses explicit values', () => {
    const config = loadConfig(BaseConfigSchema, {
      NODE_ENV: 'production',
      LOG_LEVEL: 'error',
    });

    expect(config.NODE_ENV).toBe('production');
    expect(config.LOG_LEVEL).toBe('error');
  });

  it('throws on invalid NODE_ENV', () => {
    expect(() =>
      loadConfig(BaseConfigSchema, { NODE_ENV: 'staging' }),
    ).toThrow('Config validation failed');
  });

  it('applies gateway defaults', () => {
    const config = loadConfig(GatewayConfigSchema, {});

    expect(config.GATEWAY_HOST).toBe('0.0.0.0');
    expect(config.GATEWAY_PORT).toBe(8080);
    expect(config.REDIS_URL).toBeUndefined();
    expect(config.MAX_PAYLOAD_BYTES).toBe(4096);
    expect(config.MESSAGE_TTL_SECONDS).toBe(86_400);
    expect(config.RATE_LIMIT_PER_MINUTE).toBe(30);
    expect(config.MAX_ROOM_MESSAGES).toBe(1000);
    expect(config.MEMORY_HISTORY_SIZE).toBe(100);
    expect(config.DURABLE_TIMEOUT_MS).toBe(3_000);
    expect(config.OUTBOUND_QUEUE_SIZE).toBe(256);
    expect(config.KEEPALIVE_INTERVAL_MS).toBe(54_000);
    expect(config.WRITE_TIMEOUT_MS).toBe(10_000);
    expect(config.ROOM_SWEEP_INTERVAL_MS).toBe(1_800_000);
  });

  it('coerces numeric gateway settings', () => {
    const config = loadConfig(GatewayConfigSchema, {
      REDIS_URL: 'redis://localhost:6379',
      MAX_PAYLOAD_BYTES: '8192',
      RATE_LIMIT_PER_MINUTE: '5',
    });

    expect(config.REDIS_URL).toBe('redis://localhost:6379');
    expect(config.MAX_PAYLOAD_BYTES).toBe(8192);
    expect(config.RATE_LIMIT_PER_MINUTE).toBe(5);
  });

  it('rejects non-positive limits', () => {
    expect(() =>
      loadConfig(GatewayConfigSchema, { OUTBOUND_QUEUE_SIZE: '0' }),
    ).toThrow('OUTBOUND_QUEUE_SIZE');
  });

  it('rejects an out-of-range port', () => {
    expect(() =>
      loadConfig(GatewayConfigSchema, { GATEWAY_PORT: '70000' }),
    ).toThrow('Config validation failed');
  });
});
