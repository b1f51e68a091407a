import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import RedisMock from 'ioredis-mock';
import type Redis from 'ioredis';
import type { RoomMessage } from '@roomcast/domain';
import {
  RedisMessageStore,
  assertExecSucceeded,
  messageKey,
  roomIndexKey,
  roomIdFromIndexKey,
  parseStoredMessage,
} from '../message-store';
import { ErrorCode } from '../errors';
import { type SafeLogger } from '../logger';

const stored = {
  type: 'message',
  room: 'r1',
  user: 'alice',
  encrypted: 'Y2lwaGVydGV4dA==',
  iv: 'aXY=',
  timestamp: '2026-10-19T18:00:00.000Z',
  message_id: '20261019180000000-abcdefghijklmnop',
  expires_at: '2026-10-20T18:00:00.000Z',
  size: 16,
};

describe('message store keys', () => {
  it('builds the message key', () => {
    expect(messageKey('r1', 'm1')).toBe('msg:r1:m1');
  });

  it('builds the room index key', () => {
    expect(roomIndexKey('r1')).toBe('room:r1:messages');
  });

  it('recovers the room id from an index key', () => {
    expect(roomIdFromIndexKey('room:r1:messages')).toBe('r1');
  });

  it('keeps colons inside room ids', () => {
    expect(roomIdFromIndexKey(roomIndexKey('team:alpha'))).toBe('team:alpha');
  });

  it('rejects keys that are not room indexes', () => {
    expect(roomIdFromIndexKey('msg:r1:m1')).toBeNull();
    expect(roomIdFromIndexKey('room::messages')).toBeNull();
  });
});

describe('parseStoredMessage', () => {
  it('parses a stored message', () => {
    expect(parseStoredMessage(JSON.stringify(stored))).toEqual(stored);
  });

  it('returns null for invalid JSON', () => {
    expect(parseStoredMessage('{not json')).toBeNull();
  });

  it('returns null when required fields are missing', () => {
    const { message_id: _omit, ...rest } = stored;
    expect(parseStoredMessage(JSON.stringify(rest))).toBeNull();
  });
});

function thrown(fn: () => void): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

function createTestLogger() {
  const warn = vi.fn();
  const logger: SafeLogger = {
    info: vi.fn(),
    warn,
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
    child: () => logger,
    isLevelEnabled: () => true,
  };
  return { logger, warn };
}

function message(roomId: string, n: number): RoomMessage {
  const at = Date.UTC(2026, 9, 19, 18, 0, n);
  return {
    ...stored,
    type: 'message',
    room: roomId,
    encrypted: `payload-${n}`,
    message_id: `m${n}`,
    timestamp: new Date(at).toISOString(),
    expires_at: new Date(at + 86_400_000).toISOString(),
  };
}

describe('assertExecSucceeded', () => {
  it('accepts a transaction where every command succeeded', () => {
    expect(() => assertExecSucceeded([[null, 'OK'], [null, 1]])).not.toThrow();
  });

  it('treats an aborted transaction as storage unavailable', () => {
    expect(thrown(() => assertExecSucceeded(null))).toMatchObject({
      code: ErrorCode.STORAGE_UNAVAILABLE,
      message: 'Message write transaction was aborted',
    });
  });

  it('surfaces the first failed command', () => {
    const results: Array<[Error | null, unknown]> = [
      [null, 'OK'],
      [new Error('WRONGTYPE Operation against a key holding the wrong kind of value'), null],
    ];

    expect(thrown(() => assertExecSucceeded(results))).toMatchObject({
      code: ErrorCode.STORAGE_UNAVAILABLE,
      message: 'WRONGTYPE Operation against a key holding the wrong kind of value',
    });
  });
});

describe('RedisMessageStore', () => {
  let redis: Redis;
  let warn: ReturnType<typeof vi.fn>;
  let store: RedisMessageStore;

  beforeEach(async () => {
    redis = new RedisMock();
    await redis.flushall();
    const test = createTestLogger();
    warn = test.warn;
    store = new RedisMessageStore(redis, { ttlSeconds: 3600, maxRoomMessages: 3, logger: test.logger });
  });

  afterEach(() => {
    redis.disconnect();
  });

  it('stores the message with a TTL and indexes it by timestamp', async () => {
    const first = message('r1', 1);

    await store.save(first);

    expect(parseStoredMessage(await redis.get(messageKey('r1', 'm1')) ?? '')).toEqual(first);
    const ttl = await redis.ttl(messageKey('r1', 'm1'));
    expect(ttl).toBeGreaterThan(0);
    expect(ttl).toBeLessThanOrEqual(3600);
    expect(await redis.zscore(roomIndexKey('r1'), 'm1')).toBe(String(Date.parse(first.timestamp)));
  });

  it('trims the room index to the newest entries', async () => {
    for (let n = 1; n <= 5; n++) await store.save(message('r1', n));

    expect(await redis.zrange(roomIndexKey('r1'), 0, -1)).toEqual(['m3', 'm4', 'm5']);
  });

  it('lists the most recent messages oldest first', async () => {
    for (let n = 1; n <= 3; n++) await store.save(message('r1', n));

    const recent = await store.listRecent('r1', 2);

    expect(recent.map((m) => m.message_id)).toEqual(['m2', 'm3']);
    expect(recent[1]).toEqual(message('r1', 3));
  });

  it('skips index entries whose message expired or cannot be read', async () => {
    await store.save(message('r1', 1));
    await redis.zadd(roomIndexKey('r1'), Date.UTC(2026, 9, 19, 18, 0, 2), 'gone');
    await redis.zadd(roomIndexKey('r1'), Date.UTC(2026, 9, 19, 18, 0, 3), 'broken');
    await redis.set(messageKey('r1', 'broken'), '{not json');

    const recent = await store.listRecent('r1', 10);

    expect(recent.map((m) => m.message_id)).toEqual(['m1']);
    expect(warn).toHaveBeenCalledWith(
      { roomId: 'r1', messageId: 'broken' },
      'Skipping unreadable stored message',
    );
  });

  it('returns nothing for an empty room or a zero limit', async () => {
    await store.save(message('r1', 1));

    expect(await store.listRecent('empty', 10)).toEqual([]);
    expect(await store.listRecent('r1', 0)).toEqual([]);
  });

  it('prunes only dangling index entries across every scanned page', async () => {
    for (let i = 0; i < 150; i++) {
      await store.save(message(`room-${i}`, 1));
    }
    for (let i = 0; i < 150; i += 2) {
      await redis.del(messageKey(`room-${i}`, 'm1'));
    }

    const removed = await store.pruneIndex();

    expect(removed).toBe(75);
    expect(await redis.zcard(roomIndexKey('room-0'))).toBe(0);
    expect(await redis.zcard(roomIndexKey('room-1'))).toBe(1);
    expect(await redis.zcard(roomIndexKey('room-149'))).toBe(1);
  });
});
