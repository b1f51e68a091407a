import type Redis from 'ioredis';
import { RoomMessageFrameSchema } from '@roomcast/proto';
import { type DurableMessageStore, type RoomMessage } from '@roomcast/domain';
import { AppError, ErrorCode } from './errors';
import { type SafeLogger } from './logger';

const MESSAGE_PREFIX = 'msg:';
const ROOM_PREFIX = 'room:';
const ROOM_SUFFIX = ':messages';
const SCAN_COUNT = 100;

export function messageKey(roomId: string, messageId: string): string {
  return `${MESSAGE_PREFIX}${roomId}:${messageId}`;
}

export function roomIndexKey(roomId: string): string {
  return `${ROOM_PREFIX}${roomId}${ROOM_SUFFIX}`;
}

export function roomIdFromIndexKey(key: string): string | null {
  if (!key.startsWith(ROOM_PREFIX) || !key.endsWith(ROOM_SUFFIX)) return null;
  const roomId = key.slice(ROOM_PREFIX.length, key.length - ROOM_SUFFIX.length);
  return roomId.length > 0 ? roomId : null;
}

export function parseStoredMessage(raw: string): RoomMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = RoomMessageFrameSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export interface RedisMessageStoreOptions {
  ttlSeconds: number;
  maxRoomMessages: number;
  logger: SafeLogger;
}

type ExecResults = Array<[error: Error | null, result: unknown]> | null;

/** Throws STORAGE_UNAVAILABLE for an aborted transaction or any failed command in it. */
export function assertExecSucceeded(results: ExecResults): void {
  if (!results) {
    throw new AppError(ErrorCode.STORAGE_UNAVAILABLE, 'Message write transaction was aborted');
  }
  for (const [err] of results) {
    if (err) throw new AppError(ErrorCode.STORAGE_UNAVAILABLE, err.message);
  }
}

/**
 * Durable history on Redis: `msg:<room>:<id>` holds the message JSON with a
 * TTL, `room:<room>:messages` is a sorted set of ids scored by arrival time,
 * trimmed to the newest `maxRoomMessages` and expiring with the same TTL.
 */
export class RedisMessageStore implements DurableMessageStore {
  constructor(
    private readonly redis: Redis,
    private readonly opts: RedisMessageStoreOptions,
  ) {}

  async save(message: RoomMessage): Promise<void> {
    const { ttlSeconds, maxRoomMessages } = this.opts;
    const indexKey = roomIndexKey(message.room);

    const results = await this.redis
      .multi()
      .set(messageKey(message.room, message.message_id), JSON.stringify(message), 'EX', ttlSeconds)
      .zadd(indexKey, Date.parse(message.timestamp), message.message_id)
      .expire(indexKey, ttlSeconds)
      .zremrangebyrank(indexKey, 0, -(maxRoomMessages + 1))
      .exec();

    assertExecSucceeded(results);
  }

  async listRecent(roomId: string, limit: number): Promise<RoomMessage[]> {
    if (limit <= 0) return [];
    const ids = await this.redis.zrevrange(roomIndexKey(roomId), 0, limit - 1);
    if (ids.length === 0) return [];

    const raws = await this.redis.mget(...ids.map((id) => messageKey(roomId, id)));
    const messages: RoomMessage[] = [];
    raws.forEach((raw, i) => {
      if (raw === null) return;
      const message = parseStoredMessage(raw);
      if (!message) {
        this.opts.logger.warn({ roomId, messageId: ids[i] }, 'Skipping unreadable stored message');
        return;
      }
      messages.push(message);
    });

    return messages.reverse();
  }

  async pruneIndex(): Promise<number> {
    let removed = 0;
    let cursor = '0';
    do {
      const [next, keys] = await this.redis.scan(
        cursor,
        'MATCH',
        `${ROOM_PREFIX}*${ROOM_SUFFIX}`,
        'COUNT',
        SCAN_COUNT,
      );
      cursor = next;
      for (const key of keys) {
        removed += await this.pruneRoomIndex(key);
      }
    } while (cursor !== '0');
    return removed;
  }

  private async pruneRoomIndex(indexKey: string): Promise<number> {
    const roomId = roomIdFromIndexKey(indexKey);
    if (!roomId) return 0;

    const ids = await this.redis.zrange(indexKey, 0, -1);
    if (ids.length === 0) return 0;

    const pipeline = this.redis.pipeline();
    for (const id of ids) {
      pipeline.exists(messageKey(roomId, id));
    }
    const results = await pipeline.exec();
    if (!results) return 0;

    const dangling = ids.filter((_, i) => {
      const entry = results[i];
      return entry !== undefined && entry[0] === null && entry[1] === 0;
    });
    if (dangling.length === 0) return 0;

    await this.redis.zrem(indexKey, ...dangling);
    this.opts.logger.debug({ roomId, count: dangling.length }, 'Removed dangling history index entries');
    return dangling.length;
  }
}
