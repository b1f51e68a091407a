import { HistoryBuffer } from './history-buffer';
import { type RoomMessage, isExpired } from './message';
import { type DurableMessageStore } from './message-ports';
import { type LoggerPort } from './ports';
import { type Room } from './room';

export interface HistoryStoreDeps {
  /** Absent when running without a durable tier. */
  durable: DurableMessageStore | null;
  memoryCapacity: number;
  logger: LoggerPort;
  /** Upper bound on any single durable call. Defaults to 3s. */
  durableTimeoutMs?: number;
}

export const DEFAULT_DURABLE_TIMEOUT_MS = 3_000;

function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function withTimeout<T>(promise: Promise<T>, ms: number, what: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${what} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}

/**
 * Two-tier recent history. Writes go to the durable tier first and to the
 * in-memory buffer regardless of the durable outcome; reads prefer the
 * durable tier and fall back to memory when it is absent, failing or empty.
 */
export class HistoryStore {
  private readonly buffers = new Map<string, HistoryBuffer>();
  private readonly durableTimeoutMs: number;

  constructor(private readonly deps: HistoryStoreDeps) {
    this.durableTimeoutMs = deps.durableTimeoutMs ?? DEFAULT_DURABLE_TIMEOUT_MS;
  }

  get hasDurableTier(): boolean {
    return this.deps.durable !== null;
  }

  bufferFor(roomId: string): HistoryBuffer {
    let buffer = this.buffers.get(roomId);
    if (!buffer) {
      buffer = new HistoryBuffer(this.deps.memoryCapacity);
      this.buffers.set(roomId, buffer);
    }
    return buffer;
  }

  async append(room: Room, message: RoomMessage): Promise<void> {
    const { durable, logger } = this.deps;
    if (durable) {
      try {
        await withTimeout(durable.save(message), this.durableTimeoutMs, 'durable write');
      } catch (err) {
        logger.warn(
          {
            code: 'STORAGE_UNAVAILABLE',
            roomId: room.id,
            messageId: message.message_id,
            err: errMessage(err),
          },
          'Durable history unavailable, keeping message in memory only',
        );
      }
    }
    room.appendHistory(message);
  }

  async recent(roomId: string, limit: number, now: number = Date.now()): Promise<RoomMessage[]> {
    if (limit <= 0) return [];
    const { durable, logger } = this.deps;

    if (durable) {
      try {
        const stored = await withTimeout(
          durable.listRecent(roomId, limit),
          this.durableTimeoutMs,
          'durable read',
        );
        const live = stored.filter((m) => !isExpired(m, now));
        if (live.length > 0) return live;
      } catch (err) {
        logger.warn(
          { code: 'STORAGE_UNAVAILABLE', roomId, err: errMessage(err) },
          'Durable history read failed, using memory',
        );
      }
    }

    return this.buffers.get(roomId)?.recent(limit, now) ?? [];
  }

  /**
   * Drops expired in-memory entries, and the buffers of rooms that no longer
   * exist once they hold nothing live. Returns the number of buffers released.
   */
  pruneMemory(isLive: (roomId: string) => boolean, now: number = Date.now()): number {
    let released = 0;
    for (const [roomId, buffer] of this.buffers) {
      buffer.dropExpired(now);
      if (buffer.size === 0 && !isLive(roomId)) {
        this.buffers.delete(roomId);
        released++;
      }
    }
    return released;
  }

  async pruneDurable(): Promise<number> {
    if (!this.deps.durable) return 0;
    return this.deps.durable.pruneIndex();
  }
}
