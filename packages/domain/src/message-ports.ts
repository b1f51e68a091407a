import { type RoomMessage } from './message';

/**
 * Durable history tier. Implementations keep one record per message with a
 * TTL and a per-room index ordered by arrival, capped to a fixed size.
 */
export interface DurableMessageStore {
  save(message: RoomMessage): Promise<void>;

  /** Up to `limit` most recent messages for the room, oldest first. */
  listRecent(roomId: string, limit: number): Promise<RoomMessage[]>;

  /** Drops index entries whose message record has expired. Returns how many were removed. */
  pruneIndex(): Promise<number>;
}
