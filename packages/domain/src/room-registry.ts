import { Room } from './room';
import { type HistoryStore } from './history-store';
import { type LoggerPort } from './ports';

export interface RoomRegistryDeps {
  history: HistoryStore;
  logger: LoggerPort;
}

/**
 * Authoritative roomId -> Room map. Rooms are created lazily on first join
 * and evicted as soon as their last member leaves.
 */
export class RoomRegistry {
  private readonly rooms = new Map<string, Room>();

  constructor(private readonly deps: RoomRegistryDeps) {}

  get size(): number {
    return this.rooms.size;
  }

  memberCount(): number {
    let total = 0;
    for (const room of this.rooms.values()) total += room.memberCount;
    return total;
  }

  getOrCreate(roomId: string, defaultName: string): Room {
    const existing = this.rooms.get(roomId);
    if (existing) return existing;

    const room = new Room(
      roomId,
      defaultName,
      Date.now(),
      this.deps.history.bufferFor(roomId),
      (emptied) => {
        this.remove(emptied.id);
      },
    );
    this.rooms.set(roomId, room);
    this.deps.logger.info({ roomId, name: defaultName }, 'Room created');
    return room;
  }

  get(roomId: string): Room | undefined {
    return this.rooms.get(roomId);
  }

  has(roomId: string): boolean {
    return this.rooms.has(roomId);
  }

  /** Removes the room only if it is still registered and has no members. */
  remove(roomId: string): boolean {
    const room = this.rooms.get(roomId);
    if (!room || !room.isEmpty) return false;
    this.rooms.delete(roomId);
    this.deps.logger.info({ roomId }, 'Room deleted');
    return true;
  }

  /** Deletes empty rooms created more than `maxAgeMs` ago. Returns the deleted ids. */
  sweepIdle(maxAgeMs: number, now: number = Date.now()): string[] {
    const removed: string[] = [];
    for (const [roomId, room] of this.rooms) {
      if (room.isEmpty && now - room.createdAt > maxAgeMs) {
        this.rooms.delete(roomId);
        removed.push(roomId);
      }
    }
    if (removed.length > 0) {
      this.deps.logger.info({ count: removed.length, roomIds: removed }, 'Idle rooms deleted');
    }
    return removed;
  }
}
