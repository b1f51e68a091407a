import { type RoomMessage, isExpired } from './message';

/** Bounded, arrival-ordered message buffer. The oldest entries fall off once capacity is reached. */
export class HistoryBuffer {
  private items: RoomMessage[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('capacity must be a positive integer');
    }
  }

  get size(): number {
    return this.items.length;
  }

  push(message: RoomMessage): void {
    this.items.push(message);
    if (this.items.length > this.capacity) {
      this.items.splice(0, this.items.length - this.capacity);
    }
  }

  /** The trailing `limit` live entries, oldest first. Does not modify the buffer. */
  recent(limit: number, now: number = Date.now()): RoomMessage[] {
    if (limit <= 0) return [];
    const live = this.items.filter((m) => !isExpired(m, now));
    return live.slice(-limit);
  }

  dropExpired(now: number = Date.now()): number {
    const before = this.items.length;
    this.items = this.items.filter((m) => !isExpired(m, now));
    return before - this.items.length;
  }
}
