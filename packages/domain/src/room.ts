import { type RoomMessage } from './message';
import { type HistoryBuffer } from './history-buffer';
import { type RoomMember } from './ports';

export class Room {
  private readonly members = new Set<RoomMember>();
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly id: string,
    readonly name: string,
    readonly createdAt: number,
    private readonly history: HistoryBuffer,
    private readonly onEmpty: (room: Room) => void,
  ) {}

  get memberCount(): number {
    return this.members.size;
  }

  get isEmpty(): boolean {
    return this.members.size === 0;
  }

  hasMember(member: RoomMember): boolean {
    return this.members.has(member);
  }

  /** Copy of the member set, safe to iterate while members are dropped. */
  memberList(): RoomMember[] {
    return [...this.members];
  }

  addMember(member: RoomMember): void {
    this.members.add(member);
  }

  removeMember(member: RoomMember): boolean {
    if (!this.members.delete(member)) return false;
    if (this.members.size === 0) {
      this.onEmpty(this);
    }
    return true;
  }

  appendHistory(message: RoomMessage): void {
    this.history.push(message);
  }

  recentHistory(limit: number, now: number = Date.now()): RoomMessage[] {
    return this.history.recent(limit, now);
  }

  /**
   * Runs `fn` after every task previously queued on this room has settled.
   * Used to keep persist-then-fan-out single-writer per room.
   */
  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
