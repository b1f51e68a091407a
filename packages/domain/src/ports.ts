import { type Room } from './room';

export interface LoggerPort {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
}

export type MemberState = 'unbound' | 'joined' | 'closed';

/**
 * One live duplex session as seen by the core. The room holds members by
 * reference only; the transport layer owns their lifetime.
 */
export interface RoomMember {
  readonly connectionId: string;
  readonly state: MemberState;
  readonly room: Room | null;
  readonly userId: string | null;
  readonly displayName: string | null;

  /** Moves an unbound member into `joined`. */
  bind(room: Room, userId: string, displayName: string): void;

  /** Non-blocking. Returns false when the outbound queue is full or closed. */
  enqueue(frame: string): boolean;

  /** Closes the outbound queue. Safe to call more than once. */
  closeQueue(): void;
}

export interface SendRateLimiter {
  allow(userId: string): boolean;
  sweepStale(maxIdleMs: number, now?: number): number;
}

export interface BroadcastConfig {
  maxPayloadBytes: number;
  messageTtlMs: number;
  historyReplayLimit: number;
  defaultRoomName: string;
}
