export type { RoomMessage, OutgoingMessage } from './message';
export { payloadSize, isExpired } from './message';
export type { DurableMessageStore } from './message-ports';
export type {
  LoggerPort,
  MemberState,
  RoomMember,
  SendRateLimiter,
  BroadcastConfig,
} from './ports';
export { HistoryBuffer } from './history-buffer';
export { Room } from './room';
export { RoomRegistry, type RoomRegistryDeps } from './room-registry';
export { HistoryStore, DEFAULT_DURABLE_TIMEOUT_MS, type HistoryStoreDeps } from './history-store';
export { Broadcaster, BroadcastError, type BroadcasterDeps } from './broadcaster';
export {
  startReaper,
  sweepIdleRooms,
  sweepExpiredHistory,
  sweepStaleLimiters,
  type ReaperDeps,
  type ReaperSchedule,
} from './reaper';
