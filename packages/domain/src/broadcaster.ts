import {
  USER_JOINED,
  USER_LEFT,
  ROOM_MESSAGE,
  createPresenceFrame,
  encodeFrame,
} from '@roomcast/proto';
import { type RoomMessage, type OutgoingMessage, payloadSize } from './message';
import { type HistoryStore } from './history-store';
import { type RoomRegistry } from './room-registry';
import { type Room } from './room';
import {
  type BroadcastConfig,
  type LoggerPort,
  type RoomMember,
  type SendRateLimiter,
} from './ports';

export interface BroadcasterDeps {
  registry: RoomRegistry;
  history: HistoryStore;
  rateLimiter: SendRateLimiter;
  config: BroadcastConfig;
  generateId: () => string;
  logger: LoggerPort;
}

export class Broadcaster {
  // Members whose history replay is in flight, with the ids already sent to them either way.
  private readonly replaying = new Map<RoomMember, Set<string>>();

  constructor(private readonly deps: BroadcasterDeps) {}

  join(member: RoomMember, roomId: string, userId: string, displayName: string): Room {
    if (member.state === 'closed') {
      throw new BroadcastError('CONFLICT', 'Connection is closed');
    }
    if (member.state === 'joined') {
      throw new BroadcastError('CONFLICT', `Already joined room ${member.room?.id ?? ''}`);
    }

    const { registry, config, logger } = this.deps;
    const room = registry.getOrCreate(roomId, config.defaultRoomName);
    const present = room.memberList();

    member.bind(room, userId, displayName);
    room.addMember(member);
    logger.info({ roomId, userId, connectionId: member.connectionId }, 'Member joined room');

    this.replayHistory(member, room).catch((err) => {
      logger.warn(
        { roomId, connectionId: member.connectionId, err: err instanceof Error ? err.message : String(err) },
        'History replay failed',
      );
    });

    for (const other of present) {
      member.enqueue(encodeFrame(createPresenceFrame(USER_JOINED, roomId, other.displayName ?? '')));
    }
    this.fanOut(room, encodeFrame(createPresenceFrame(USER_JOINED, roomId, displayName)), {
      except: member,
    });

    return room;
  }

  leave(member: RoomMember): void {
    const room = member.room;
    member.closeQueue();
    this.replaying.delete(member);
    if (!room || !room.removeMember(member)) return;

    this.deps.logger.info(
      { roomId: room.id, userId: member.userId, connectionId: member.connectionId },
      'Member left room',
    );
    this.fanOut(room, encodeFrame(createPresenceFrame(USER_LEFT, room.id, member.displayName ?? '')));
  }

  /**
   * Accepts a message into the room: validates it, stamps id/timestamp/expiry,
   * persists it and enqueues it for every member. Rejects with BroadcastError
   * before touching any state when the payload is too large or the sender is
   * out of tokens.
   */
  async send(room: Room, draft: OutgoingMessage, senderUserId: string): Promise<RoomMessage> {
    const { rateLimiter, config, history, generateId } = this.deps;

    const size = payloadSize(draft.encrypted);
    if (size > config.maxPayloadBytes) {
      throw new BroadcastError(
        'VALIDATION',
        `message too large: ${size} bytes (max: ${config.maxPayloadBytes})`,
      );
    }
    if (!rateLimiter.allow(senderUserId)) {
      throw new BroadcastError('RATE_LIMITED', 'rate limit exceeded');
    }

    return room.runExclusive(async () => {
      const now = Date.now();
      const message: RoomMessage = {
        type: ROOM_MESSAGE,
        room: room.id,
        user: draft.user,
        encrypted: draft.encrypted,
        iv: draft.iv,
        timestamp: new Date(now).toISOString(),
        message_id: generateId(),
        expires_at: new Date(now + config.messageTtlMs).toISOString(),
        size,
      };

      await history.append(room, message);
      this.fanOut(room, encodeFrame(message), { messageId: message.message_id });
      return message;
    });
  }

  stats(): { rooms: number; members: number } {
    return { rooms: this.deps.registry.size, members: this.deps.registry.memberCount() };
  }

  private async replayHistory(member: RoomMember, room: Room): Promise<void> {
    const delivered = new Set<string>();
    this.replaying.set(member, delivered);
    try {
      const messages = await this.deps.history.recent(room.id, this.deps.config.historyReplayLimit);
      for (const message of messages) {
        if (member.state !== 'joined' || member.room !== room) return;
        if (delivered.has(message.message_id)) continue;
        // Best-effort: a full queue ends the replay without dropping the member.
        if (!member.enqueue(encodeFrame(message))) return;
        delivered.add(message.message_id);
      }
    } finally {
      if (this.replaying.get(member) === delivered) {
        this.replaying.delete(member);
      }
    }
  }

  private fanOut(
    room: Room,
    frame: string,
    opts: { except?: RoomMember; messageId?: string } = {},
  ): void {
    for (const member of room.memberList()) {
      if (member === opts.except) continue;
      const delivered = opts.messageId ? this.replaying.get(member) : undefined;
      if (opts.messageId && delivered?.has(opts.messageId)) continue;
      if (member.enqueue(frame)) {
        if (opts.messageId) delivered?.add(opts.messageId);
        continue;
      }
      this.dropUnresponsive(room, member);
    }
  }

  private dropUnresponsive(room: Room, member: RoomMember): void {
    room.removeMember(member);
    member.closeQueue();
    this.replaying.delete(member);
    this.deps.logger.warn(
      { roomId: room.id, connectionId: member.connectionId },
      'Outbound queue full, dropping unresponsive member',
    );
  }
}

export class BroadcastError extends Error {
  constructor(
    public readonly kind: 'VALIDATION' | 'RATE_LIMITED' | 'CONFLICT',
    message: string,
  ) {
    super(message);
    this.name = 'BroadcastError';
  }
}
