import {
  CLIENT_JOIN,
  CLIENT_MESSAGE,
  DEFAULT_DISPLAY_NAME,
  createErrorFrame,
  encodeFrame,
  parseClientFrame,
  type ClientJoinFrame,
  type ClientMessageFrame,
} from '@roomcast/proto';
import {
  BroadcastError,
  type Broadcaster,
  type MemberState,
  type Room,
  type RoomMember,
} from '@roomcast/domain';
import {
  AppError,
  ErrorCode,
  errorMessage,
  generateConnectionId,
  generateUserId,
  type SafeLogger,
} from '@roomcast/shared';
import { OutboundQueue } from './outbound-queue';

/** The duplex session a Connection drives; implemented over `ws` in production. */
export interface Transport {
  /** Resolves once the frame has been handed to the socket. */
  send(data: string): Promise<void>;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

export interface ConnectionOptions {
  queueSize: number;
  keepaliveIntervalMs: number;
  pongTimeoutMs: number;
  writeTimeoutMs: number;
}

const BROADCAST_ERROR_CODES: Record<BroadcastError['kind'], ErrorCode> = {
  VALIDATION: ErrorCode.VALIDATION,
  RATE_LIMITED: ErrorCode.RATE_LIMITED,
  CONFLICT: ErrorCode.CONFLICT,
};

function withDeadline<T>(promise: Promise<T>, ms: number, what: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${what} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}

/**
 * One WebSocket session. Inbound frames are processed strictly in arrival
 * order; outbound frames flow through a bounded queue drained by a separate
 * pump that also drives the keepalive.
 *
 * State: unbound -> joined -> closed. Closed is terminal.
 */
export class Connection implements RoomMember {
  readonly connectionId = generateConnectionId();

  private currentState: MemberState = 'unbound';
  private boundRoom: Room | null = null;
  private boundUserId: string | null = null;
  private boundDisplayName: string | null = null;

  private readonly queue: OutboundQueue;
  private readonly logger: SafeLogger;
  private inbound: Promise<void> = Promise.resolve();
  private lastPong = Date.now();
  private cleanedUp = false;

  constructor(
    private readonly transport: Transport,
    private readonly broadcaster: Broadcaster,
    private readonly options: ConnectionOptions,
    logger: SafeLogger,
  ) {
    this.queue = new OutboundQueue(options.queueSize);
    this.logger = logger.child({ connectionId: this.connectionId });
  }

  get state(): MemberState {
    return this.currentState;
  }

  get room(): Room | null {
    return this.boundRoom;
  }

  get userId(): string | null {
    return this.boundUserId;
  }

  get displayName(): string | null {
    return this.boundDisplayName;
  }

  bind(room: Room, userId: string, displayName: string): void {
    if (this.currentState !== 'unbound') {
      throw new Error(`Cannot bind a ${this.currentState} connection`);
    }
    this.boundRoom = room;
    this.boundUserId = userId;
    this.boundDisplayName = displayName;
    this.currentState = 'joined';
  }

  enqueue(frame: string): boolean {
    return this.queue.offer(frame);
  }

  closeQueue(): void {
    if (this.queue.close()) {
      this.currentState = 'closed';
    }
  }

  /** Runs the outbound pump until the queue closes or the transport fails. */
  start(): Promise<void> {
    return this.pumpOutbound();
  }

  /** Queues an inbound text frame behind any frame still being processed. */
  receive(raw: string): Promise<void> {
    this.inbound = this.inbound
      .then(() => this.handleFrame(raw))
      .catch((err) => {
        this.logger.error({ err: errorMessage(err) }, 'Inbound frame handling failed');
      });
    return this.inbound;
  }

  handlePong(): void {
    this.lastPong = Date.now();
  }

  /**
   * Transport closed or errored, or the server is shutting down. Leaves the
   * room and closes the transport with `code` once.
   */
  handleClose(code?: number): void {
    if (this.cleanedUp) return;
    this.cleanedUp = true;
    this.broadcaster.leave(this);
    this.transport.close(code);
    this.logger.info({ code, roomId: this.boundRoom?.id }, 'Connection closed');
  }

  private async handleFrame(raw: string): Promise<void> {
    if (this.currentState === 'closed') return;

    const parsed = parseClientFrame(raw);
    if (!parsed.success) {
      if (parsed.stage === 'syntax') {
        this.logger.warn({ reason: parsed.reason }, 'Dropping undecodable frame');
        return;
      }
      this.logger.info({ reason: parsed.reason }, 'Rejecting invalid frame');
      this.replyError(new AppError(ErrorCode.VALIDATION, `Invalid frame: ${parsed.reason}`));
      return;
    }

    const { frame } = parsed;
    switch (frame.type) {
      case CLIENT_JOIN:
        this.handleJoin(frame);
        return;
      case CLIENT_MESSAGE:
        await this.handleMessage(frame);
        return;
    }
  }

  private handleJoin(frame: ClientJoinFrame): void {
    const displayName = frame.user?.trim() || DEFAULT_DISPLAY_NAME;
    try {
      this.broadcaster.join(this, frame.room, generateUserId(), displayName);
    } catch (err) {
      this.replyError(this.toAppError(err));
    }
  }

  private async handleMessage(frame: ClientMessageFrame): Promise<void> {
    const room = this.boundRoom;
    const userId = this.boundUserId;
    if (this.currentState !== 'joined' || !room || !userId) {
      this.replyError(new AppError(ErrorCode.BAD_REQUEST, 'Join a room before sending messages'));
      return;
    }

    try {
      await this.broadcaster.send(
        room,
        { user: frame.user, encrypted: frame.encrypted, iv: frame.iv },
        userId,
      );
    } catch (err) {
      const appErr = this.toAppError(err);
      this.logger.info({ roomId: room.id, code: appErr.code }, 'Message rejected');
      this.replyError(appErr);
    }
  }

  private replyError(err: AppError): void {
    // Same non-blocking policy as fan-out, but a full queue only loses the error frame.
    this.queue.offer(encodeFrame(createErrorFrame(err.code, err.message)));
  }

  private toAppError(err: unknown): AppError {
    if (err instanceof AppError) return err;
    if (err instanceof BroadcastError) {
      return new AppError(BROADCAST_ERROR_CODES[err.kind], err.message);
    }
    this.logger.error({ err: errorMessage(err) }, 'Unexpected error handling frame');
    return new AppError(ErrorCode.INTERNAL, 'Internal error');
  }

  private async pumpOutbound(): Promise<void> {
    const { keepaliveIntervalMs, pongTimeoutMs, writeTimeoutMs } = this.options;
    let lastPing = Date.now();

    try {
      for (;;) {
        const wait = Math.max(0, lastPing + keepaliveIntervalMs - Date.now());
        const event = await this.queue.next(wait);

        if (event.kind === 'closed') {
          this.transport.close(1000, 'Connection closed');
          return;
        }

        if (event.kind === 'frames') {
          for (const frame of event.frames) {
            await withDeadline(this.transport.send(frame), writeTimeoutMs, 'write');
          }
        }

        const now = Date.now();
        if (now - lastPing >= keepaliveIntervalMs) {
          if (now - this.lastPong > pongTimeoutMs) {
            this.logger.info({}, 'Peer missed keepalive, terminating');
            this.transport.terminate();
            return;
          }
          this.transport.ping();
          lastPing = now;
        }
      }
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, 'Outbound write failed, terminating');
      this.transport.terminate();
    }
  }
}
