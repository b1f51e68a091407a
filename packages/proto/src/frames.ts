import { z } from 'zod';

export const CLIENT_JOIN = 'join' as const;
export const CLIENT_MESSAGE = 'message' as const;

export const ROOM_MESSAGE = 'message' as const;
export const USER_JOINED = 'user_joined' as const;
export const USER_LEFT = 'user_left' as const;
export const ERROR = 'error' as const;

export const DEFAULT_DISPLAY_NAME = 'Anonymous';

const roomId = z.string().trim().min(1).max(128);

export const ClientJoinFrameSchema = z.object({
  type: z.literal(CLIENT_JOIN),
  room: roomId,
  user: z.string().max(64).optional(),
});

export const ClientMessageFrameSchema = z.object({
  type: z.literal(CLIENT_MESSAGE),
  room: z.string().default(''),
  user: z.string().max(64).default(''),
  encrypted: z.string(),
  iv: z.string().default(''),
  timestamp: z.string().optional(),
});

export const ClientFrameSchema = z.discriminatedUnion('type', [
  ClientJoinFrameSchema,
  ClientMessageFrameSchema,
]);

export type ClientJoinFrame = z.infer<typeof ClientJoinFrameSchema>;
export type ClientMessageFrame = z.infer<typeof ClientMessageFrameSchema>;
export type ClientFrame = z.infer<typeof ClientFrameSchema>;

/** A message accepted by the broadcaster, as delivered to members and kept in history. */
export const RoomMessageFrameSchema = z.object({
  type: z.literal(ROOM_MESSAGE),
  room: z.string(),
  user: z.string(),
  encrypted: z.string(),
  iv: z.string(),
  timestamp: z.string().datetime(),
  message_id: z.string().min(1),
  expires_at: z.string().datetime(),
  size: z.number().int().nonnegative(),
});

export type RoomMessageFrame = z.infer<typeof RoomMessageFrameSchema>;

export const PresenceFrameSchema = z.object({
  type: z.enum([USER_JOINED, USER_LEFT]),
  room: z.string(),
  user: z.string(),
  timestamp: z.string().datetime(),
});

export type PresenceFrame = z.infer<typeof PresenceFrameSchema>;
export type PresenceType = PresenceFrame['type'];

export const ErrorFrameSchema = z.object({
  type: z.literal(ERROR),
  code: z.string(),
  message: z.string(),
});

export type ErrorFrame = z.infer<typeof ErrorFrameSchema>;

export type ServerFrame = RoomMessageFrame | PresenceFrame | ErrorFrame;

export function createPresenceFrame(
  type: PresenceType,
  room: string,
  user: string,
  now: number = Date.now(),
): PresenceFrame {
  return { type, room, user, timestamp: new Date(now).toISOString() };
}

export function createErrorFrame(code: string, message: string): ErrorFrame {
  return { type: ERROR, code, message };
}

export function encodeFrame(frame: ServerFrame): string {
  return JSON.stringify(frame);
}

export type ParseClientFrameResult =
  | { success: true; frame: ClientFrame }
  /** `syntax`: not JSON at all. `schema`: JSON that is not a valid client frame. */
  | { success: false; stage: 'syntax' | 'schema'; reason: string };

export function parseClientFrame(raw: string): ParseClientFrameResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { success: false, stage: 'syntax', reason: 'Frame is not valid JSON' };
  }
  const parsed = ClientFrameSchema.safeParse(json);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'frame'}: ${issue.message}`)
      .join('; ');
    return { success: false, stage: 'schema', reason };
  }
  return { success: true, frame: parsed.data };
}
