import { type RoomMessageFrame } from '@roomcast/proto';

export type RoomMessage = RoomMessageFrame;

/** What a sender supplies; everything else is stamped by the broadcaster. */
export interface OutgoingMessage {
  user: string;
  encrypted: string;
  iv: string;
}

export function payloadSize(encrypted: string): number {
  return Buffer.byteLength(encrypted, 'utf8');
}

export function isExpired(message: RoomMessage, now: number = Date.now()): boolean {
  return Date.parse(message.expires_at) <= now;
}
