import { randomBytes } from 'node:crypto';

const BASE62 = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
// Largest multiple of 62 below 256; bytes at or above it are rejected to keep the draw uniform.
const UNBIASED_LIMIT = 248;

export function randomString(length: number): string {
  let out = '';
  while (out.length < length) {
    for (const byte of randomBytes(length * 2)) {
      if (byte >= UNBIASED_LIMIT) continue;
      out += BASE62[byte % 62];
      if (out.length === length) break;
    }
  }
  return out;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function formatTimestamp(ms: number): string {
  const d = new Date(ms);
  return (
    String(d.getUTCFullYear()) +
    pad(d.getUTCMonth() + 1) +
    pad(d.getUTCDate()) +
    pad(d.getUTCHours()) +
    pad(d.getUTCMinutes()) +
    pad(d.getUTCSeconds()) +
    pad(d.getUTCMilliseconds(), 3)
  );
}

/**
 * Produces ids of the form `20261019181502123-Xk3...`: a UTC millisecond
 * prefix that sorts chronologically, followed by a random base62 suffix.
 *
 * The prefix never goes backwards for a single generator, so ids from one
 * process sort in issue order even if the wall clock steps back.
 */
export class MessageIdGenerator {
  private lastTimestamp = 0;

  constructor(private readonly suffixLength: number = 16) {
    if (suffixLength < 8) {
      throw new Error('suffixLength must be at least 8');
    }
  }

  generate(now: number = Date.now()): string {
    const timestamp = Math.max(now, this.lastTimestamp);
    this.lastTimestamp = timestamp;
    return `${formatTimestamp(timestamp)}-${randomString(this.suffixLength)}`;
  }
}

export function generateUserId(): string {
  return `user-${randomString(8)}`;
}

export function generateConnectionId(): string {
  return `conn-${randomString(12)}`;
}
