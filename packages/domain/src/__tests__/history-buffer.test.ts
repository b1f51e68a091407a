import { describe, it, expect } from 'vitest';
import { HistoryBuffer } from '../history-buffer';
import { makeMessage } from './fakes';

const NOW = Date.parse('2026-10-19T18:00:00.000Z');

describe('HistoryBuffer', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new HistoryBuffer(0)).toThrow('capacity must be a positive integer');
  });

  it('drops the oldest entries beyond capacity', () => {
    const buffer = new HistoryBuffer(3);
    for (let i = 1; i <= 5; i++) buffer.push(makeMessage({ message_id: `m${i}` }));

    expect(buffer.size).toBe(3);
    expect(buffer.recent(10, NOW).map((m) => m.message_id)).toEqual(['m3', 'm4', 'm5']);
  });

  it('returns the trailing entries oldest first', () => {
    const buffer = new HistoryBuffer(10);
    for (let i = 1; i <= 5; i++) buffer.push(makeMessage({ message_id: `m${i}` }));

    expect(buffer.recent(2, NOW).map((m) => m.message_id)).toEqual(['m4', 'm5']);
    expect(buffer.recent(0, NOW)).toEqual([]);
  });

  it('skips expired entries without removing them', () => {
    const buffer = new HistoryBuffer(10);
    buffer.push(makeMessage({ message_id: 'old', expires_at: '2026-10-19T17:00:00.000Z' }));
    buffer.push(makeMessage({ message_id: 'live' }));

    expect(buffer.recent(10, NOW).map((m) => m.message_id)).toEqual(['live']);
    expect(buffer.size).toBe(2);
  });

  it('treats a message expiring exactly now as expired', () => {
    const buffer = new HistoryBuffer(10);
    buffer.push(makeMessage({ expires_at: new Date(NOW).toISOString() }));

    expect(buffer.recent(10, NOW)).toEqual([]);
  });

  it('dropExpired removes expired entries and reports the count', () => {
    const buffer = new HistoryBuffer(10);
    buffer.push(makeMessage({ message_id: 'a', expires_at: '2026-10-19T17:00:00.000Z' }));
    buffer.push(makeMessage({ message_id: 'b', expires_at: '2026-10-19T17:30:00.000Z' }));
    buffer.push(makeMessage({ message_id: 'c' }));

    expect(buffer.dropExpired(NOW)).toBe(2);
    expect(buffer.size).toBe(1);
  });
});
