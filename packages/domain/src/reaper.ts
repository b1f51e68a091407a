import { type HistoryStore } from './history-store';
import { type RoomRegistry } from './room-registry';
import { type LoggerPort, type SendRateLimiter } from './ports';

export interface ReaperDeps {
  registry: RoomRegistry;
  history: HistoryStore;
  rateLimiter: SendRateLimiter;
  logger: LoggerPort;
}

export interface ReaperSchedule {
  roomSweepIntervalMs: number;
  roomMaxIdleMs: number;
  historySweepIntervalMs: number;
  limiterSweepIntervalMs: number;
  limiterMaxIdleMs: number;
}

export function sweepIdleRooms(deps: ReaperDeps, maxIdleMs: number, now: number = Date.now()): number {
  return deps.registry.sweepIdle(maxIdleMs, now).length;
}

export async function sweepExpiredHistory(
  deps: ReaperDeps,
  now: number = Date.now(),
): Promise<{ indexEntries: number; buffers: number }> {
  const buffers = deps.history.pruneMemory((roomId) => deps.registry.has(roomId), now);
  const indexEntries = await deps.history.pruneDurable();
  deps.logger.info({ indexEntries, buffers }, 'Expired history sweep completed');
  return { indexEntries, buffers };
}

export function sweepStaleLimiters(deps: ReaperDeps, maxIdleMs: number, now: number = Date.now()): number {
  const removed = deps.rateLimiter.sweepStale(maxIdleMs, now);
  if (removed > 0) {
    deps.logger.info({ count: removed }, 'Stale rate limiter entries removed');
  }
  return removed;
}

/**
 * Starts the periodic sweeps. Nothing runs until this is called; the returned
 * handle clears every timer.
 */
export function startReaper(deps: ReaperDeps, schedule: ReaperSchedule): { stop: () => void } {
  const { logger } = deps;
  let historySweepRunning = false;

  const logSweepError = (sweep: string) => (err: unknown) => {
    logger.error({ err: err instanceof Error ? err.message : String(err), sweep }, 'Sweep failed');
  };

  const runSync = (sweep: string, fn: () => void) => () => {
    try {
      fn();
    } catch (err) {
      logSweepError(sweep)(err);
    }
  };

  const timers = [
    setInterval(
      runSync('idle-rooms', () => sweepIdleRooms(deps, schedule.roomMaxIdleMs)),
      schedule.roomSweepIntervalMs,
    ),
    setInterval(() => {
      if (historySweepRunning) return;
      historySweepRunning = true;
      sweepExpiredHistory(deps)
        .catch(logSweepError('expired-history'))
        .finally(() => {
          historySweepRunning = false;
        });
    }, schedule.historySweepIntervalMs),
    setInterval(
      runSync('stale-limiters', () => sweepStaleLimiters(deps, schedule.limiterMaxIdleMs)),
      schedule.limiterSweepIntervalMs,
    ),
  ];

  for (const timer of timers) timer.unref();
  logger.info({ ...schedule }, 'Reaper started');

  return {
    stop: () => {
      for (const timer of timers) clearInterval(timer);
      logger.info({}, 'Reaper stopped');
    },
  };
}
