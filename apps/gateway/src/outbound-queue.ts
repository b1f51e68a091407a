export type QueueEvent =
  | { kind: 'frames'; frames: string[] }
  | { kind: 'tick' }
  | { kind: 'closed' };

/**
 * Bounded single-consumer frame queue between the broadcaster (producer) and
 * a connection's outbound pump (consumer). `offer` never waits: it reports
 * false when the queue is full or closed and leaves the policy to the caller.
 */
export class OutboundQueue {
  private frames: string[] = [];
  private waiter: ((event: QueueEvent) => void) | null = null;
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('capacity must be a positive integer');
    }
  }

  get size(): number {
    return this.frames.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  offer(frame: string): boolean {
    if (this.isClosed || this.frames.length >= this.capacity) return false;
    this.frames.push(frame);
    this.wake();
    return true;
  }

  /** Returns true only for the call that actually closed the queue. */
  close(): boolean {
    if (this.isClosed) return false;
    this.isClosed = true;
    this.wake();
    return true;
  }

  /**
   * Resolves with every queued frame, with `closed` once the queue is closed
   * and drained, or with `tick` after `timeoutMs` of nothing to do.
   */
  next(timeoutMs: number): Promise<QueueEvent> {
    if (this.waiter) {
      return Promise.reject(new Error('OutboundQueue supports a single consumer'));
    }
    const ready = this.take();
    if (ready) return Promise.resolve(ready);

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve({ kind: 'tick' });
      }, timeoutMs);
      this.waiter = (event) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(event);
      };
    });
  }

  private take(): QueueEvent | null {
    if (this.frames.length > 0) {
      const frames = this.frames;
      this.frames = [];
      return { kind: 'frames', frames };
    }
    if (this.isClosed) return { kind: 'closed' };
    return null;
  }

  private wake(): void {
    if (!this.waiter) return;
    const event = this.take();
    if (event) this.waiter(event);
  }
}
