import { StreamingError } from '../errors.js';

export interface AudioQueueOptions {
  /** Upper bound on buffered PCM bytes. A single chunk larger than this is still admitted into an empty queue. */
  maxBytes: number;
  /** How long one push may block on a full queue before it counts as a timeout. */
  pushTimeoutMs: number;
  /** Consecutive push timeouts tolerated before the capture side is declared starved. */
  maxPushTimeouts: number;
}

/**
 * Bounded hand-off between the capture side and the producer. `push` blocks while the
 * queue is full; pushes are serialized so chunks keep capture order even if the caller
 * does not await each one.
 */
export class AudioQueue {
  private readonly opts: AudioQueueOptions;
  private items: Buffer[] = [];
  private queued = 0;
  private ended = false;
  private failure: StreamingError | null = null;
  private consecutiveTimeouts = 0;
  private pushChain: Promise<void> = Promise.resolve();
  private spaceWaiters: Array<() => void> = [];
  private dataWaiters: Array<() => void> = [];

  constructor(opts: AudioQueueOptions) {
    this.opts = opts;
  }

  get queuedBytes(): number {
    return this.queued;
  }

  push(chunk: Buffer): Promise<void> {
    const next = this.pushChain.then(() => this.admit(chunk));
    // The chain only orders pushes; each caller still sees its own rejection.
    this.pushChain = next.catch(() => undefined);
    return next;
  }

  /** Next chunk in capture order, or `null` once input has ended and the queue is drained. */
  async shift(): Promise<Buffer | null> {
    for (;;) {
      if (this.failure) throw this.failure;
      const item = this.items.shift();
      if (item) {
        this.queued -= item.length;
        this.wake(this.spaceWaiters);
        return item;
      }
      if (this.ended) return null;
      await new Promise<void>((resolve) => this.dataWaiters.push(resolve));
    }
  }

  /** End of input: queued chunks remain readable, further pushes are refused. */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.wake(this.dataWaiters);
    this.wake(this.spaceWaiters);
  }

  /** Discard buffered audio and make every pending and future call reject with `error`. */
  fail(error: StreamingError): void {
    if (this.failure) return;
    this.failure = error;
    this.items = [];
    this.queued = 0;
    this.wake(this.dataWaiters);
    this.wake(this.spaceWaiters);
  }

  private async admit(chunk: Buffer): Promise<void> {
    this.assertWritable();
    while (this.items.length > 0 && this.queued + chunk.length > this.opts.maxBytes) {
      const gotSpace = await this.waitForSpace();
      this.assertWritable();
      if (gotSpace) continue;
      this.consecutiveTimeouts += 1;
      if (this.consecutiveTimeouts >= this.opts.maxPushTimeouts) {
        const error = new StreamingError(
          'capture_starvation',
          `audio queue stayed full for ${this.consecutiveTimeouts} consecutive waits of ${this.opts.pushTimeoutMs}ms`
        );
        this.fail(error);
        throw error;
      }
    }
    this.consecutiveTimeouts = 0;
    this.items.push(chunk);
    this.queued += chunk.length;
    this.wake(this.dataWaiters);
  }

  private assertWritable(): void {
    if (this.failure) throw this.failure;
    if (this.ended) {
      throw new StreamingError('invalid_state', 'audio input has already ended');
    }
  }

  private waitForSpace(): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const onSpace = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.spaceWaiters = this.spaceWaiters.filter((waiter) => waiter !== onSpace);
        resolve(false);
      }, this.opts.pushTimeoutMs);
      this.spaceWaiters.push(onSpace);
    });
  }

  private wake(waiters: Array<() => void>): void {
    const pending = waiters.splice(0, waiters.length);
    pending.forEach((resolve) => resolve());
  }
}
