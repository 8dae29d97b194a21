import { StreamingError } from '../errors.js';

/**
 * Request sequence numbers for one session: 1, 2, 3, ... then a single negative
 * terminal value, `-(last + 1)`, which closes the stream.
 */
export class SequenceCounter {
  private last = 0;
  private terminal: number | null = null;

  get finalized(): boolean {
    return this.terminal !== null;
  }

  /** Last value handed out, 0 before the first `next()`. */
  get current(): number {
    return this.terminal ?? this.last;
  }

  peek(): number {
    return this.last + 1;
  }

  next(): number {
    this.assertOpen();
    this.last += 1;
    return this.last;
  }

  finalize(): number {
    this.assertOpen();
    this.terminal = -(this.last + 1);
    return this.terminal;
  }

  private assertOpen(): void {
    if (this.terminal !== null) {
      throw new StreamingError('invalid_state', `sequence already finalized at ${this.terminal}`);
    }
  }
}
