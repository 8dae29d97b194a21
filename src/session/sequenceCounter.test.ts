import { describe, expect, it } from 'vitest';
import { SequenceCounter } from './sequenceCounter.js';

describe('SequenceCounter', () => {
  it('counts up from 1 and finalizes with the negated successor', () => {
    const counter = new SequenceCounter();
    expect(counter.current).toBe(0);
    expect([counter.next(), counter.next(), counter.next()]).toEqual([1, 2, 3]);
    expect(counter.peek()).toBe(4);
    expect(counter.finalize()).toBe(-4);
    expect(counter.finalized).toBe(true);
    expect(counter.current).toBe(-4);
  });

  it('finalizes a session that sent only its first request as -2', () => {
    const counter = new SequenceCounter();
    counter.next();
    expect(counter.finalize()).toBe(-2);
  });

  it('refuses to hand out values after finalizing', () => {
    const counter = new SequenceCounter();
    counter.next();
    counter.finalize();
    expect(() => counter.next()).toThrow('already finalized');
    expect(() => counter.finalize()).toThrow('already finalized');
  });
});
