import { describe, expect, it } from 'vitest';
import { AudioSegmenter } from './audioSegmenter.js';

const pcm = (bytes: number, fill = 0) => Buffer.alloc(bytes, fill);

describe('AudioSegmenter', () => {
  it('cuts 600ms of 16kHz mono audio into three 200ms segments', () => {
    const segmenter = new AudioSegmenter({ segmentDurationMs: 200, sampleRate: 16_000 });
    expect(segmenter.segmentSamples).toBe(3200);
    expect(segmenter.segmentBytes).toBe(6400);

    const segments = [pcm(6400, 1), pcm(6400, 2), pcm(6400, 3)].flatMap((chunk) => segmenter.push(chunk));
    expect(segments.map((s) => s.index)).toEqual([0, 1, 2]);
    expect(segments.map((s) => s.samples)).toEqual([3200, 3200, 3200]);
    expect(segments.map((s) => s.pcm[0])).toEqual([1, 2, 3]);
    expect(segmenter.flush()).toBeNull();
  });

  it('carries remainders across pushes and flushes the tail', () => {
    const segmenter = new AudioSegmenter({ segmentDurationMs: 100, sampleRate: 8_000 });
    // 800 samples = 1600 bytes per segment
    expect(segmenter.push(pcm(1000))).toEqual([]);
    expect(segmenter.bufferedBytes).toBe(1000);

    const second = segmenter.push(pcm(1000));
    expect(second).toHaveLength(1);
    expect(second[0].pcm.length).toBe(1600);
    expect(segmenter.bufferedBytes).toBe(400);

    const tail = segmenter.flush();
    expect(tail?.index).toBe(1);
    expect(tail?.samples).toBe(200);
    expect(segmenter.emittedSegments).toBe(2);
  });

  it('emits ceil(total / segment) segments and loses no bytes', () => {
    const segmenter = new AudioSegmenter({ segmentDurationMs: 20, sampleRate: 16_000 });
    const sizes = [1, 639, 640, 333, 1207, 2, 900];
    const input = Buffer.concat(sizes.map((size, i) => pcm(size, i + 1)));
    const out = sizes.flatMap((size, i) => segmenter.push(pcm(size, i + 1)));
    const tail = segmenter.flush();
    if (tail) out.push(tail);

    const total = sizes.reduce((sum, size) => sum + size, 0);
    expect(total).toBe(3722);
    expect(out).toHaveLength(Math.ceil(total / segmenter.segmentBytes));
    expect(Buffer.concat(out.map((s) => s.pcm)).equals(input)).toBe(true);
  });

  it('drops a trailing half sample on flush', () => {
    const segmenter = new AudioSegmenter({ segmentDurationMs: 200, sampleRate: 16_000 });
    segmenter.push(pcm(5));
    const tail = segmenter.flush();
    expect(tail?.pcm.length).toBe(4);
    expect(tail?.samples).toBe(2);
  });

  it('copies segment bytes so callers may reuse their capture buffer', () => {
    const segmenter = new AudioSegmenter({ segmentDurationMs: 20, sampleRate: 8_000 });
    const chunk = pcm(320, 7);
    const [segment] = segmenter.push(chunk);
    chunk.fill(0);
    expect(segment.pcm[0]).toBe(7);
  });

  it('refuses durations that are not a whole number of samples', () => {
    expect(() => new AudioSegmenter({ segmentDurationMs: 3, sampleRate: 44_100 })).toThrow(RangeError);
  });

  it('refuses input after flush', () => {
    const segmenter = new AudioSegmenter({ segmentDurationMs: 200, sampleRate: 16_000 });
    segmenter.flush();
    expect(() => segmenter.push(pcm(2))).toThrow('already flushed');
  });
});
