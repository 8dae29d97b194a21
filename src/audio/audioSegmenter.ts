import type { AudioSegment } from '../types.js';

export interface AudioSegmenterOptions {
  segmentDurationMs: number;
  sampleRate: number;
  bytesPerSample?: number;
  channels?: number;
}

/**
 * Cuts capture-sized PCM buffers into fixed-duration segments, one per protocol frame.
 * Remainders, including half samples, carry over to the next push; `flush()` releases
 * the trailing partial segment so no audio is dropped.
 */
export class AudioSegmenter {
  readonly segmentSamples: number;
  readonly segmentBytes: number;
  private readonly frameBytes: number;
  private carry: Buffer = Buffer.alloc(0);
  private nextIndex = 0;
  private flushed = false;

  constructor({ segmentDurationMs, sampleRate, bytesPerSample = 2, channels = 1 }: AudioSegmenterOptions) {
    const samples = (segmentDurationMs * sampleRate) / 1000;
    if (!Number.isInteger(samples) || samples <= 0) {
      throw new RangeError(`segment of ${segmentDurationMs}ms at ${sampleRate}Hz is not a whole number of samples`);
    }
    this.segmentSamples = samples;
    this.frameBytes = bytesPerSample * channels;
    this.segmentBytes = samples * this.frameBytes;
  }

  get bufferedBytes(): number {
    return this.carry.length;
  }

  get emittedSegments(): number {
    return this.nextIndex;
  }

  push(chunk: Buffer): AudioSegment[] {
    if (this.flushed) {
      throw new Error('AudioSegmenter already flushed');
    }
    if (chunk.length === 0) return [];
    this.carry = this.carry.length === 0 ? chunk : Buffer.concat([this.carry, chunk]);
    const segments: AudioSegment[] = [];
    while (this.carry.length >= this.segmentBytes) {
      segments.push(this.emit(this.carry.subarray(0, this.segmentBytes)));
      this.carry = this.carry.subarray(this.segmentBytes);
    }
    return segments;
  }

  flush(): AudioSegment | null {
    if (this.flushed) return null;
    this.flushed = true;
    const whole = this.carry.length - (this.carry.length % this.frameBytes);
    const tail = this.carry.subarray(0, whole);
    this.carry = Buffer.alloc(0);
    return tail.length > 0 ? this.emit(tail) : null;
  }

  private emit(pcm: Buffer): AudioSegment {
    const segment: AudioSegment = {
      index: this.nextIndex,
      samples: pcm.length / this.frameBytes,
      pcm: Buffer.from(pcm),
    };
    this.nextIndex += 1;
    return segment;
  }
}
