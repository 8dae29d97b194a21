import { describe, expect, it } from 'vitest';
import { StreamingEngine } from './streamingEngine.js';
import { DEFAULT_ENDPOINT, DEFAULT_RESOURCE_ID, parseSessionConfig } from '../config.js';
import type { SessionConfigInput } from '../config.js';
import { decodePayload } from '../protocol/payload.js';
import { encodeFrame } from '../protocol/frameCodec.js';
import { PROTOCOL_VERSION } from '../protocol/constants.js';
import { FakeTransport, errorFrame, fakeTransportFactory, responseFrame } from '../testing/fakeTransport.js';
import type { RecognitionResult, SessionOutcome, SessionState, Transport, TransportConnectOptions } from '../types.js';

const SEGMENT_BYTES = 6400; // 200ms of 16kHz mono s16le

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

function makeConfig(extra: Omit<SessionConfigInput, 'auth'> = {}) {
  return parseSessionConfig({
    auth: { appKey: 'test-app', accessKey: 'test-secret' },
    ...extra,
    audio: { compress: false, ...extra.audio },
  });
}

function scriptServer(transport: FakeTransport, opts: { finalText?: string; ack?: boolean } = {}) {
  transport.onSend = (frame, t) => {
    if (frame.sequence === 1 && opts.ack !== false) {
      t.deliver(responseFrame({ code: 0 }, { sequence: 1 }));
    }
    if (frame.sequence !== null && frame.sequence < 0 && opts.finalText !== undefined) {
      t.deliver(responseFrame({ result: { text: opts.finalText } }, { sequence: frame.sequence, last: true }));
    }
  };
}

function setup(extra: Omit<SessionConfigInput, 'auth'> = {}) {
  const transport = new FakeTransport();
  const factory = fakeTransportFactory(transport);
  const engine = new StreamingEngine({ config: makeConfig(extra), transportFactory: factory });
  const outcomes: SessionOutcome[] = [];
  const results: RecognitionResult[] = [];
  engine.onOutcome((outcome) => outcomes.push(outcome));
  engine.onResult((result) => results.push(result));
  return { transport, factory, engine, outcomes, results };
}

describe('StreamingEngine', () => {
  it('connects with the handshake headers and sends the full request first', async () => {
    const { transport, factory, engine } = setup();
    scriptServer(transport);
    await engine.connect();

    expect(engine.state).toBe('streaming');
    const call: TransportConnectOptions = factory.calls[0];
    expect(call.url).toBe(DEFAULT_ENDPOINT);
    expect(call.headers).toEqual({
      'X-Api-App-Key': 'test-app',
      'X-Api-Access-Key': 'test-secret',
      'X-Api-Resource-Id': DEFAULT_RESOURCE_ID,
      'X-Api-Request-Id': engine.requestId,
      'X-Api-Connect-Id': engine.connectId,
    });

    const [first] = transport.sentFrames;
    expect(first.messageType).toBe('full_request');
    expect(first.sequence).toBe(1);
    expect(first.compression).toBe('gzip');
    const body = decodePayload(first);
    expect(body).toMatchObject({
      ok: true,
      value: {
        audio: { format: 'pcm', codec: 'raw', rate: 16000, bits: 16, channel: 1 },
        request: { model_name: 'bigmodel', enable_itn: true, enable_punc: true, show_utterances: true },
      },
    });
    engine.abort();
  });

  it('sends exactly one terminal frame however often input is ended', async () => {
    const { transport, engine, outcomes } = setup();
    scriptServer(transport, { finalText: 'hello' });
    await engine.connect();

    await engine.writeAudio(Buffer.alloc(SEGMENT_BYTES, 1));
    engine.endAudio();
    engine.endAudio();
    engine.stop();
    const outcome = await engine.finished();

    const frames = transport.sentFrames;
    expect(frames.map((f) => f.sequence)).toEqual([1, 2, -3]);
    expect(frames.filter((f) => f.sequence !== null && f.sequence < 0)).toHaveLength(1);
    expect(frames[1].payload.length).toBe(SEGMENT_BYTES);
    expect(frames[2].last).toBe(true);
    expect(frames[2].payload.length).toBe(0);
    expect(outcome).toMatchObject({ ok: true, finalText: 'hello', results: 1 });
    expect(outcomes).toHaveLength(1);
    expect(engine.state).toBe('closed');
    expect(transport.closeReason).toBe('session complete');
  });

  it('flushes a partial trailing segment before the terminal frame', async () => {
    const { transport, engine } = setup();
    scriptServer(transport, { finalText: 'done' });
    await engine.connect();

    await engine.writeAudio(Buffer.alloc(SEGMENT_BYTES + 1600));
    engine.endAudio();
    await engine.finished();

    const frames = transport.sentFrames;
    expect(frames.map((f) => f.sequence)).toEqual([1, 2, 3, -4]);
    expect(frames.map((f) => f.payload.length)).toEqual([frames[0].payload.length, SEGMENT_BYTES, 1600, 0]);
  });

  it('pipes an async source with strictly increasing sequences', async () => {
    const { transport, engine, outcomes } = setup();
    scriptServer(transport, { finalText: 'three segments' });
    await engine.connect();

    async function* capture() {
      for (let i = 0; i < 6; i += 1) {
        yield Buffer.alloc(SEGMENT_BYTES / 2, i);
      }
    }
    await engine.pipeAudio(capture());
    await engine.finished();

    expect(transport.sentFrames.map((f) => f.sequence)).toEqual([1, 2, 3, 4, -5]);
    expect(engine.stats.audioBytesSent).toBe(SEGMENT_BYTES * 3);
    expect(outcomes).toEqual([expect.objectContaining({ ok: true, finalText: 'three segments' })]);
  });

  it('gzips audio segments when compression is enabled', async () => {
    const { transport, engine } = setup({ audio: { compress: true } });
    scriptServer(transport, { finalText: 'ok' });
    await engine.connect();
    await engine.writeAudio(Buffer.alloc(SEGMENT_BYTES));
    engine.endAudio();
    await engine.finished();

    const audio = transport.sentFrames[1];
    expect(audio.compression).toBe('gzip');
    const decoded = decodePayload(audio);
    expect(decoded.ok && Buffer.isBuffer(decoded.value) ? decoded.value.length : -1).toBe(SEGMENT_BYTES);
  });

  it('reports every state change in order', async () => {
    const { transport, engine } = setup();
    const states: SessionState[] = [];
    engine.onStateChange((t) => states.push(t.to));
    scriptServer(transport, { finalText: 'fin' });
    await engine.connect();
    await engine.writeAudio(Buffer.alloc(SEGMENT_BYTES));
    engine.endAudio();
    await engine.finished();

    expect(states).toEqual(['connecting', 'awaiting_ack', 'streaming', 'streaming', 'finalizing', 'closed']);
  });

  it('emits interim results and skips repeats', async () => {
    const { transport, engine, results } = setup();
    scriptServer(transport);
    await engine.connect();

    transport.deliver(responseFrame({ result: { text: 'good' } }, { sequence: 2 }));
    transport.deliver(responseFrame({ result: { text: 'good' } }, { sequence: 3 }));
    transport.deliver(responseFrame({ result: { text: 'good morning' } }, { sequence: 4 }));
    await tick();

    expect(results.map((r) => r.text)).toEqual(['good', 'good morning']);
    expect(results.every((r) => !r.isFinal)).toBe(true);
    engine.abort();
  });

  it('drops a malformed inbound frame and keeps streaming', async () => {
    const { transport, engine, results } = setup();
    scriptServer(transport);
    await engine.connect();

    const whole = responseFrame({ result: { text: 'cut short' } }, { sequence: 2 });
    const notGzip = encodeFrame({
      version: PROTOCOL_VERSION,
      messageType: 'full_response',
      serialization: 'json',
      compression: 'gzip',
      sequence: 2,
      last: false,
      payload: Buffer.from('not gzip'),
    });

    transport.deliver(Buffer.from([0x21, 0x90, 0x10, 0x00, 0, 0, 0, 0]));
    transport.deliver(whole.subarray(0, whole.length - 1));
    transport.deliver(notGzip);
    transport.deliver(responseFrame({ result: { text: 'still here' } }, { sequence: 2 }));
    await tick();

    expect(engine.state).toBe('streaming');
    expect(engine.stats.framesDropped).toBe(3);
    expect(results.map((r) => r.text)).toEqual(['still here']);
    engine.abort();
  });

  it('fails with transport_closed exactly once when the server drops the connection', async () => {
    const { transport, engine, outcomes } = setup();
    scriptServer(transport);
    await engine.connect();
    await engine.writeAudio(Buffer.alloc(SEGMENT_BYTES));
    await tick();

    transport.serverClose();
    const outcome = await engine.finished();

    expect(engine.state).toBe('errored');
    expect(outcome).toMatchObject({ ok: false, reason: 'transport_closed' });
    expect(outcomes).toHaveLength(1);
    await expect(engine.writeAudio(Buffer.alloc(2))).rejects.toMatchObject({ code: 'invalid_state' });
    expect(transport.sentFrames.every((f) => f.sequence === null || f.sequence > 0)).toBe(true);
  });

  it('ends the session on capture starvation while the producer is stuck sending', async () => {
    const { transport, engine, outcomes } = setup({
      queue: { maxBytes: SEGMENT_BYTES, maxPushTimeouts: 2 },
      timeouts: { pushMs: 20 },
    });
    scriptServer(transport);
    await engine.connect();
    transport.stallSendsAfter = 1;

    await engine.writeAudio(Buffer.alloc(SEGMENT_BYTES));
    await tick();
    await engine.writeAudio(Buffer.alloc(SEGMENT_BYTES));
    await expect(engine.writeAudio(Buffer.alloc(SEGMENT_BYTES))).rejects.toMatchObject({
      code: 'capture_starvation',
    });

    expect(await engine.done).toMatchObject({ ok: false, reason: 'capture_starvation' });
    expect(engine.state).toBe('errored');
    expect(outcomes).toHaveLength(1);
    expect(transport.closed).toBe(true);
    expect(transport.sentFrames.map((f) => f.sequence)).toEqual([1, 2]);
  });

  it('keeps running when state and outcome listeners throw', async () => {
    const { transport, engine, outcomes } = setup();
    engine.onStateChange(() => {
      throw new Error('state listener broke');
    });
    engine.onOutcome(() => {
      throw new Error('outcome listener broke');
    });
    scriptServer(transport, { finalText: 'survived' });
    await engine.connect();
    await engine.writeAudio(Buffer.alloc(SEGMENT_BYTES));
    engine.endAudio();

    expect(await engine.finished()).toMatchObject({ ok: true, finalText: 'survived' });
    expect(outcomes).toHaveLength(1);
    expect(engine.state).toBe('closed');
  });

  it('fails with transport_closed when a send fails', async () => {
    const { transport, engine } = setup();
    scriptServer(transport);
    await engine.connect();

    transport.failNextSend = new Error('socket hang up');
    await engine.writeAudio(Buffer.alloc(SEGMENT_BYTES));
    const outcome = await engine.finished();

    expect(outcome).toMatchObject({ ok: false, reason: 'transport_closed', message: 'socket hang up' });
  });

  it('ends the session on a server error frame', async () => {
    const { transport, engine } = setup();
    scriptServer(transport);
    await engine.connect();

    transport.deliver(errorFrame(45000081, 'quota exceeded'));
    const outcome = await engine.finished();

    expect(outcome).toMatchObject({
      ok: false,
      reason: 'server_error',
      serverCode: 45000081,
      message: 'quota exceeded (code 45000081)',
    });
  });

  it('rejects connect when the full request is refused', async () => {
    const { transport, engine, outcomes } = setup();
    transport.onSend = (frame, t) => {
      if (frame.sequence === 1) t.deliver(errorFrame(45000001, 'invalid request'));
    };

    await expect(engine.connect()).rejects.toMatchObject({ code: 'rejected', serverCode: 45000001 });
    expect(outcomes).toEqual([expect.objectContaining({ ok: false, reason: 'rejected' })]);
    expect(engine.state).toBe('errored');
  });

  it('times out waiting for acceptance', async () => {
    const { transport, engine } = setup({ timeouts: { ackMs: 20 } });
    scriptServer(transport, { ack: false });

    await expect(engine.connect()).rejects.toMatchObject({ code: 'ack_timeout' });
    expect(await engine.finished()).toMatchObject({ ok: false, reason: 'ack_timeout' });
    expect(transport.closed).toBe(true);
  });

  it('times out when the connection never opens', async () => {
    const calls: TransportConnectOptions[] = [];
    const engine = new StreamingEngine({
      config: makeConfig({ timeouts: { connectMs: 20 } }),
      transportFactory: (opts) => {
        calls.push(opts);
        return new Promise<Transport>(() => undefined);
      },
    });

    await expect(engine.connect()).rejects.toMatchObject({ code: 'connect_timeout' });
    expect(calls[0].signal?.aborted).toBe(true);
    expect(await engine.done).toMatchObject({ ok: false, reason: 'connect_timeout' });
  });

  it('times out waiting for the final acknowledgement', async () => {
    const { transport, engine } = setup({ timeouts: { finalMs: 20 } });
    scriptServer(transport);
    await engine.connect();
    engine.endAudio();

    const outcome = await engine.finished();
    expect(outcome).toMatchObject({ ok: false, reason: 'final_timeout' });
    expect(transport.sentFrames.map((f) => f.sequence)).toEqual([1, -2]);
  });

  it('aborts immediately and drops queued audio', async () => {
    const { transport, engine, outcomes } = setup();
    scriptServer(transport);
    await engine.connect();

    engine.abort('user cancelled');
    const outcome = await engine.finished();

    expect(outcome).toMatchObject({ ok: false, reason: 'aborted', message: 'user cancelled' });
    expect(outcomes).toHaveLength(1);
    expect(transport.closeReason).toBe('aborted');
    engine.endAudio();
    expect(transport.sentFrames).toHaveLength(1);
  });

  it('refuses audio before the session is streaming', async () => {
    const { engine } = setup();
    await expect(engine.writeAudio(Buffer.alloc(2))).rejects.toMatchObject({ code: 'invalid_state' });
    expect(engine.state).toBe('idle');
  });

  it('refuses audio after input has ended', async () => {
    const { transport, engine } = setup();
    scriptServer(transport);
    await engine.connect();
    engine.endAudio();

    await expect(engine.writeAudio(Buffer.alloc(2))).rejects.toMatchObject({ code: 'invalid_state' });
    engine.abort();
  });
});
