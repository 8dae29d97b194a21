import { randomUUID } from 'node:crypto';
import { AudioQueue } from '../audio/audioQueue.js';
import { AudioSegmenter } from '../audio/audioSegmenter.js';
import type { SessionConfig } from '../config.js';
import { StreamingError, toStreamingError } from '../errors.js';
import { logger as rootLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { decodeFrame, encodeFrame } from '../protocol/frameCodec.js';
import { decodePayload } from '../protocol/payload.js';
import { connectWebSocket } from '../transport/websocketTransport.js';
import type {
  AudioSegment,
  FailureReason,
  RecognitionResult,
  SessionOutcome,
  SessionState,
  StateTransition,
  Transport,
  TransportFactory,
} from '../types.js';
import { abortable, withTimeoutSignal } from '../utils/abort.js';
import { classifyResponse } from './responseClassifier.js';
import { audioFrame, buildFullRequestBody, buildHandshakeHeaders, fullRequestFrame } from './requests.js';
import { SequenceCounter } from './sequenceCounter.js';
import { SessionStateMachine } from './sessionStateMachine.js';

export interface StreamingEngineOptions {
  config: SessionConfig;
  transportFactory?: TransportFactory;
  logger?: Logger;
}

export interface StreamingStats {
  framesSent: number;
  audioBytesSent: number;
  framesReceived: number;
  framesDropped: number;
  resultsEmitted: number;
}

type Timer = ReturnType<typeof setTimeout>;

/**
 * Runs one recognition session end to end. The producer task is the only writer to the
 * transport; the consumer task is the only reader. They share nothing but the state
 * machine, which is only touched from this class.
 */
export class StreamingEngine {
  readonly connectId: string;
  readonly requestId: string;
  private readonly config: SessionConfig;
  private readonly transportFactory: TransportFactory;
  private readonly log: Logger;
  private readonly machine = new SessionStateMachine();
  private readonly sequence = new SequenceCounter();
  private readonly segmenter: AudioSegmenter;
  private readonly queue: AudioQueue;
  private readonly abortController = new AbortController();
  private transport: Transport | null = null;
  private pendingAccept: { resolve: () => void; reject: (err: Error) => void } | null = null;
  private ackTimer: Timer | null = null;
  private finalTimer: Timer | null = null;
  private producer: Promise<void> | null = null;
  private consumer: Promise<void> | null = null;
  private endRequested = false;
  private terminalSent = false;
  private lastTranscriptSignature: string | null = null;
  private lastText = '';
  private outcome: SessionOutcome | null = null;
  private readonly resolveDone: (outcome: SessionOutcome) => void;
  readonly done: Promise<SessionOutcome>;
  readonly stats: StreamingStats = {
    framesSent: 0,
    audioBytesSent: 0,
    framesReceived: 0,
    framesDropped: 0,
    resultsEmitted: 0,
  };

  private readonly listeners: {
    result: ((result: RecognitionResult) => void)[];
    outcome: ((outcome: SessionOutcome) => void)[];
    state: ((transition: StateTransition) => void)[];
  } = { result: [], outcome: [], state: [] };

  constructor(opts: StreamingEngineOptions) {
    this.config = opts.config;
    this.transportFactory = opts.transportFactory ?? connectWebSocket;
    this.connectId = opts.config.auth.connectId ?? randomUUID();
    this.requestId = randomUUID();
    this.log = (opts.logger ?? rootLogger).child({ connectId: this.connectId });
    this.segmenter = new AudioSegmenter({
      segmentDurationMs: opts.config.audio.segmentDurationMs,
      sampleRate: opts.config.audio.sampleRate,
      bytesPerSample: opts.config.audio.bits / 8,
      channels: opts.config.audio.channels,
    });
    this.queue = new AudioQueue({
      maxBytes: opts.config.queue.maxBytes,
      pushTimeoutMs: opts.config.timeouts.pushMs,
      maxPushTimeouts: opts.config.queue.maxPushTimeouts,
    });
    let resolveDone: (outcome: SessionOutcome) => void = () => undefined;
    this.done = new Promise<SessionOutcome>((resolve) => {
      resolveDone = resolve;
    });
    this.resolveDone = resolveDone;
    this.machine.onTransition((transition) => {
      if (transition.event !== 'audio_sent') {
        this.log.debug({ event: 'asr_state', from: transition.from, to: transition.to, trigger: transition.event });
      }
      this.notify(this.listeners.state, transition, 'asr_state_listener_error');
    });
  }

  get state(): SessionState {
    return this.machine.state;
  }

  onResult(cb: (result: RecognitionResult) => void): void {
    this.listeners.result.push(cb);
  }

  onOutcome(cb: (outcome: SessionOutcome) => void): void {
    this.listeners.outcome.push(cb);
  }

  onStateChange(cb: (transition: StateTransition) => void): void {
    this.listeners.state.push(cb);
  }

  /**
   * Open the connection, send the session's full request and wait for the service to
   * accept it. Resolves in `streaming`; rejects with the session's terminal error.
   */
  async connect(): Promise<void> {
    this.machine.dispatch('connect');
    const { timeouts } = this.config;

    const headers = buildHandshakeHeaders(this.config, { connectId: this.connectId, requestId: this.requestId });
    const connectSignal = withTimeoutSignal({ signal: this.abortController.signal, timeoutMs: timeouts.connectMs });
    let transport: Transport;
    try {
      transport = await abortable(
        this.transportFactory({
          url: this.config.endpoint,
          headers,
          signal: connectSignal.signal,
          pingIntervalMs: this.config.pingIntervalMs,
        }),
        connectSignal.signal,
        (late) => late.close(1000, 'connect abandoned')
      );
    } catch (err) {
      const error = connectSignal.didTimeout()
        ? new StreamingError('connect_timeout', `connection not established within ${timeouts.connectMs}ms`, { cause: err })
        : toStreamingError(err);
      this.terminate(error);
      throw this.failureError(error);
    } finally {
      connectSignal.cleanup();
    }
    this.transport = transport;
    this.log.info({ event: 'asr_connected', endpoint: this.config.endpoint });

    const accepted = new Promise<void>((resolve, reject) => {
      this.pendingAccept = { resolve, reject };
    });
    void accepted.catch(() => undefined);

    try {
      const uid = this.config.uid ?? this.connectId.slice(0, 16);
      await transport.send(encodeFrame(fullRequestFrame(buildFullRequestBody(this.config, uid), this.sequence.next())));
      this.stats.framesSent += 1;
    } catch (err) {
      const error = toStreamingError(err);
      this.terminate(error);
      throw this.failureError(error);
    }
    if (this.machine.isTerminal) {
      throw this.failureError(new StreamingError('aborted', 'session ended while connecting'));
    }

    this.machine.dispatch('request_sent');
    this.ackTimer = setTimeout(() => {
      this.terminate(new StreamingError('ack_timeout', `no acceptance within ${timeouts.ackMs}ms`));
    }, timeouts.ackMs);
    this.consumer = this.runConsumer(transport);

    await accepted;
    this.producer = this.runProducer(transport);
  }

  /** The session outcome, once both the producer and the consumer have stopped. */
  async finished(): Promise<SessionOutcome> {
    const outcome = await this.done;
    await Promise.all([this.producer, this.consumer]);
    return outcome;
  }

  /** Queue captured PCM. Blocks while the hand-off queue is full. */
  async writeAudio(chunk: Buffer): Promise<void> {
    this.machine.assertCanSendAudio();
    if (this.endRequested) {
      throw new StreamingError('invalid_state', 'audio input has already ended');
    }
    try {
      await this.queue.push(chunk);
    } catch (err) {
      // The producer may be parked in a send that never completes; end the session here.
      if (err instanceof StreamingError && err.code === 'capture_starvation') {
        this.terminate(err);
      }
      throw err;
    }
  }

  /**
   * End of input. Audio already queued is still sent, followed by exactly one terminal
   * frame; calling this again, or `stop()`, has no further effect.
   */
  endAudio(): void {
    if (this.endRequested || this.machine.isTerminal) return;
    this.endRequested = true;
    this.log.debug({ event: 'asr_end_of_input', queuedBytes: this.queue.queuedBytes });
    this.queue.end();
  }

  stop(): void {
    this.endAudio();
  }

  /** Forward every chunk of `source`, then end input. */
  async pipeAudio(source: AsyncIterable<Buffer>): Promise<void> {
    try {
      for await (const chunk of source) {
        await this.writeAudio(chunk);
      }
      this.endAudio();
    } catch (err) {
      if (this.machine.isTerminal) return;
      throw err;
    }
  }

  /** Hard cancel: close the connection now and drop any audio not yet sent. */
  abort(reason = 'aborted by caller'): void {
    const error = new StreamingError('aborted', reason);
    this.abortController.abort(error);
    this.terminate(error);
  }

  private async runProducer(transport: Transport): Promise<void> {
    try {
      for (;;) {
        const chunk = await this.queue.shift();
        if (chunk === null) break;
        for (const segment of this.segmenter.push(chunk)) {
          await this.sendSegment(transport, segment);
        }
      }
      const tail = this.segmenter.flush();
      if (tail) await this.sendSegment(transport, tail);
      await this.sendTerminal(transport);
    } catch (err) {
      this.terminate(toStreamingError(err));
    }
  }

  private async sendSegment(transport: Transport, segment: AudioSegment): Promise<void> {
    this.machine.assertCanSendAudio();
    const sequence = this.sequence.next();
    await transport.send(encodeFrame(audioFrame(segment.pcm, sequence, this.config.audio.compress)));
    this.stats.framesSent += 1;
    this.stats.audioBytesSent += segment.pcm.length;
    if (!this.machine.isTerminal) this.machine.dispatch('audio_sent');
    this.log.trace({ event: 'asr_segment_sent', sequence, index: segment.index, samples: segment.samples });
  }

  private async sendTerminal(transport: Transport): Promise<void> {
    if (this.terminalSent || this.machine.isTerminal) return;
    this.terminalSent = true;
    const sequence = this.sequence.finalize();
    // Move first so a final acknowledgement racing the send callback is recognised.
    this.machine.dispatch('end_of_input');
    await transport.send(encodeFrame(audioFrame(Buffer.alloc(0), sequence, this.config.audio.compress)));
    this.stats.framesSent += 1;
    this.log.info({ event: 'asr_terminal_sent', sequence, framesSent: this.stats.framesSent });
    if (this.machine.state === 'finalizing') {
      const finalMs = this.config.timeouts.finalMs;
      this.finalTimer = setTimeout(() => {
        this.terminate(new StreamingError('final_timeout', `no final acknowledgement within ${finalMs}ms`));
      }, finalMs);
    }
  }

  private async runConsumer(transport: Transport): Promise<void> {
    try {
      for (;;) {
        const message = await transport.receive();
        if (message === null) {
          this.terminate(new StreamingError('transport_closed', 'connection closed by the server'));
          return;
        }
        this.handleMessage(message);
        if (this.machine.isTerminal) return;
      }
    } catch (err) {
      this.terminate(toStreamingError(err));
    }
  }

  private handleMessage(message: Buffer): void {
    this.stats.framesReceived += 1;
    const decoded = decodeFrame(message);
    if (!decoded.ok) {
      this.stats.framesDropped += 1;
      this.log.warn({ event: 'asr_frame_dropped', code: decoded.error.code, message: decoded.error.message });
      return;
    }
    const { frame } = decoded;
    const payload = decodePayload(frame);
    if (!payload.ok && frame.messageType !== 'error_response') {
      this.stats.framesDropped += 1;
      this.log.warn({
        event: 'asr_frame_dropped',
        code: payload.error.code,
        message: payload.error.message,
        sequence: frame.sequence,
      });
      return;
    }

    const classification = classifyResponse(frame, payload.ok ? payload.value : null, this.machine.state);
    switch (classification.kind) {
      case 'acceptance':
        this.clearTimer('ack');
        this.machine.dispatch('accepted');
        this.log.info({ event: 'asr_accepted', sequence: classification.sequence });
        this.pendingAccept?.resolve();
        this.pendingAccept = null;
        break;
      case 'result':
        this.emitResult(classification.result);
        break;
      case 'final_ack':
        if (classification.result) this.emitResult(classification.result);
        this.clearTimer('final');
        this.machine.dispatch('final_ack');
        this.complete();
        break;
      case 'server_error': {
        const reason: FailureReason = this.machine.state === 'awaiting_ack' ? 'rejected' : 'server_error';
        this.terminate(
          new StreamingError(reason, `${classification.message} (code ${classification.code})`, {
            serverCode: classification.code,
          })
        );
        break;
      }
      case 'malformed':
        this.stats.framesDropped += 1;
        this.log.warn({ event: 'asr_frame_dropped', code: classification.error.code, message: classification.error.message });
        break;
      case 'ignored':
        this.log.debug({ event: 'asr_frame_ignored', reason: classification.reason, sequence: frame.sequence });
        break;
    }
  }

  private emitResult(result: RecognitionResult): void {
    const signature = `${result.isFinal ? 'final' : 'interim'}:${result.text}`;
    if (signature === this.lastTranscriptSignature) return;
    this.lastTranscriptSignature = signature;
    this.lastText = result.text;
    this.stats.resultsEmitted += 1;
    this.notify(this.listeners.result, result, 'asr_result_listener_error');
  }

  private complete(): void {
    this.transport?.close(1000, 'session complete');
    this.log.info({ event: 'asr_session_complete', results: this.stats.resultsEmitted, framesSent: this.stats.framesSent });
    this.settle({
      ok: true,
      finalText: this.lastText,
      results: this.stats.resultsEmitted,
      endedAt: new Date().toISOString(),
    });
  }

  private terminate(error: StreamingError): void {
    if (this.outcome) return;
    this.machine.fail();
    this.clearTimer('ack');
    this.clearTimer('final');
    this.queue.fail(error);
    this.transport?.close(1000, error.code);
    this.pendingAccept?.reject(this.failureError(error));
    this.pendingAccept = null;
    const reason: FailureReason = error.code === 'invalid_state' ? 'aborted' : error.code;
    this.log.error({ event: 'asr_session_failed', reason, message: error.message, serverCode: error.serverCode });
    this.settle({
      ok: false,
      reason,
      message: error.message,
      ...(error.serverCode !== undefined ? { serverCode: error.serverCode } : {}),
      endedAt: new Date().toISOString(),
    });
  }

  /** The error that ended the session, preferring the first recorded failure. */
  private failureError(fallback: StreamingError): StreamingError {
    if (this.outcome && !this.outcome.ok) {
      return new StreamingError(this.outcome.reason, this.outcome.message, { serverCode: this.outcome.serverCode });
    }
    return fallback;
  }

  private settle(outcome: SessionOutcome): void {
    if (this.outcome) return;
    this.outcome = outcome;
    this.resolveDone(outcome);
    this.notify(this.listeners.outcome, outcome, 'asr_outcome_listener_error');
  }

  /** Listener failures are logged and never reach the engine's own control flow. */
  private notify<T>(listeners: ((value: T) => void)[], value: T, event: string): void {
    listeners.forEach((cb) => {
      try {
        cb(value);
      } catch (err) {
        this.log.error({ event, message: (err as Error).message });
      }
    });
  }

  private clearTimer(which: 'ack' | 'final'): void {
    if (which === 'ack' && this.ackTimer) {
      clearTimeout(this.ackTimer);
      this.ackTimer = null;
    }
    if (which === 'final' && this.finalTimer) {
      clearTimeout(this.finalTimer);
      this.finalTimer = null;
    }
  }
}
