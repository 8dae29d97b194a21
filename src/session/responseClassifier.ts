import { ProtocolError } from '../errors.js';
import type { Frame, RecognitionResult, SessionState, Utterance } from '../types.js';
import { errorBodySchema, responseBodySchema } from '../validation.js';
import type { ResponseBody, ResponseResult } from '../validation.js';

/** `code` values the service uses for "no error" in a response body. */
export const SUCCESS_CODES: ReadonlySet<number> = new Set<number>([0, 20_000_000]);

export type Classification =
  | { kind: 'acceptance'; sequence: number | null }
  | { kind: 'result'; result: RecognitionResult }
  | { kind: 'final_ack'; result: RecognitionResult | null }
  | { kind: 'server_error'; code: number; message: string }
  | { kind: 'malformed'; error: ProtocolError }
  | { kind: 'ignored'; reason: string };

function pickResult(body: ResponseBody): ResponseResult | undefined {
  if (Array.isArray(body.result)) return body.result[0];
  return body.result;
}

function toUtterances(result: ResponseResult | undefined): Utterance[] | undefined {
  if (!result?.utterances?.length) return undefined;
  return result.utterances.map((utt) => ({
    text: utt.text ?? '',
    startMs: utt.start_time,
    endMs: utt.end_time,
    definite: utt.definite ?? false,
  }));
}

function isTerminalFrame(frame: Frame): boolean {
  return frame.last || (frame.sequence !== null && frame.sequence < 0);
}

export function buildRecognitionResult(frame: Frame, body: ResponseBody, now = Date.now()): RecognitionResult | null {
  const result = pickResult(body);
  const utterances = toUtterances(result);
  const joined = utterances?.map((utt) => utt.text).join('');
  const text = joined || result?.text || '';
  if (text.trim().length === 0) return null;
  const lastUtterance = utterances?.[utterances.length - 1];
  const isFinal = isTerminalFrame(frame) || lastUtterance?.definite === true;
  return Object.freeze({
    text,
    isFinal,
    ...(utterances ? { utterances: Object.freeze(utterances.map((utt) => Object.freeze(utt))) } : {}),
    ...(body.audio_info?.duration !== undefined ? { audioDurationMs: body.audio_info.duration } : {}),
    sequence: frame.sequence,
    receivedAt: now,
  });
}

function describeServerError(body: unknown, code: number): string {
  if (typeof body === 'string' && body.trim()) return body.trim();
  if (Buffer.isBuffer(body) && body.length > 0) return body.toString('utf8');
  const parsed = errorBodySchema.safeParse(body);
  if (parsed.success) {
    const text = parsed.data.message ?? parsed.data.error;
    if (text) return text;
  }
  return `server error ${code}`;
}

/**
 * Decide what an inbound frame means for a session in `state`. `body` is the frame's
 * decoded payload (parsed JSON, or the raw bytes for raw serialization).
 */
export function classifyResponse(frame: Frame, body: unknown, state: SessionState): Classification {
  if (frame.messageType === 'error_response') {
    return { kind: 'server_error', code: frame.errorCode, message: describeServerError(body, frame.errorCode) };
  }
  if (frame.messageType !== 'full_response') {
    return { kind: 'ignored', reason: `unexpected ${frame.messageType} from server` };
  }

  if (Buffer.isBuffer(body) && body.length > 0) {
    return { kind: 'ignored', reason: 'raw full_response payload' };
  }
  const parsed = responseBodySchema.safeParse(body === null || Buffer.isBuffer(body) ? {} : body);
  if (!parsed.success) {
    return {
      kind: 'malformed',
      error: new ProtocolError('malformed_payload', `unexpected response body: ${parsed.error.message}`, { frame }),
    };
  }
  const payload = parsed.data;
  if (payload.code !== undefined && !SUCCESS_CODES.has(payload.code)) {
    return { kind: 'server_error', code: payload.code, message: payload.message ?? `server error ${payload.code}` };
  }

  switch (state) {
    case 'awaiting_ack':
      return { kind: 'acceptance', sequence: frame.sequence };
    case 'streaming': {
      const result = buildRecognitionResult(frame, payload);
      return result ? { kind: 'result', result } : { kind: 'ignored', reason: 'empty result' };
    }
    case 'finalizing': {
      const result = buildRecognitionResult(frame, payload);
      if (isTerminalFrame(frame)) return { kind: 'final_ack', result };
      return result ? { kind: 'result', result } : { kind: 'ignored', reason: 'empty result' };
    }
    default:
      return { kind: 'ignored', reason: `response in state ${state}` };
  }
}
