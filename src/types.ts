export const MESSAGE_TYPES = [
  'full_request',
  'audio_only_request',
  'full_response',
  'error_response',
] as const;
export type MessageType = (typeof MESSAGE_TYPES)[number];

export const SERIALIZATION_KINDS = ['raw', 'json'] as const;
export type SerializationKind = (typeof SERIALIZATION_KINDS)[number];

export const COMPRESSION_KINDS = ['none', 'gzip'] as const;
export type CompressionKind = (typeof COMPRESSION_KINDS)[number];

interface FrameBase {
  version: number;
  serialization: SerializationKind;
  compression: CompressionKind;
  /** Signed; negative marks the terminal frame. `null` when the frame carries no sequence field. */
  sequence: number | null;
  last: boolean;
  event?: number;
  payload: Buffer;
}

export interface RequestFrame extends FrameBase {
  messageType: 'full_request' | 'audio_only_request';
}

export interface ResponseFrame extends FrameBase {
  messageType: 'full_response';
}

export interface ErrorFrame extends FrameBase {
  messageType: 'error_response';
  errorCode: number;
}

export type Frame = RequestFrame | ResponseFrame | ErrorFrame;

export interface AudioSegment {
  /** 0-based position in capture order. */
  index: number;
  samples: number;
  pcm: Buffer;
}

export interface Utterance {
  text: string;
  startMs?: number;
  endMs?: number;
  definite: boolean;
}

export interface RecognitionResult {
  readonly text: string;
  readonly isFinal: boolean;
  readonly utterances?: readonly Utterance[];
  readonly audioDurationMs?: number;
  readonly sequence: number | null;
  readonly receivedAt: number;
}

export const SESSION_STATES = [
  'idle',
  'connecting',
  'awaiting_ack',
  'streaming',
  'finalizing',
  'closed',
  'errored',
] as const;
export type SessionState = (typeof SESSION_STATES)[number];

export type SessionEvent =
  | 'connect'
  | 'request_sent'
  | 'accepted'
  | 'audio_sent'
  | 'end_of_input'
  | 'final_ack'
  | 'fail';

export interface StateTransition {
  from: SessionState;
  to: SessionState;
  event: SessionEvent;
}

export type FailureReason =
  | 'transport_closed'
  | 'connect_timeout'
  | 'ack_timeout'
  | 'final_timeout'
  | 'capture_starvation'
  | 'server_error'
  | 'rejected'
  | 'aborted';

export type SessionOutcome =
  | {
      ok: true;
      finalText: string;
      results: number;
      endedAt: string;
    }
  | {
      ok: false;
      reason: FailureReason;
      message: string;
      serverCode?: number;
      endedAt: string;
    };

/** JSON body of the first request; field names are fixed by the service. */
export interface FullRequestBody {
  user: { uid: string };
  audio: {
    format: 'pcm';
    codec: 'raw';
    rate: number;
    bits: number;
    channel: number;
  };
  request: {
    model_name: string;
    enable_itn: boolean;
    enable_punc: boolean;
    enable_ddc: boolean;
    show_utterances: boolean;
    result_type: 'full' | 'single';
    end_window_size?: number;
  };
}

export interface Transport {
  /** Resolves once the bytes have been handed to the socket. */
  send(data: Buffer): Promise<void>;
  /** Next inbound message in arrival order; `null` once the connection has closed cleanly. */
  receive(): Promise<Buffer | null>;
  close(code?: number, reason?: string): void;
}

export interface TransportConnectOptions {
  url: string;
  headers: Record<string, string>;
  /** Aborts the connection attempt (connect timeout or caller cancellation). */
  signal?: AbortSignal;
  pingIntervalMs?: number;
}

export type TransportFactory = (opts: TransportConnectOptions) => Promise<Transport>;
