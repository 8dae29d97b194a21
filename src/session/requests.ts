import type { SessionConfig } from '../config.js';
import { encodePayload } from '../protocol/payload.js';
import type { FullRequestBody, RequestFrame } from '../types.js';
import { PROTOCOL_VERSION } from '../protocol/constants.js';

export function buildFullRequestBody(config: SessionConfig, uid: string): FullRequestBody {
  const { audio, features } = config;
  return {
    user: { uid },
    audio: {
      format: 'pcm',
      codec: 'raw',
      rate: audio.sampleRate,
      bits: audio.bits,
      channel: audio.channels,
    },
    request: {
      model_name: features.modelName,
      enable_itn: features.itn,
      enable_punc: features.punctuation,
      enable_ddc: features.ddc,
      show_utterances: features.utterances,
      result_type: features.resultType,
      ...(features.endpointDetection ? { end_window_size: features.endWindowSizeMs } : {}),
    },
  };
}

/** Handshake headers; configured extras win over the generated ones. */
export function buildHandshakeHeaders(
  config: SessionConfig,
  ids: { connectId: string; requestId: string }
): Record<string, string> {
  return {
    'X-Api-App-Key': config.auth.appKey,
    'X-Api-Access-Key': config.auth.accessKey,
    'X-Api-Resource-Id': config.auth.resourceId,
    'X-Api-Request-Id': ids.requestId,
    'X-Api-Connect-Id': ids.connectId,
    ...config.auth.extraHeaders,
  };
}

export function fullRequestFrame(body: FullRequestBody, sequence: number): RequestFrame {
  return {
    version: PROTOCOL_VERSION,
    messageType: 'full_request',
    serialization: 'json',
    compression: 'gzip',
    sequence,
    last: false,
    payload: encodePayload(body, 'json', 'gzip'),
  };
}

export function audioFrame(pcm: Buffer, sequence: number, compress: boolean): RequestFrame {
  const compression = compress ? 'gzip' : 'none';
  return {
    version: PROTOCOL_VERSION,
    messageType: 'audio_only_request',
    serialization: 'raw',
    compression,
    sequence,
    last: sequence < 0,
    payload: encodePayload(pcm, 'raw', compression),
  };
}

