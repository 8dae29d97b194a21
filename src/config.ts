import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

export const DEFAULT_ENDPOINT = 'wss://openspeech.bytedance.com/api/v3/sauc/bigmodel_async';
export const DEFAULT_RESOURCE_ID = 'volc.seedasr.sauc.duration';

const authSchema = z.object({
  appKey: z.string().min(1),
  accessKey: z.string().min(1),
  resourceId: z.string().min(1).default(DEFAULT_RESOURCE_ID),
  /** Fixed connection id; a fresh UUID is generated per session when omitted. */
  connectId: z.string().min(1).optional(),
  extraHeaders: z.record(z.string()).default({}),
});

const audioSchema = z
  .object({
    sampleRate: z.number().int().min(8_000).max(48_000).default(16_000),
    channels: z.number().int().min(1).max(2).default(1),
    bits: z.literal(16).default(16),
    segmentDurationMs: z.number().int().min(20).max(1_000).default(200),
    compress: z.boolean().default(true),
  })
  .superRefine((val, ctx) => {
    if ((val.segmentDurationMs * val.sampleRate) % 1000 !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'segmentDurationMs must cover a whole number of samples at sampleRate',
        path: ['segmentDurationMs'],
      });
    }
  });

const featuresSchema = z.object({
  modelName: z.string().min(1).default('bigmodel'),
  itn: z.boolean().default(true),
  punctuation: z.boolean().default(true),
  ddc: z.boolean().default(false),
  utterances: z.boolean().default(true),
  endpointDetection: z.boolean().default(false),
  endWindowSizeMs: z.number().int().min(200).max(10_000).default(800),
  resultType: z.enum(['full', 'single']).default('full'),
});

const timeoutsSchema = z.object({
  connectMs: z.number().int().min(1).default(10_000),
  ackMs: z.number().int().min(1).default(5_000),
  finalMs: z.number().int().min(1).default(10_000),
  pushMs: z.number().int().min(1).default(1_000),
});

const queueSchema = z.object({
  maxBytes: z.number().int().min(1_024).max(100 * 1024 * 1024).default(256 * 1024),
  maxPushTimeouts: z.number().int().min(1).max(100).default(3),
});

export const sessionConfigSchema = z.object({
  endpoint: z.string().url().default(DEFAULT_ENDPOINT),
  uid: z.string().min(1).optional(),
  auth: authSchema,
  audio: audioSchema.default({}),
  features: featuresSchema.default({}),
  timeouts: timeoutsSchema.default({}),
  queue: queueSchema.default({}),
  pingIntervalMs: z.number().int().min(0).default(20_000),
});

export type SessionConfig = z.infer<typeof sessionConfigSchema>;
export type SessionConfigInput = z.input<typeof sessionConfigSchema>;

export function parseSessionConfig(input: unknown): SessionConfig {
  return sessionConfigSchema.parse(input);
}

/** Config from `ASR_*` variables, for callers that keep credentials in the environment. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): SessionConfig {
  return parseSessionConfig({
    endpoint: env.ASR_WS_URL || undefined,
    auth: {
      appKey: env.ASR_APP_KEY,
      accessKey: env.ASR_ACCESS_KEY,
      resourceId: env.ASR_RESOURCE_ID || undefined,
    },
  });
}

let cachedConfig: SessionConfig | null = null;

export async function loadConfig(configPath = path.resolve('asr.config.json')): Promise<SessionConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const raw = await readFile(configPath, 'utf-8');
  cachedConfig = parseSessionConfig(JSON.parse(raw));
  return cachedConfig;
}

export function reloadConfig(): void {
  cachedConfig = null;
}
