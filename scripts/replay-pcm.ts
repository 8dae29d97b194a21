#!/usr/bin/env node

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import process from 'node:process';
import { StreamingEngine } from '../src/session/streamingEngine.js';
import { logger } from '../src/logger.js';
import { loadEnvironment, resolveSessionConfig } from '../src/utils/env.js';

type ParsedArgs = {
  help: boolean;
  file?: string;
  config?: string;
  env?: string;
  chunkMs: number;
  realtime: boolean;
};

const USAGE = `
Stream a raw PCM file (s16le) to the recognition service and print results

Usage:
  npx tsx scripts/replay-pcm.ts --file <path> [options]

Options:
  --file <path>        PCM file to stream (required)
  --config <path>      Session config JSON (default: asr.config.json, else ASR_* env)
  --env <path>         dotenv file with ASR_* credentials (default: .env)
  --chunk-ms <ms>      Capture chunk size (default: 100)
  --no-realtime        Send as fast as the queue accepts instead of pacing
  --help               Show this message
`;

function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = { help: false, chunkMs: 100, realtime: true };

  for (let index = 0; index < argv.length; index += 1) {
    const raw = argv[index];
    if (!raw.startsWith('--')) {
      continue;
    }
    const [flag, inlineValue] = raw.includes('=') ? raw.split(/=(.*)/s) : [raw, undefined];
    const getValue = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const next = argv[index + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`${flag} requires a value`);
      }
      index += 1;
      return next;
    };

    switch (flag) {
      case '--help':
        result.help = true;
        break;
      case '--file':
        result.file = getValue();
        break;
      case '--config':
        result.config = getValue();
        break;
      case '--env':
        result.env = getValue();
        break;
      case '--chunk-ms': {
        const value = Number(getValue());
        if (!Number.isInteger(value) || value <= 0) {
          throw new Error(`--chunk-ms must be a positive integer, got ${value}`);
        }
        result.chunkMs = value;
        break;
      }
      case '--no-realtime':
        result.realtime = false;
        break;
      default:
        console.warn(`Unknown option: ${flag}`);
        break;
    }
  }

  return result;
}

async function* chunks(pcm: Buffer, chunkBytes: number, pauseMs: number): AsyncGenerator<Buffer> {
  for (let offset = 0; offset < pcm.length; offset += chunkBytes) {
    yield pcm.subarray(offset, offset + chunkBytes);
    if (pauseMs > 0) await sleep(pauseMs);
  }
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help || !args.file) {
    console.log(USAGE);
    return args.help ? 0 : 1;
  }

  loadEnvironment(args.env);
  const config = await resolveSessionConfig({ configPath: args.config });
  const pcm = await readFile(resolve(process.cwd(), args.file));
  const { sampleRate, channels, bits } = config.audio;
  const chunkBytes = ((sampleRate * args.chunkMs) / 1000) * channels * (bits / 8);

  const engine = new StreamingEngine({ config });
  engine.onResult((result) => {
    console.log(`${result.isFinal ? '[final]  ' : '[interim]'} ${result.text}`);
  });
  process.once('SIGINT', () => engine.abort('interrupted'));

  const startedAt = Date.now();
  await engine.connect();
  await engine.pipeAudio(chunks(pcm, chunkBytes, args.realtime ? args.chunkMs : 0));
  const outcome = await engine.finished();

  logger.info({
    event: 'replay_done',
    file: args.file,
    elapsedMs: Date.now() - startedAt,
    audioMs: Math.round((pcm.length / (sampleRate * channels * (bits / 8))) * 1000),
    ...engine.stats,
  });
  if (!outcome.ok) {
    console.error(`session failed: ${outcome.reason}: ${outcome.message}`);
    return 1;
  }
  console.log(outcome.finalText);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
