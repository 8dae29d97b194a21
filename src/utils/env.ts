import { access } from 'node:fs/promises';
import path from 'node:path';
import dotenv from 'dotenv';
import { configFromEnv, loadConfig } from '../config.js';
import type { SessionConfig } from '../config.js';

const DEFAULT_ENV_PATH = path.resolve('.env');

/** Load `ASR_*` credentials from a dotenv file; a missing file is not an error. */
export function loadEnvironment(envPath = DEFAULT_ENV_PATH): void {
  const resolved = path.resolve(envPath);
  const result = dotenv.config({ path: resolved, override: true });
  if (result.error && (result.error as NodeJS.ErrnoException).code !== 'ENOENT') {
    throw result.error;
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Session config for command-line use: the JSON config file when present, otherwise the
 * `ASR_*` environment variables. Credentials from the environment override the file's.
 */
export async function resolveSessionConfig(
  options: { configPath?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<SessionConfig> {
  const env = options.env ?? process.env;
  const configPath = path.resolve(options.configPath ?? 'asr.config.json');
  if (!(await exists(configPath))) {
    return configFromEnv(env);
  }
  const config = await loadConfig(configPath);
  return {
    ...config,
    endpoint: env.ASR_WS_URL || config.endpoint,
    auth: {
      ...config.auth,
      appKey: env.ASR_APP_KEY || config.auth.appKey,
      accessKey: env.ASR_ACCESS_KEY || config.auth.accessKey,
      resourceId: env.ASR_RESOURCE_ID || config.auth.resourceId,
    },
  };
}
