import { resolve } from 'node:path';
import { DEFAULT_DATABASE_FILE } from './constants.js';
import { parseStrictPositiveInteger } from './parsing.js';
import type { CliConfig, CliIo } from './types.js';

export type ConfigResolution =
  | {
      ok: true;
      config: CliConfig;
    }
  | {
      ok: false;
      message: string;
    };

function readSetting(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value && value.length > 0 ? value : undefined;
}

export function resolveDatabasePath(io: Pick<CliIo, 'cwd' | 'env'>): string {
  return resolve(io.cwd, readSetting(io.env, 'TRELLIS_DB_PATH') ?? DEFAULT_DATABASE_FILE);
}

export function resolveCliConfig(io: Pick<CliIo, 'cwd' | 'env'>): ConfigResolution {
  const config: CliConfig = {
    databasePath: resolveDatabasePath(io),
  };

  for (const [name, key] of [
    ['TRELLIS_MAX_STEPS', 'maxSteps'],
    ['TRELLIS_NODE_TIMEOUT_MS', 'nodeTimeoutMs'],
  ] as const) {
    const raw = readSetting(io.env, name);
    if (raw === undefined) {
      continue;
    }

    const parsed = parseStrictPositiveInteger(raw);
    if (parsed === null) {
      return {
        ok: false,
        message: `Invalid ${name} "${raw}". Expected a positive integer.`,
      };
    }
    config[key] = parsed;
  }

  const model = readSetting(io.env, 'TRELLIS_MODEL');
  if (model !== undefined) {
    config.model = model;
  }

  return { ok: true, config };
}
