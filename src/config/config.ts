import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { MuseConfigSchema, type MuseConfig } from './schema.js';
import * as log from '../utils/logger.js';

export interface LoadConfigOptions {
  cwd?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Record<string, unknown>;
}

/**
 * Load config with priority: overrides > env vars > muse.yaml > muse.json > user json > defaults
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<MuseConfig> {
  const cwd = opts.cwd ?? '.';
  const env = opts.env ?? process.env;
  const home = opts.home ?? env.HOME ?? env.USERPROFILE ?? '';

  const userConfig = await loadFile(resolve(home, '.muse', 'config.json'), 'json');
  const workspaceJson = await loadFile(resolve(cwd, 'muse.json'), 'json');
  const workspaceYaml = await loadFile(resolve(cwd, 'muse.yaml'), 'yaml');
  const envConfig = loadEnvVars(env);

  const merged = deepMerge(userConfig, workspaceJson, workspaceYaml, envConfig, opts.overrides ?? {});

  return MuseConfigSchema.parse(merged);
}

export function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  if (env.TELEGRAM_BOT_TOKEN) {
    result.telegram = { token: env.TELEGRAM_BOT_TOKEN };
  }

  if (env.OPENAI_API_KEY || env.OPENAI_ORGANIZATION) {
    result.worker = {
      ...(env.OPENAI_API_KEY ? { apiKey: env.OPENAI_API_KEY } : {}),
      ...(env.OPENAI_ORGANIZATION ? { organization: env.OPENAI_ORGANIZATION } : {}),
    };
  }

  if (env.MUSE_OUTPUTS_DIR) {
    result.outputs = { dir: env.MUSE_OUTPUTS_DIR };
  }

  return result;
}

async function loadFile(path: string, format: 'json' | 'yaml'): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return {};
  }

  const parsed: unknown = format === 'json' ? JSON.parse(content) : parseYaml(content);
  if (!isRecord(parsed)) {
    log.warn(`Config: ignoring ${path}, top level is not an object`);
    return {};
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(...objects: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const obj of objects) {
    for (const [key, value] of Object.entries(obj)) {
      const existing = result[key];
      if (isRecord(value) && isRecord(existing)) {
        result[key] = deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}
