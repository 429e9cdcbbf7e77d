import type { AppConfig } from '../types/config.types.js';
import { DEFAULT_CONFIG, PROVIDER_PRIORITY } from './defaults.js';
import { ConfigValidationError, validateConfig } from './validator.js';
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue;
    const current = result[key];
    result[key] = isPlainObject(val) && isPlainObject(current) ? deepMerge(current, val) : val;
  }
  return result;
}

export const CONFIG_FILE_NAMES = ['.code-atlas.json', 'code-atlas.config.json'] as const;

function loadFileConfig(cwd: string): PlainObject {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(cwd, name);
    if (!existsSync(candidate)) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(candidate, 'utf-8'));
    } catch (err) {
      throw new ConfigValidationError(
        `Could not parse ${candidate}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigValidationError(`${candidate} must contain a JSON object.`);
    }
    return parsed;
  }
  return {};
}

function parseNumber(value: string): number {
  return value.trim() === '' ? Number.NaN : Number(value);
}

function loadEnvOverrides(env: NodeJS.ProcessEnv): PlainObject {
  const overrides: PlainObject = {};

  const dataDir = env['CODE_ATLAS_DATA_DIR'];
  if (dataDir) overrides['dataDir'] = dataDir;

  const logLevel = env['CODE_ATLAS_LOG_LEVEL'];
  if (logLevel) overrides['logLevel'] = logLevel;

  const embedding: PlainObject = {};
  const provider = env['CODE_ATLAS_EMBEDDING_PROVIDER'];
  if (provider) embedding['provider'] = provider;

  const models: PlainObject = {};
  for (const name of PROVIDER_PRIORITY) {
    const model = env[`CODE_ATLAS_${name.toUpperCase()}_MODEL`];
    if (model) models[name] = model;
  }
  if (Object.keys(models).length > 0) embedding['models'] = models;

  const ollamaHost = env['OLLAMA_HOST'];
  if (ollamaHost) {
    embedding['ollamaBaseUrl'] = /^https?:\/\//.test(ollamaHost) ? ollamaHost : `http://${ollamaHost}`;
  }
  if (Object.keys(embedding).length > 0) overrides['embedding'] = embedding;

  const debounce = env['CODE_ATLAS_DEBOUNCE_MS'];
  if (debounce) overrides['watch'] = { debounceMs: parseNumber(debounce) };

  const clusterThreshold = env['CODE_ATLAS_CLUSTER_THRESHOLD'];
  if (clusterThreshold) overrides['topology'] = { clusterThreshold: parseNumber(clusterThreshold) };

  return overrides;
}

/**
 * Defaults, then the first config file found in `cwd`, then environment
 * overrides. The merged result is validated before it is returned.
 */
export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): AppConfig {
  const defaults: PlainObject = { ...DEFAULT_CONFIG };
  let merged = deepMerge(defaults, loadFileConfig(cwd));
  merged = deepMerge(merged, loadEnvOverrides(env));
  return validateConfig(merged);
}
