import { InvalidArgumentError } from 'commander';
import type { AppConfig } from '../types/config.types.js';
import type { ContextEngine } from '../context/contextEngine.js';
import { loadConfig } from '../config/loader.js';
import { createContextEngine } from '../context/index.js';
import { setLogLevel } from '../logging/logger.js';

/** Commander argument parser for counts such as `--top` and `--before`. */
export function parseCount(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

export function openEngine(): { config: AppConfig; engine: ContextEngine } {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  return { config, engine: createContextEngine(config) };
}

/** Runs one command against a fresh engine and always disposes it. */
export async function withEngine<T>(fn: (engine: ContextEngine, config: AppConfig) => Promise<T>): Promise<T> {
  const { config, engine } = openEngine();
  try {
    return await fn(engine, config);
  } finally {
    await engine.dispose();
  }
}

export function waitForShutdown(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

export function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}
