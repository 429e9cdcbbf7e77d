import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig } from '../../../src/config/loader.js';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { ConfigValidationError } from '../../../src/config/validator.js';

describe('loadConfig', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'code-atlas-config-'));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  it('returns default config when no file or env overrides exist', () => {
    const config = loadConfig(cwd, {});
    expect(config.embedding.provider).toBe('auto');
    expect(config.chunking.windowLines).toBe(50);
    expect(config.chunking.overlapLines).toBe(12);
    expect(config.watch.debounceMs).toBe(500);
    expect(config.topology.clusterThreshold).toBe(0.7);
    expect(config.dataDir).toBe(DEFAULT_CONFIG.dataDir);
    expect(config.logLevel).toBe('info');
  });

  it('deep-merges .code-atlas.json over defaults', () => {
    writeFileSync(
      join(cwd, '.code-atlas.json'),
      JSON.stringify({ chunking: { windowLines: 80 }, embedding: { models: { openai: 'text-embedding-3-large' } } }),
    );
    const config = loadConfig(cwd, {});
    expect(config.chunking.windowLines).toBe(80);
    expect(config.chunking.overlapLines).toBe(12);
    expect(config.embedding.models.openai).toBe('text-embedding-3-large');
    expect(config.embedding.timeoutMs).toBe(DEFAULT_CONFIG.embedding.timeoutMs);
  });

  it('reads code-atlas.config.json when the dotfile is absent', () => {
    writeFileSync(join(cwd, 'code-atlas.config.json'), JSON.stringify({ store: 'memory' }));
    expect(loadConfig(cwd, {}).store).toBe('memory');
  });

  it('environment overrides win over the config file', () => {
    writeFileSync(join(cwd, '.code-atlas.json'), JSON.stringify({ watch: { debounceMs: 100 } }));
    const config = loadConfig(cwd, {
      CODE_ATLAS_DEBOUNCE_MS: '250',
      CODE_ATLAS_EMBEDDING_PROVIDER: 'voyage',
      CODE_ATLAS_VOYAGE_MODEL: 'voyage-code-3',
      CODE_ATLAS_CLUSTER_THRESHOLD: '0.8',
      CODE_ATLAS_LOG_LEVEL: 'debug',
      CODE_ATLAS_DATA_DIR: '/var/lib/atlas',
    });
    expect(config.watch.debounceMs).toBe(250);
    expect(config.embedding.provider).toBe('voyage');
    expect(config.embedding.models.voyage).toBe('voyage-code-3');
    expect(config.topology.clusterThreshold).toBe(0.8);
    expect(config.logLevel).toBe('debug');
    expect(config.dataDir).toBe('/var/lib/atlas');
  });

  it('OLLAMA_HOST without a scheme gets http://', () => {
    expect(loadConfig(cwd, { OLLAMA_HOST: 'gpu-box:11434' }).embedding.ollamaBaseUrl).toBe('http://gpu-box:11434');
    expect(loadConfig(cwd, { OLLAMA_HOST: 'https://ollama.internal' }).embedding.ollamaBaseUrl).toBe(
      'https://ollama.internal',
    );
  });

  it('rejects an unknown provider name from the environment', () => {
    expect(() => loadConfig(cwd, { CODE_ATLAS_EMBEDDING_PROVIDER: 'cohere' })).toThrow(ConfigValidationError);
  });

  it('rejects a non-numeric debounce', () => {
    expect(() => loadConfig(cwd, { CODE_ATLAS_DEBOUNCE_MS: 'soon' })).toThrow(/watch\.debounceMs/);
  });

  it('reports malformed JSON in the config file', () => {
    writeFileSync(join(cwd, '.code-atlas.json'), '{ not json');
    expect(() => loadConfig(cwd, {})).toThrow(ConfigValidationError);
  });
});
