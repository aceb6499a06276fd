import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError } from '../../src/domain/index.js';
import {
  loadRuntimeConfig,
  loadVocabulary,
  parseLogLevel,
} from '../../src/infrastructure/config/index.js';

describe('loadRuntimeConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadRuntimeConfig({})).toEqual({ logLevel: 'info', vocabularyPath: undefined, outputDir: '.' });
  });

  it('reads every variable', () => {
    const config = loadRuntimeConfig({
      LOG_LEVEL: 'debug',
      CB_VOCABULARY_PATH: '/etc/cblog/vocabulary.json',
      CB_OUTPUT_DIR: 'out',
    });
    expect(config).toEqual({ logLevel: 'debug', vocabularyPath: '/etc/cblog/vocabulary.json', outputDir: 'out' });
  });

  it('treats empty strings as unset', () => {
    expect(loadRuntimeConfig({ LOG_LEVEL: '', CB_OUTPUT_DIR: '' })).toEqual({
      logLevel: 'info',
      vocabularyPath: undefined,
      outputDir: '.',
    });
  });

  it('throws ConfigError for an unknown log level', () => {
    expect(() => loadRuntimeConfig({ LOG_LEVEL: 'loud' })).toThrow(ConfigError);
    expect(() => loadRuntimeConfig({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid environment: LOG_LEVEL/);
  });
});

describe('parseLogLevel', () => {
  it('accepts pino levels', () => {
    expect(parseLogLevel('warn')).toBe('warn');
    expect(parseLogLevel('silent')).toBe('silent');
  });

  it('rejects anything else', () => {
    expect(() => parseLogLevel('loud')).toThrow(ConfigError);
  });
});

describe('loadVocabulary', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir !== undefined) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  async function writeTemp(name: string, content: string): Promise<string> {
    dir = await mkdtemp(join(process.cwd(), '.tmp-test-'));
    const path = join(dir, name);
    await writeFile(path, content, 'utf-8');
    return path;
  }

  it('loads the bundled vocabulary', () => {
    const vocabulary = loadVocabulary();
    expect(vocabulary.categories.has('cmpctblock')).toBe(true);
    expect(vocabulary.categories.has('net')).toBe(true);
    expect(vocabulary.threads.has('msghand')).toBe(true);
    expect(vocabulary.numberedThreadPrefixes).toEqual(['scriptch', 'httpworker']);
  });

  it('defaults optional lists to empty', async () => {
    const path = await writeTemp('vocab.json', JSON.stringify({ categories: ['net'] }));
    const vocabulary = loadVocabulary(path);
    expect([...vocabulary.categories]).toEqual(['net']);
    expect(vocabulary.threads.size).toBe(0);
    expect(vocabulary.numberedThreadPrefixes).toEqual([]);
  });

  it('throws ConfigError for a missing file', () => {
    const path = join(process.cwd(), 'does-not-exist.json');
    expect(() => loadVocabulary(path)).toThrow(`Cannot read vocabulary file ${path}`);
  });

  it('throws ConfigError for invalid JSON', async () => {
    const path = await writeTemp('broken.json', '{ categories: ');
    expect(() => loadVocabulary(path)).toThrow(ConfigError);
  });

  it('throws ConfigError naming the failing field', async () => {
    const path = await writeTemp('empty.json', JSON.stringify({ categories: [] }));
    try {
      loadVocabulary(path);
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(ConfigError);
      const e = err as ConfigError;
      expect(e.message).toBe(`Invalid vocabulary file ${path}: categories: At least one category is required`);
      expect(e.source).toBe(path);
    }
  });
});
