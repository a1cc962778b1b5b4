import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigLoader, resolveConfig } from '../../src/config/loader.js';
import { DEFAULT_CONFIG } from '../../src/config/types.js';
import { ConfigError } from '../../src/errors.js';

describe('ConfigLoader', () => {
  let dir: string;
  let loader: ConfigLoader;

  beforeEach(async () => {
    dir = join(tmpdir(), `config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.mkdir(dir, { recursive: true });
    loader = new ConfigLoader();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(content: string): Promise<void> {
    await fs.writeFile(join(dir, 'tree-navigator.json'), content);
  }

  it('returns defaults when no config file', async () => {
    expect(await loader.load(dir)).toEqual(DEFAULT_CONFIG);
  });

  it('merges file config over defaults', async () => {
    await writeConfig(JSON.stringify({ build: { maxNodes: 500 } }));
    const config = await loader.load(dir);
    expect(config.build.maxNodes).toBe(500);
    expect(config.logging.level).toBe('info');
  });

  it('lets overrides win over the file', async () => {
    await writeConfig(JSON.stringify({ logging: { level: 'debug' } }));
    const config = await loader.load(dir, { logging: { level: 'error' } });
    expect(config.logging.level).toBe('error');
  });

  it('throws ConfigError on invalid JSON', async () => {
    await writeConfig('{ not json');
    await expect(loader.load(dir)).rejects.toThrow(ConfigError);
    await expect(loader.load(dir)).rejects.toThrow(/^Invalid JSON in config file/);
  });

  it('throws ConfigError when the file is not an object', async () => {
    await writeConfig('[1, 2]');
    await expect(loader.load(dir)).rejects.toThrow(ConfigError);
  });

  it('rejects an unknown log level', async () => {
    await writeConfig(JSON.stringify({ logging: { level: 'loud' } }));
    await expect(loader.load(dir)).rejects.toMatchObject({
      name: 'ConfigError',
      errors: ['logging.level must be one of: debug, info, warn, error, silent'],
    });
  });

  it('rejects a fractional node limit', async () => {
    await writeConfig(JSON.stringify({ build: { maxNodes: 2.5 } }));
    await expect(loader.load(dir)).rejects.toMatchObject({
      errors: ['build.maxNodes must be an integer'],
    });
  });

  it('ignores __proto__ key in merge', async () => {
    await writeConfig('{"__proto__": {"polluted": true}, "build": {"maxNodes": 3}}');
    const config = await loader.load(dir);
    expect(Object.prototype.hasOwnProperty.call({}, 'polluted')).toBe(false);
    expect(config).toEqual({ logging: { level: 'info' }, build: { maxNodes: 3 } });
  });

  it('drops unknown keys', async () => {
    await writeConfig(JSON.stringify({ extra: { nested: true } }));
    expect(await loader.load(dir)).toEqual(DEFAULT_CONFIG);
  });
});

describe('resolveConfig', () => {
  it('returns defaults without overrides', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('validates overrides', () => {
    expect(() => resolveConfig({ build: { maxNodes: -1 } })).toThrow(
      'Invalid configuration in overrides: build.maxNodes must be >= 1',
    );
  });

  it('does not share state with DEFAULT_CONFIG', () => {
    const config = resolveConfig({ build: { maxNodes: 9 } });
    expect(config.build.maxNodes).toBe(9);
    expect(DEFAULT_CONFIG.build.maxNodes).toBeUndefined();
  });
});
