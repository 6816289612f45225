import assert from 'node:assert/strict';
import { describe, it, before, after } from 'node:test';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigManager, validateConfig } from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';

let testRoot: string;
let counter = 0;

before(async () => {
  testRoot = join(tmpdir(), `deptree-config-test-${Date.now()}`);
  await fs.mkdir(testRoot, { recursive: true });
});

after(async () => {
  await fs.rm(testRoot, { recursive: true, force: true });
});

async function configDir(files: Record<string, string> = {}): Promise<string> {
  const dir = join(testRoot, `case-${counter++}`);
  await fs.mkdir(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(join(dir, name), content, 'utf8');
  }
  return dir;
}

describe('ConfigManager', () => {
  it('uses defaults when no config file exists', async () => {
    const manager = new ConfigManager(await configDir(), {});

    assert.deepEqual(await manager.load(), {});
  });

  it('reads JSONC with comments and trailing commas', async () => {
    const dir = await configDir({
      'config.jsonc': '{\n  // registry mirror\n  "registryUrl": "https://mirror.test/api/v1",\n  "maxDepth": 4,\n}\n'
    });
    const manager = new ConfigManager(dir, {});

    assert.deepEqual(await manager.load(), { registryUrl: 'https://mirror.test/api/v1', maxDepth: 4 });
  });

  it('falls back to config.json', async () => {
    const dir = await configDir({ 'config.json': '{ "testGraphFile": "deps.txt" }' });

    assert.deepEqual(await new ConfigManager(dir, {}).load(), { testGraphFile: 'deps.txt' });
  });

  it('honours an explicit config path from the environment', async () => {
    const dir = await configDir({ 'custom.json': '{ "userAgent": "ua-test" }' });
    const manager = new ConfigManager(await configDir(), { DEPTREE_CONFIG: join(dir, 'custom.json') });

    assert.deepEqual(await manager.load(), { userAgent: 'ua-test' });
  });

  it('fails when the explicit config path is missing', async () => {
    const manager = new ConfigManager(await configDir(), { DEPTREE_CONFIG: join(testRoot, 'nope.json') });

    await assert.rejects(manager.load(), ConfigError);
  });

  it('fails on unparseable content', async () => {
    const dir = await configDir({ 'config.jsonc': '{ "maxDepth": }' });

    await assert.rejects(new ConfigManager(dir, {}).load(), ConfigError);
  });
});

describe('validateConfig', () => {
  it('rejects a non-object', () => {
    assert.throws(() => validateConfig([], 'inline'), ConfigError);
  });

  it('rejects a non-positive maxDepth', () => {
    assert.throws(() => validateConfig({ maxDepth: -1 }, 'inline'), ConfigError);
    assert.throws(() => validateConfig({ maxDepth: 1.5 }, 'inline'), ConfigError);
  });

  it('rejects an empty string value', () => {
    assert.throws(() => validateConfig({ registryUrl: '' }, 'inline'), ConfigError);
  });

  it('ignores unknown keys', () => {
    assert.deepEqual(validateConfig({ theme: 'dark', maxDepth: 2 }, 'inline'), { maxDepth: 2 });
  });
});
