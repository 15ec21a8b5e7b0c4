/**
 * Tests for configuration loading and validation
 */

import { describe, expect, test, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CONFIG_FILE_NAME, ConfigManager } from '../config/manager.js';
import { DEFAULT_CONFIG, mergeConfigs, validateConfig } from '../config/schema.js';
import { FakeGit } from './fake-git.js';

describe('validateConfig', () => {
  test('accepts an empty object and a full config', () => {
    expect(validateConfig({})).toBe(true);
    expect(validateConfig({ trunks: ['main', 'develop'], remote: 'upstream', push: false })).toBe(true);
  });

  test.each([
    ['a non-object', 'main'],
    ['an array', ['main']],
    ['trunks as a string', { trunks: 'main' }],
    ['an empty trunk name', { trunks: [''] }],
    ['an empty remote', { remote: '' }],
    ['push as a string', { push: 'false' }],
  ])('rejects %s', (_label, value) => {
    expect(validateConfig(value)).toBe(false);
  });
});

describe('mergeConfigs', () => {
  test('later values win and missing values fall through', () => {
    expect(mergeConfigs(DEFAULT_CONFIG, { remote: 'fork' })).toEqual({
      trunks: ['main', 'master'],
      remote: 'fork',
      push: true,
    });
  });
});

describe('ConfigManager', () => {
  let repoRoot: string;
  let git: FakeGit;
  let warnings: string[];
  let manager: ConfigManager;

  beforeEach(async () => {
    repoRoot = await mkdtemp(join(tmpdir(), 'git-stack-config-'));
    git = new FakeGit();
    warnings = [];
    manager = new ConfigManager(repoRoot, git, (message) => warnings.push(message));
  });

  afterEach(async () => {
    await rm(repoRoot, { recursive: true, force: true });
  });

  test('uses defaults when nothing is configured', async () => {
    expect(await manager.load()).toEqual(DEFAULT_CONFIG);
    expect(warnings).toEqual([]);
  });

  test('reads gitstack.* from git config', async () => {
    git.config.set('gitstack.trunk', ['develop', 'release']);
    git.config.set('gitstack.remote', ['upstream']);
    git.config.set('gitstack.push', ['no']);

    expect(await manager.load()).toEqual({
      trunks: ['develop', 'release'],
      remote: 'upstream',
      push: false,
    });
  });

  test('warns about a push value git cannot read as a boolean', async () => {
    git.config.set('gitstack.push', ['sometimes']);

    const config = await manager.load();

    expect(config.push).toBe(true);
    expect(warnings).toEqual([
      "Ignoring gitstack.push: fatal: bad boolean config value 'sometimes' for 'gitstack.push'",
    ]);
  });

  test('the config file overrides git config', async () => {
    git.config.set('gitstack.remote', ['upstream']);
    git.config.set('gitstack.trunk', ['develop']);
    await writeFile(join(repoRoot, CONFIG_FILE_NAME), JSON.stringify({ remote: 'fork', push: false }));

    expect(await manager.load()).toEqual({ trunks: ['develop'], remote: 'fork', push: false });
  });

  test('ignores a file that is not JSON', async () => {
    await writeFile(join(repoRoot, CONFIG_FILE_NAME), '{ not json');

    expect(await manager.load()).toEqual(DEFAULT_CONFIG);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^Failed to parse config: .+; ignoring \.git-stack\.json$/);
  });

  test('ignores a file with the wrong shape', async () => {
    await writeFile(join(repoRoot, CONFIG_FILE_NAME), JSON.stringify({ trunks: 'main' }));

    expect(await manager.load()).toEqual(DEFAULT_CONFIG);
    expect(warnings).toEqual(['Invalid .git-stack.json format, using defaults']);
  });
});
