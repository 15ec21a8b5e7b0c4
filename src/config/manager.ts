/**
 * Configuration management - reads from git config and .git-stack.json
 * Uses neverthrow Result types for error handling
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import * as clack from '@clack/prompts';
import { Result, ResultAsync } from 'neverthrow';
import { type IGitOperations, defaultGitOps } from '../git/interface.js';
import {
  type ResolvedConfig,
  type StackConfig,
  DEFAULT_CONFIG,
  validateConfig,
  mergeConfigs,
} from './schema.js';

export const CONFIG_FILE_NAME = '.git-stack.json';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ConfigManager {
  private readonly configPath: string;

  constructor(
    private readonly repoRoot: string,
    private readonly git: IGitOperations = defaultGitOps,
    private readonly warn: (message: string) => void = (message) => clack.log.warn(message)
  ) {
    this.configPath = join(repoRoot, CONFIG_FILE_NAME);
  }

  /**
   * Load configuration: defaults, then git config, then the JSON file
   */
  async load(): Promise<ResolvedConfig> {
    const gitConfig = await this.loadFromGitConfig();
    const fileConfig = await this.loadFromFile();

    // File config overrides git config
    return mergeConfigs(mergeConfigs(DEFAULT_CONFIG, gitConfig), fileConfig);
  }

  /**
   * Load configuration from git config (gitstack.*)
   */
  private async loadFromGitConfig(): Promise<StackConfig> {
    const config: StackConfig = {};

    const trunks = await this.git.exec(['config', '--get-all', 'gitstack.trunk'], this.repoRoot);
    if (trunks.exitCode === 0 && trunks.stdout.trim()) {
      config.trunks = trunks.stdout
        .split('\n')
        .map((t) => t.trim())
        .filter(Boolean);
    }

    const remote = await this.git.exec(['config', '--get', 'gitstack.remote'], this.repoRoot);
    if (remote.exitCode === 0 && remote.stdout.trim()) {
      config.remote = remote.stdout.trim();
    }

    const push = await this.git.exec(
      ['config', '--type=bool', '--get', 'gitstack.push'],
      this.repoRoot
    );
    // Exit code 1 means unset; anything else is a value git cannot read as a boolean
    if (push.exitCode === 0) {
      config.push = push.stdout.trim() === 'true';
    } else if (push.exitCode !== 1) {
      this.warn(`Ignoring gitstack.push: ${push.stderr.trim() || 'not a boolean'}`);
    }

    return config;
  }

  /**
   * Load configuration from .git-stack.json
   */
  private async loadFromFile(): Promise<StackConfig> {
    if (!existsSync(this.configPath)) {
      return {};
    }

    const parseResult = await ResultAsync.fromPromise(
      readFile(this.configPath, 'utf8'),
      (e) => new ConfigError(`Failed to read config: ${e instanceof Error ? e.message : String(e)}`)
    ).andThen((raw) =>
      Result.fromThrowable(
        (): unknown => JSON.parse(raw),
        (e) => new ConfigError(`Failed to parse config: ${e instanceof Error ? e.message : String(e)}`)
      )()
    );

    if (parseResult.isErr()) {
      this.warn(`${parseResult.error.message}; ignoring ${CONFIG_FILE_NAME}`);
      return {};
    }

    const content = parseResult.value;

    if (validateConfig(content)) {
      return content;
    }

    this.warn(`Invalid ${CONFIG_FILE_NAME} format, using defaults`);
    return {};
  }
}
