/**
 * Relationship store - persists each tracked branch's parent and watermark
 * in git config
 *
 *   branch.<name>.stackparent = "main"       parent branch ("" for a root)
 *   branch.<name>.stackbase   = "abc123def"  parent tip at the last sync
 *   branch.<name>.stackorder  = "3"          insertion sequence number
 *
 * Every mutation is a single `git config` write, which git serializes through
 * its config lock file.
 */

import { err } from 'neverthrow';
import { type IGitOperations, defaultGitOps } from '../git/interface.js';
import { GitParser } from '../git/parser.js';
import { DEFAULT_CONFIG } from '../config/schema.js';
import { type StackResult, StackErrors, stackOk } from './errors.js';
import type { BranchRecord } from './types.js';

const RECORD_KEY = /^branch\.(.+)\.(stackparent|stackbase|stackorder)$/;

interface StoredRecord extends BranchRecord {
  order: number;
}

export class RelationshipStore {
  private readonly git: IGitOperations;
  private readonly trunks: ReadonlySet<string>;

  constructor(
    private readonly repoRoot: string,
    gitOps?: IGitOperations,
    trunks: readonly string[] = DEFAULT_CONFIG.trunks
  ) {
    this.git = gitOps || defaultGitOps;
    this.trunks = new Set(trunks);
  }

  /**
   * Whether a name is a configured trunk branch
   */
  isTrunk(branchName: string): boolean {
    return this.trunks.has(branchName);
  }

  /**
   * Get the record for a branch
   */
  async get(branchName: string): Promise<StackResult<BranchRecord>> {
    const parent = await this.getGitConfig(`branch.${branchName}.stackparent`);
    if (parent.isErr()) return err(parent.error);
    if (parent.value === null) {
      return StackErrors.notTracked(branchName);
    }

    const base = await this.getGitConfig(`branch.${branchName}.stackbase`);
    if (base.isErr()) return err(base.error);

    return stackOk(toRecord(branchName, parent.value, base.value));
  }

  /**
   * Names of all tracked branches, in insertion order
   */
  async listAll(): Promise<StackResult<string[]>> {
    const records = await this.loadAll();
    return records.map((all) => all.map((r) => r.name));
  }

  /**
   * All tracked records, in insertion order
   */
  async loadAll(): Promise<StackResult<BranchRecord[]>> {
    const result = await this.git.exec(
      ['config', '--get-regexp', '^branch\\..*\\.stack(parent|base|order)$'],
      this.repoRoot
    );

    // Exit code 1 means no matching keys
    if (result.exitCode === 1) {
      return stackOk([]);
    }
    if (result.exitCode !== 0) {
      return StackErrors.configError(result.stderr.trim() || 'failed to read branch records');
    }

    const raw = new Map<string, { parent?: string; base?: string; order?: number }>();

    for (const { key, value } of GitParser.parseConfigEntries(result.stdout)) {
      const match = key.match(RECORD_KEY);
      if (!match) continue;

      const [, name, field] = match;
      const entry = raw.get(name) ?? {};
      switch (field) {
        case 'stackparent':
          entry.parent = value;
          break;
        case 'stackbase':
          entry.base = value;
          break;
        case 'stackorder': {
          const order = Number.parseInt(value, 10);
          if (Number.isFinite(order)) entry.order = order;
          break;
        }
      }
      raw.set(name, entry);
    }

    const records: StoredRecord[] = [];
    for (const [name, entry] of raw) {
      // A stackorder/stackbase without a parent is a leftover, not a record
      if (entry.parent === undefined) continue;
      records.push({
        ...toRecord(name, entry.parent, entry.base ?? null),
        order: entry.order ?? Number.MAX_SAFE_INTEGER,
      });
    }

    // Array.prototype.sort is stable, so equal orders keep config file order
    records.sort((a, b) => a.order - b.order);
    return stackOk(records.map(({ order: _order, ...record }) => record));
  }

  /**
   * Record or update a branch's parent. Rejects any parent that would make
   * the branch its own ancestor.
   */
  async setParent(branchName: string, parentName: string): Promise<StackResult<BranchRecord>> {
    if (!branchName || !parentName) {
      return StackErrors.invalidArgument('Branch and parent names must not be empty');
    }
    if (this.isTrunk(branchName)) {
      return StackErrors.invalidArgument(`'${branchName}' is a trunk branch and cannot be given a parent`);
    }
    if (branchName === parentName) {
      return StackErrors.cycleDetected(branchName, [branchName, branchName]);
    }

    const recordsResult = await this.loadAll();
    if (recordsResult.isErr()) return err(recordsResult.error);

    const records = new Map(recordsResult.value.map((r) => [r.name, r]));

    if (
      !records.has(parentName) &&
      !this.isTrunk(parentName) &&
      !(await this.git.branchExists(parentName, this.repoRoot))
    ) {
      return StackErrors.branchNotFound(parentName);
    }

    // Walk up from the new parent; meeting the branch means a cycle
    const chain = [branchName, parentName];
    const visited = new Set<string>([parentName]);
    let cursor = records.get(parentName)?.parent;
    while (cursor) {
      chain.push(cursor);
      if (cursor === branchName) {
        return StackErrors.cycleDetected(branchName, chain);
      }
      if (visited.has(cursor)) break;
      visited.add(cursor);
      cursor = records.get(cursor)?.parent;
    }

    const existing = records.get(branchName);
    if (!existing) {
      const orderResult = await this.nextOrder();
      if (orderResult.isErr()) return err(orderResult.error);

      const written = await this.setGitConfig(
        `branch.${branchName}.stackorder`,
        String(orderResult.value)
      );
      if (written.isErr()) return err(written.error);
    }

    const parentResult = await this.setGitConfig(`branch.${branchName}.stackparent`, parentName);
    if (parentResult.isErr()) return err(parentResult.error);

    return stackOk({ ...existing, name: branchName, parent: parentName });
  }

  /**
   * Put back a parent read before a re-parent. `null` means the branch was
   * not tracked, so its record is dropped again.
   */
  async restoreParent(branchName: string, parent: string | null): Promise<StackResult<void>> {
    if (parent === null) {
      return this.remove(branchName);
    }
    return this.setGitConfig(`branch.${branchName}.stackparent`, parent);
  }

  /**
   * Update the watermark: the parent commit already incorporated into the branch
   */
  async recordSyncedParentCommit(branchName: string, commitId: string): Promise<StackResult<void>> {
    const record = await this.get(branchName);
    if (record.isErr()) return err(record.error);

    return this.setGitConfig(`branch.${branchName}.stackbase`, commitId);
  }

  /**
   * Stop tracking a branch
   */
  async remove(branchName: string): Promise<StackResult<void>> {
    for (const field of ['stackparent', 'stackbase', 'stackorder']) {
      const result = await this.unsetGitConfig(`branch.${branchName}.${field}`);
      if (result.isErr()) return err(result.error);
    }
    return stackOk(undefined);
  }

  // ============ Private Helpers ============

  private async nextOrder(): Promise<StackResult<number>> {
    const result = await this.git.exec(
      ['config', '--get-regexp', '^branch\\..*\\.stackorder$'],
      this.repoRoot
    );
    if (result.exitCode === 1) {
      return stackOk(1);
    }
    if (result.exitCode !== 0) {
      return StackErrors.configError(result.stderr.trim() || 'failed to read branch order');
    }

    let max = 0;
    for (const { value } of GitParser.parseConfigEntries(result.stdout)) {
      const order = Number.parseInt(value, 10);
      if (Number.isFinite(order) && order > max) max = order;
    }
    return stackOk(max + 1);
  }

  private async getGitConfig(key: string): Promise<StackResult<string | null>> {
    const result = await this.git.exec(['config', '--get', key], this.repoRoot);

    // Exit code 1 means the key doesn't exist
    if (result.exitCode === 1) {
      return stackOk(null);
    }
    if (result.exitCode !== 0) {
      return StackErrors.configError(result.stderr.trim() || `failed to read ${key}`);
    }

    return stackOk(result.stdout.trim());
  }

  private async setGitConfig(key: string, value: string): Promise<StackResult<void>> {
    const result = await this.git.execResult(['config', key, value], this.repoRoot);
    if (result.isErr()) {
      return StackErrors.configError(result.error.message);
    }
    return stackOk(undefined);
  }

  private async unsetGitConfig(key: string): Promise<StackResult<void>> {
    const result = await this.git.exec(['config', '--unset', key], this.repoRoot);

    // Exit code 5 means the key doesn't exist, which is fine
    if (result.exitCode !== 0 && result.exitCode !== 5) {
      return StackErrors.configError(`Failed to unset ${key}: ${result.stderr}`);
    }

    return stackOk(undefined);
  }
}

function toRecord(name: string, parent: string, base: string | null): BranchRecord {
  const record: BranchRecord = { name };
  if (parent) record.parent = parent;
  if (base) record.parentSyncedCommit = base;
  return record;
}
