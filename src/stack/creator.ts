/**
 * Create a new branch stacked on top of a parent
 */

import { err } from 'neverthrow';
import { type IGitOperations, defaultGitOps } from '../git/interface.js';
import { type StackResult, StackErrors, stackOk } from './errors.js';
import type { RelationshipStore } from './store.js';
import type { BranchRecord } from './types.js';

export interface CreatedBranch {
  record: BranchRecord;
  /** Commit the new branch points at */
  commit: string;
}

export class BranchCreator {
  private readonly git: IGitOperations;

  constructor(
    private readonly repoRoot: string,
    private readonly store: RelationshipStore,
    gitOps?: IGitOperations
  ) {
    this.git = gitOps || defaultGitOps;
  }

  /**
   * Create `name` at the current commit, record its parent (the checked-out
   * branch unless overridden) and check it out.
   */
  async createBranch(name: string, parentOverride?: string): Promise<StackResult<CreatedBranch>> {
    const nameCheck = await this.git.exec(['check-ref-format', '--branch', name], this.repoRoot);
    if (!name || nameCheck.exitCode !== 0) {
      return StackErrors.invalidArgument(`'${name}' is not a valid branch name`);
    }

    const currentBranch = await this.git.getCurrentBranch(this.repoRoot);
    const parent = parentOverride || currentBranch;
    if (!parent) {
      return StackErrors.detachedHead();
    }

    if (await this.git.branchExists(name, this.repoRoot)) {
      return StackErrors.branchExists(name);
    }
    const existingRecord = await this.store.get(name);
    if (existingRecord.isOk()) {
      return StackErrors.branchExists(name);
    }
    if (existingRecord.error.code !== 'NOT_TRACKED') {
      return err(existingRecord.error);
    }

    const parentTip = await this.git.getCommit(parent, this.repoRoot);
    if (parentTip.isErr()) {
      return StackErrors.branchNotFound(parent);
    }

    const checkoutResult = await this.git.checkoutNewBranch(name, this.repoRoot);
    if (checkoutResult.isErr()) {
      return StackErrors.gitError('checkout', checkoutResult.error.message, name);
    }

    const head = await this.git.getCommit(name, this.repoRoot);
    if (head.isErr()) {
      return StackErrors.gitError('rev-parse', head.error.message, name);
    }

    const recordResult = await this.store.setParent(name, parent);
    if (recordResult.isErr()) {
      await this.rollback(name, currentBranch);
      return err(recordResult.error);
    }

    // The parent tip is only incorporated when the new branch descends from it
    let record = recordResult.value;
    if (await this.git.isAncestor(parentTip.value, head.value, this.repoRoot)) {
      const watermark = await this.store.recordSyncedParentCommit(name, parentTip.value);
      if (watermark.isErr()) {
        await this.rollback(name, currentBranch);
        return err(watermark.error);
      }
      record = { ...record, parentSyncedCommit: parentTip.value };
    }

    return stackOk({ record, commit: head.value });
  }

  /**
   * Best-effort undo of a half-created branch
   */
  private async rollback(name: string, previousBranch: string | null): Promise<void> {
    await this.store.remove(name);
    if (previousBranch) {
      await this.git.checkout(previousBranch, this.repoRoot);
    }
    await this.git.deleteBranch(name, true, this.repoRoot);
  }
}
