/**
 * Stack sync engine - walks a stack parent-before-child, rebasing each branch
 * onto its parent's latest tip
 */

import { err } from 'neverthrow';
import { type IGitOperations, defaultGitOps } from '../git/interface.js';
import { DEFAULT_CONFIG } from '../config/schema.js';
import { type StackResult, StackErrors, stackOk } from './errors.js';
import type { IPendingSyncStore } from './pending.js';
import type { RelationshipStore } from './store.js';
import { type TreeBuilder, findNode } from './tree.js';
import type {
  BranchRecord,
  FrontierEntry,
  SyncOptions,
  SyncOutcome,
  SyncReporter,
  SyncRunResult,
  TreeNode,
} from './types.js';

export interface SyncEngineDeps {
  store: RelationshipStore;
  trees: TreeBuilder;
  pending: IPendingSyncStore;
  git?: IGitOperations;
  remote?: string;
  /** Repository-wide push setting; `noPush` can only narrow it */
  push?: boolean;
}

interface WalkEntry {
  node: TreeNode;
  onto?: string;
}

interface WalkContext {
  originalBranch: string;
  options: SyncOptions;
  reporter: SyncReporter;
}

interface StepResult {
  outcome: SyncOutcome;
  parentTip: string;
}

export const silentReporter: SyncReporter = {
  outcome: () => undefined,
  warn: () => undefined,
};

/**
 * Puts the original branch back when a walk ends, unless told to keep the
 * current checkout (a halted rebase must stay where the operator can fix it)
 */
class CheckoutGuard {
  private kept = false;

  constructor(
    private readonly git: IGitOperations,
    private readonly repoRoot: string,
    private readonly branch: string
  ) {}

  keep(): void {
    this.kept = true;
  }

  async release(reporter: SyncReporter): Promise<void> {
    if (this.kept) return;

    const result = await this.git.checkout(this.branch, this.repoRoot);
    if (result.isErr()) {
      reporter.warn(`Failed to restore original branch '${this.branch}': ${result.error.message}`);
    }
  }
}

export class SyncEngine {
  private readonly git: IGitOperations;
  private readonly store: RelationshipStore;
  private readonly trees: TreeBuilder;
  private readonly pending: IPendingSyncStore;
  private readonly remote: string;
  private readonly push: boolean;

  constructor(
    private readonly repoRoot: string,
    deps: SyncEngineDeps
  ) {
    this.git = deps.git || defaultGitOps;
    this.store = deps.store;
    this.trees = deps.trees;
    this.pending = deps.pending;
    this.remote = deps.remote ?? DEFAULT_CONFIG.remote;
    this.push = deps.push ?? DEFAULT_CONFIG.push;
  }

  /**
   * Sync the stack under `root`. Every outcome is reported as soon as it is
   * known; a conflict halts the walk and records what is left to do.
   */
  async sync(
    root: TreeNode,
    options: SyncOptions = {},
    reporter: SyncReporter = silentReporter
  ): Promise<StackResult<SyncRunResult>> {
    const clean = await this.ensureCleanWorktree();
    if (clean.isErr()) return err(clean.error);

    const pending = await this.pending.load();
    if (pending.isErr()) return err(pending.error);
    if (pending.value) {
      return StackErrors.syncInProgress(pending.value.conflict.branch);
    }

    const originalBranch = await this.git.getCurrentBranch(this.repoRoot);
    if (!originalBranch) {
      return StackErrors.detachedHead();
    }

    let undoReparent: (() => Promise<StackResult<void>>) | null = null;
    if (options.parentOverride) {
      const previous = await this.store.get(originalBranch);
      if (previous.isErr() && previous.error.code !== 'NOT_TRACKED') {
        return err(previous.error);
      }
      const previousParent = previous.isOk() ? (previous.value.parent ?? '') : null;

      const reparented = await this.store.setParent(originalBranch, options.parentOverride);
      if (reparented.isErr()) return err(reparented.error);
      undoReparent = () => this.store.restoreParent(originalBranch, previousParent);
    }

    const planned = await this.planWalk(root, originalBranch, options);
    if (planned.isErr()) {
      // Nothing was rebased; drop the re-parent
      if (undoReparent) {
        const restored = await undoReparent();
        if (restored.isErr()) {
          reporter.warn(`Failed to restore the parent of '${originalBranch}': ${restored.error.message}`);
        }
      }
      return err(planned.error);
    }

    return this.walk(planned.value, { originalBranch, options, reporter }, []);
  }

  /**
   * Resume a sync that halted on a conflict, once the operator has finished
   * the rebase
   */
  async continueSync(reporter: SyncReporter = silentReporter): Promise<StackResult<SyncRunResult>> {
    const pendingResult = await this.pending.load();
    if (pendingResult.isErr()) return err(pendingResult.error);

    const pending = pendingResult.value;
    if (!pending) {
      return StackErrors.noPendingSync();
    }

    const { branch, parent, parentTip } = pending.conflict;

    const state = await this.git.getRebaseState(this.repoRoot);
    if (state.isErr()) {
      return StackErrors.gitError('status', state.error.message);
    }
    if (state.value.inProgress || state.value.unmergedPaths.length > 0) {
      return StackErrors.unresolvedConflicts(branch, state.value.unmergedPaths);
    }

    const clean = await this.ensureCleanWorktree();
    if (clean.isErr()) return err(clean.error);

    const tip = await this.git.getCommit(branch, this.repoRoot);
    if (tip.isErr()) {
      return StackErrors.gitError('rev-parse', tip.error.message, branch);
    }
    // An aborted rebase leaves the branch without the parent's commits
    if (!(await this.git.isAncestor(parentTip, tip.value, this.repoRoot))) {
      return StackErrors.unresolvedConflicts(branch, []);
    }

    const marked = await this.store.recordSyncedParentCommit(branch, parentTip);
    if (marked.isErr()) return err(marked.error);

    let pushed = false;
    if (this.shouldPush(pending.options)) {
      const pushResult = await this.git.pushForce(branch, this.remote, this.repoRoot);
      if (pushResult.isErr()) {
        return StackErrors.gitError('push', pushResult.error.message, branch);
      }
      pushed = true;
    }

    const cleared = await this.pending.clear();
    if (cleared.isErr()) return err(cleared.error);

    const resolved: SyncOutcome = { branch, parent, status: 'updated', pushed, conflictFiles: [] };
    reporter.outcome(resolved);

    const forest = await this.trees.buildForest();
    if (forest.isErr()) return err(forest.error);

    const entries: WalkEntry[] = [];
    for (const entry of pending.frontier) {
      const node = locate(forest.value, entry.branch);
      if (!node) {
        reporter.warn(`Skipping '${entry.branch}': it is no longer part of a stack`);
        continue;
      }
      entries.push({ node, onto: entry.onto });
    }

    return this.walk(
      entries,
      { originalBranch: pending.originalBranch, options: pending.options, reporter },
      [resolved]
    );
  }

  // ============ Private Helpers ============

  /**
   * Work out where the walk starts, validating the options against the
   * current tree. Performs no writes.
   */
  private async planWalk(
    root: TreeNode,
    originalBranch: string,
    options: SyncOptions
  ): Promise<StackResult<WalkEntry[]>> {
    let stackRoot = root;
    if (options.parentOverride) {
      const rebuilt = await this.trees.getCurrentRoot();
      if (rebuilt.isErr()) return err(rebuilt.error);
      stackRoot = rebuilt.value;
    }

    const start = this.startingNodes(stackRoot, originalBranch, options);
    if (start.isErr()) return err(start.error);

    const entries: WalkEntry[] = start.value.map((node) => ({ node }));
    if (!options.trunk) {
      return stackOk(entries);
    }

    const outsideRoot = start.value.find((node) => node.branch.parent !== stackRoot.branch.name);
    if (stackRoot.tracked || outsideRoot) {
      return StackErrors.invalidTrunkOption((outsideRoot ?? start.value[0]).branch.name);
    }

    const upstream = await this.git.resolveUpstreamTip(
      stackRoot.branch.name,
      this.remote,
      this.repoRoot
    );
    if (upstream.isErr()) {
      return StackErrors.gitError('fetch', upstream.error.message, stackRoot.branch.name);
    }
    return stackOk(entries.map((entry) => ({ ...entry, onto: upstream.value })));
  }

  private startingNodes(
    root: TreeNode,
    currentBranch: string,
    options: SyncOptions
  ): StackResult<TreeNode[]> {
    if (options.currentOnly) {
      const node = findNode(root, currentBranch);
      if (!node || node === root || !node.branch.parent) {
        return StackErrors.nothingToSync(currentBranch);
      }
      return stackOk([node]);
    }

    if (root.children.length === 0) {
      return StackErrors.nothingToSync(root.branch.name);
    }
    return stackOk(root.children);
  }

  /**
   * Pre-order depth-first walk. Siblings keep tree order and each branch is
   * rebased only after its parent's step has finished.
   */
  private async walk(
    entries: WalkEntry[],
    ctx: WalkContext,
    outcomes: SyncOutcome[]
  ): Promise<StackResult<SyncRunResult>> {
    const guard = new CheckoutGuard(this.git, this.repoRoot, ctx.originalBranch);
    const queue = [...entries];

    try {
      while (queue.length > 0) {
        const entry = queue.shift();
        if (!entry) break;

        const step = await this.syncNode(entry, ctx.options);
        if (step.isErr()) return err(step.error);

        const { outcome, parentTip } = step.value;
        outcomes.push(outcome);
        ctx.reporter.outcome(outcome);

        const children: WalkEntry[] = ctx.options.currentOnly
          ? []
          : entry.node.children.map((node) => ({ node }));

        if (outcome.status === 'conflict') {
          guard.keep();
          const saved = await this.pending.save({
            originalBranch: ctx.originalBranch,
            options: ctx.options,
            conflict: { branch: outcome.branch, parent: outcome.parent, parentTip },
            frontier: [...children, ...queue].map(toFrontierEntry),
            createdAt: new Date().toISOString(),
          });
          if (saved.isErr()) return err(saved.error);

          return stackOk({ status: 'conflict', outcomes });
        }

        queue.unshift(...children);
      }

      return stackOk({ status: 'complete', outcomes });
    } finally {
      await guard.release(ctx.reporter);
    }
  }

  /**
   * Check out one branch and bring it up to date with its parent
   */
  private async syncNode(entry: WalkEntry, options: SyncOptions): Promise<StackResult<StepResult>> {
    const record = entry.node.branch;
    const name = record.name;
    const parent = record.parent;
    if (!parent) {
      return StackErrors.invalidArgument(`Branch '${name}' has no parent to sync with`);
    }

    const checkout = await this.git.checkout(name, this.repoRoot);
    if (checkout.isErr()) {
      return StackErrors.gitError('checkout', checkout.error.message, name);
    }

    let parentTip = entry.onto;
    if (!parentTip) {
      const parentHead = await this.git.getCommit(parent, this.repoRoot);
      if (parentHead.isErr()) {
        return StackErrors.gitError('rev-parse', parentHead.error.message, parent);
      }
      parentTip = parentHead.value;
    }

    const branchTip = await this.git.getCommit(name, this.repoRoot);
    if (branchTip.isErr()) {
      return StackErrors.gitError('rev-parse', branchTip.error.message, name);
    }

    if (await this.git.isAncestor(parentTip, branchTip.value, this.repoRoot)) {
      const marked = await this.markSynced(record, parentTip);
      if (marked.isErr()) return err(marked.error);
      return stackOk({ outcome: makeOutcome(name, parent, 'up-to-date'), parentTip });
    }

    // Replay only the branch's own commits when the watermark still bounds them
    const watermark = record.parentSyncedCommit;
    const upstream =
      watermark && (await this.git.isAncestor(watermark, branchTip.value, this.repoRoot))
        ? watermark
        : undefined;

    const rebased = await this.git.rebase({ branch: name, onto: parentTip, upstream }, this.repoRoot);
    if (rebased.isErr()) {
      return StackErrors.gitError('rebase', rebased.error.message, name);
    }

    if (rebased.value.status === 'conflict') {
      return stackOk({
        outcome: { ...makeOutcome(name, parent, 'conflict'), conflictFiles: rebased.value.conflictFiles },
        parentTip,
      });
    }

    const marked = await this.markSynced(record, parentTip);
    if (marked.isErr()) return err(marked.error);

    const outcome = makeOutcome(name, parent, rebased.value.status);
    if (rebased.value.status === 'updated' && this.shouldPush(options)) {
      const pushResult = await this.git.pushForce(name, this.remote, this.repoRoot);
      if (pushResult.isErr()) {
        return StackErrors.gitError('push', pushResult.error.message, name);
      }
      outcome.pushed = true;
    }

    return stackOk({ outcome, parentTip });
  }

  private async markSynced(record: BranchRecord, parentTip: string): Promise<StackResult<void>> {
    if (record.parentSyncedCommit === parentTip) {
      return stackOk(undefined);
    }
    return this.store.recordSyncedParentCommit(record.name, parentTip);
  }

  private shouldPush(options: SyncOptions): boolean {
    return this.push && !options.noPush;
  }

  private async ensureCleanWorktree(): Promise<StackResult<void>> {
    const status = await this.git.getStatus(this.repoRoot);
    if (status.isErr()) {
      return StackErrors.gitError('status', status.error.message);
    }
    if (status.value.dirty) {
      return StackErrors.dirtyWorktree();
    }
    return stackOk(undefined);
  }
}

function makeOutcome(branch: string, parent: string, status: SyncOutcome['status']): SyncOutcome {
  return { branch, parent, status, pushed: false, conflictFiles: [] };
}

function toFrontierEntry(entry: WalkEntry): FrontierEntry {
  return entry.onto ? { branch: entry.node.branch.name, onto: entry.onto } : { branch: entry.node.branch.name };
}

function locate(forest: readonly TreeNode[], branchName: string): TreeNode | null {
  for (const root of forest) {
    const node = findNode(root, branchName);
    if (node?.tracked) return node;
  }
  return null;
}
