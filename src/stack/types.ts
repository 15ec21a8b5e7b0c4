/**
 * Types for stack relationships, trees and synchronization
 */

/**
 * Persisted relationship of one tracked branch
 */
export interface BranchRecord {
  name: string;
  /** Branch this one is stacked on; absent for a root */
  parent?: string;
  /** Parent tip as of the last successful sync (the watermark) */
  parentSyncedCommit?: string;
}

/**
 * Derived tree node; rebuilt from the relationship store on every use
 */
export interface TreeNode {
  branch: BranchRecord;
  /** False for a trunk root synthesized from a parent name that has no record */
  tracked: boolean;
  children: TreeNode[];
}

export type SyncStatus = 'up-to-date' | 'updated' | 'conflict';

export interface SyncOutcome {
  branch: string;
  parent: string;
  status: SyncStatus;
  pushed: boolean;
  conflictFiles: string[];
}

export interface SyncOptions {
  /** Sync only the checked-out branch, without descending */
  currentOnly?: boolean;
  /** Rebase the stack onto the latest upstream trunk commit */
  trunk?: boolean;
  noPush?: boolean;
  /** Re-parent the checked-out branch before syncing */
  parentOverride?: string;
}

export interface SyncReporter {
  outcome(outcome: SyncOutcome): void;
  warn(message: string): void;
}

export interface SyncRunResult {
  status: 'complete' | 'conflict';
  outcomes: SyncOutcome[];
}

/**
 * A branch still to walk. `onto` pins the commit to rebase onto, used by
 * trunk syncs so every first-level branch lands on the same upstream tip.
 */
export interface FrontierEntry {
  branch: string;
  onto?: string;
}

/**
 * Recorded when a sync halts on a conflict, consumed by `sync --continue`
 */
export interface PendingSync {
  originalBranch: string;
  options: SyncOptions;
  conflict: {
    branch: string;
    parent: string;
    parentTip: string;
  };
  frontier: FrontierEntry[];
  createdAt: string;
}
