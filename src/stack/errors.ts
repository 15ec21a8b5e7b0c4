/**
 * Stack error types using neverthrow for Rust-style error handling
 */

import { err, ok, Result } from 'neverthrow';

/**
 * All possible error codes for stack operations
 */
export type StackErrorCode =
  | 'NOT_IN_REPO'
  | 'DETACHED_HEAD'
  | 'INVALID_ARGUMENT'
  | 'INVALID_TRUNK_OPTION'
  | 'BRANCH_NOT_FOUND'
  | 'BRANCH_EXISTS'
  | 'NOT_TRACKED'
  | 'CYCLE_DETECTED'
  | 'DIRTY_WORKTREE'
  | 'NOTHING_TO_SYNC'
  | 'SYNC_IN_PROGRESS'
  | 'NO_PENDING_SYNC'
  | 'UNRESOLVED_CONFLICTS'
  | 'CONFIG_ERROR'
  | 'GIT_ERROR';

/**
 * Structured error for stack operations
 */
export class StackError extends Error {
  constructor(
    public readonly code: StackErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'StackError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    let output = this.message;
    if (this.suggestion) {
      output += `\n\nSuggestion: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Result type alias for stack operations
 */
export type StackResult<T> = Result<T, StackError>;

/**
 * Helper to create a successful result
 */
export const stackOk = <T>(value: T): StackResult<T> => ok(value);

/**
 * Helper to create an error result
 */
export const stackErr = <T = never>(
  code: StackErrorCode,
  message: string,
  details?: Record<string, unknown>,
  suggestion?: string
): StackResult<T> => err(new StackError(code, message, details, suggestion));

/** Where a halted sync is recorded; deleting it drops the halted sync */
const PENDING_SYNC_PATH = '<git-dir>/git-stack/pending-sync.json';

/**
 * Common error constructors for consistent error messages
 */
export const StackErrors = {
  notInRepo: () =>
    stackErr(
      'NOT_IN_REPO',
      'Not in a git repository',
      undefined,
      'Run this command from within a git repository'
    ),

  detachedHead: () =>
    stackErr(
      'DETACHED_HEAD',
      'HEAD is detached',
      undefined,
      'Checkout a branch first'
    ),

  invalidArgument: (message: string) => stackErr('INVALID_ARGUMENT', message),

  invalidTrunkOption: (branch: string) =>
    stackErr(
      'INVALID_TRUNK_OPTION',
      `Cannot sync trunk into '${branch}': it is not at the root of its stack`,
      { branch },
      "Run 'git-stack sync --trunk' without --current, or from a branch whose parent is the trunk"
    ),

  branchNotFound: (branch: string) =>
    stackErr(
      'BRANCH_NOT_FOUND',
      `Branch '${branch}' not found`,
      { branch },
      `Create the branch first with 'git checkout -b ${branch}'`
    ),

  branchExists: (branch: string) =>
    stackErr(
      'BRANCH_EXISTS',
      `Branch '${branch}' already exists`,
      { branch },
      'Choose a different branch name'
    ),

  notTracked: (branch: string) =>
    stackErr(
      'NOT_TRACKED',
      `Branch '${branch}' is not part of any stack`,
      { branch },
      "Create stacked branches with 'git-stack branch <name>'"
    ),

  cycleDetected: (branch: string, chain: string[]) =>
    stackErr(
      'CYCLE_DETECTED',
      `Branch '${branch}' would become its own ancestor (${chain.join(' -> ')})`,
      { branch, chain },
      'Pick a parent that is not stacked on top of this branch'
    ),

  dirtyWorktree: () =>
    stackErr(
      'DIRTY_WORKTREE',
      'Refusing to continue: there are uncommitted changes in the working tree',
      undefined,
      'Commit or stash your changes first'
    ),

  nothingToSync: (branch: string) =>
    stackErr(
      'NOTHING_TO_SYNC',
      `No branches to sync in the stack rooted at '${branch}'`,
      { branch }
    ),

  syncInProgress: (branch: string) =>
    stackErr(
      'SYNC_IN_PROGRESS',
      `A previous sync halted on a conflict in '${branch}'`,
      { branch },
      "Resolve the conflict, then run 'git-stack sync --continue'. " +
        `If the rebase was aborted, delete ${PENDING_SYNC_PATH} instead`
    ),

  noPendingSync: () =>
    stackErr(
      'NO_PENDING_SYNC',
      'There is no halted sync to continue',
      undefined,
      "Start a new sync with 'git-stack sync'"
    ),

  unresolvedConflicts: (branch: string, files: string[]) =>
    stackErr(
      'UNRESOLVED_CONFLICTS',
      files.length > 0
        ? `Branch '${branch}' still has unresolved conflicts in: ${files.join(', ')}`
        : `The rebase of '${branch}' has not been completed`,
      { branch, files },
      files.length > 0
        ? "Resolve the conflicts, 'git add' the files and run 'git rebase --continue'"
        : "Finish the rebase with 'git rebase --continue'. " +
            `If it was aborted, delete ${PENDING_SYNC_PATH} to drop the halted sync`
    ),

  gitError: (operation: string, message: string, branch?: string) =>
    stackErr(
      'GIT_ERROR',
      branch
        ? `Git ${operation} failed for branch '${branch}': ${message}`
        : `Git ${operation} failed: ${message}`,
      { operation, branch }
    ),

  configError: <T = never>(message: string): StackResult<T> =>
    stackErr('CONFIG_ERROR', `Configuration error: ${message}`),
};
