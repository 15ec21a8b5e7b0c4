/**
 * Git operations interface for dependency injection
 *
 * This interface allows mocking git operations in tests.
 */

import type {
  GitStatus,
  RebaseRequest,
  RebaseResult,
  RebaseState,
} from './types.js';
import { type GitResult, GitOperations } from './operations.js';

export type { GitResult };

export interface GitExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface IGitOperations {
  exec(args: string[], cwd?: string): Promise<GitExecResult>;
  execResult(args: string[], cwd?: string): Promise<GitResult<string>>;
  branchExists(branch: string, cwd?: string): Promise<boolean>;
  getCurrentBranch(cwd?: string): Promise<string | null>;
  getCommit(ref: string, cwd?: string): Promise<GitResult<string>>;
  getStatus(cwd?: string): Promise<GitResult<GitStatus>>;
  isAncestor(commitA: string, commitB: string, cwd?: string): Promise<boolean>;
  checkout(branch: string, cwd?: string): Promise<GitResult<void>>;
  checkoutNewBranch(branch: string, cwd?: string): Promise<GitResult<void>>;
  deleteBranch(branch: string, force?: boolean, cwd?: string): Promise<GitResult<void>>;
  rebase(request: RebaseRequest, cwd?: string): Promise<GitResult<RebaseResult>>;
  getRebaseState(cwd?: string): Promise<GitResult<RebaseState>>;
  pushForce(branch: string, remote?: string, cwd?: string): Promise<GitResult<void>>;
  resolveUpstreamTip(trunk: string, remote?: string, cwd?: string): Promise<GitResult<string>>;
}

/**
 * Default implementation using the real GitOperations
 */
export const defaultGitOps: IGitOperations = {
  exec: (args, cwd) => GitOperations.exec(args, cwd),
  execResult: (args, cwd) => GitOperations.execResult(args, cwd),
  branchExists: (branch, cwd) => GitOperations.branchExists(branch, cwd),
  getCurrentBranch: (cwd) => GitOperations.getCurrentBranch(cwd),
  getCommit: (ref, cwd) => GitOperations.getCommit(ref, cwd),
  getStatus: (cwd) => GitOperations.getStatus(cwd),
  isAncestor: (commitA, commitB, cwd) => GitOperations.isAncestor(commitA, commitB, cwd),
  checkout: (branch, cwd) => GitOperations.checkout(branch, cwd),
  checkoutNewBranch: (branch, cwd) => GitOperations.checkoutNewBranch(branch, cwd),
  deleteBranch: (branch, force, cwd) => GitOperations.deleteBranch(branch, force, cwd),
  rebase: (request, cwd) => GitOperations.rebase(request, cwd),
  getRebaseState: (cwd) => GitOperations.getRebaseState(cwd),
  pushForce: (branch, remote, cwd) => GitOperations.pushForce(branch, remote, cwd),
  resolveUpstreamTip: (trunk, remote, cwd) => GitOperations.resolveUpstreamTip(trunk, remote, cwd),
};
