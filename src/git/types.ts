/**
 * Core type definitions for git operations
 */

export interface GitStatus {
  branch: string;
  dirty: boolean;
  staged: number;
  unstaged: number;
  unmerged: string[];
}

export interface Repository {
  root: string;
  name: string;
}

export type RebaseStatus = 'up-to-date' | 'updated' | 'conflict';

export interface RebaseRequest {
  branch: string;
  /** Commit the branch's own commits are replayed onto */
  onto: string;
  /** Exclusive lower bound of the commits to replay; git picks the merge-base when omitted */
  upstream?: string;
}

export interface RebaseResult {
  status: RebaseStatus;
  head: string;
  conflictFiles: string[];
}

export interface RebaseState {
  inProgress: boolean;
  unmergedPaths: string[];
}

export class GitError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number
  ) {
    super(message);
    this.name = 'GitError';
  }
}
