/**
 * Low-level git command wrappers using neverthrow Result types
 */

import { existsSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import { execa } from 'execa';
import { ok, err, type Result } from 'neverthrow';
import { GitParser } from './parser.js';
import {
  GitError,
  type GitStatus,
  type RebaseRequest,
  type RebaseResult,
  type RebaseState,
  type Repository,
} from './types.js';

export type GitResult<T> = Result<T, GitError>;

export class GitOperations {
  /**
   * Execute a git command and return stdout
   */
  static async exec(
    args: string[],
    cwd?: string
  ): Promise<{ stdout: string; stderr: string; exitCode: number }> {
    const result = await execa('git', args, {
      cwd: cwd || process.cwd(),
      reject: false,
      stdin: 'ignore',
      env: { GIT_TERMINAL_PROMPT: '0', GIT_EDITOR: 'true' },
    });

    return {
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode ?? 1,
    };
  }

  /**
   * Execute a git command and return Result
   */
  static async execResult(args: string[], cwd?: string): Promise<GitResult<string>> {
    const result = await this.exec(args, cwd);
    if (result.exitCode !== 0) {
      return err(
        new GitError(
          result.stderr.trim() || 'Git command failed',
          `git ${args.join(' ')}`,
          result.exitCode
        )
      );
    }
    return ok(result.stdout.trim());
  }

  /**
   * Check if we're in a git repository
   */
  static async isGitRepository(cwd?: string): Promise<boolean> {
    const result = await this.execResult(['rev-parse', '--git-dir'], cwd);
    return result.isOk();
  }

  /**
   * Get repository root and name
   */
  static async getRepository(cwd?: string): Promise<GitResult<Repository>> {
    const result = await this.execResult(['rev-parse', '--show-toplevel'], cwd);
    return result.map((root) => ({
      root,
      name: basename(root) || 'unknown',
    }));
  }

  /**
   * Absolute path of the repository's .git directory
   */
  static async getGitDir(cwd?: string): Promise<GitResult<string>> {
    return this.execResult(['rev-parse', '--absolute-git-dir'], cwd);
  }

  /**
   * Check if a branch exists locally
   */
  static async branchExists(branch: string, cwd?: string): Promise<boolean> {
    const result = await this.execResult(
      ['show-ref', '--verify', '--quiet', `refs/heads/${branch}`],
      cwd
    );
    return result.isOk();
  }

  /**
   * Check if a branch exists on remote
   */
  static async remoteBranchExists(
    branch: string,
    remote = 'origin',
    cwd?: string
  ): Promise<boolean> {
    const result = await this.execResult(
      ['show-ref', '--verify', '--quiet', `refs/remotes/${remote}/${branch}`],
      cwd
    );
    return result.isOk();
  }

  /**
   * Check if a remote is configured
   */
  static async remoteExists(remote: string, cwd?: string): Promise<boolean> {
    const result = await this.execResult(['remote', 'get-url', remote], cwd);
    return result.isOk();
  }

  /**
   * Get current branch name, or null when HEAD is detached
   */
  static async getCurrentBranch(cwd?: string): Promise<string | null> {
    const result = await this.execResult(['symbolic-ref', '--quiet', 'HEAD'], cwd);
    return result.isOk() && result.value
      ? GitParser.normalizeBranchName(result.value)
      : null;
  }

  /**
   * Get status of the working tree, ignoring untracked files
   */
  static async getStatus(cwd?: string): Promise<GitResult<GitStatus>> {
    const branch = await this.getCurrentBranch(cwd);
    const result = await this.execResult(
      ['status', '--porcelain=v1', '--untracked-files=no'],
      cwd
    );
    return result.map((output) => GitParser.parseStatus(output, branch ?? 'HEAD'));
  }

  /**
   * Delete a branch
   */
  static async deleteBranch(
    branch: string,
    force = false,
    cwd?: string
  ): Promise<GitResult<void>> {
    const flag = force ? '-D' : '-d';
    const result = await this.execResult(['branch', flag, branch], cwd);
    return result.map(() => undefined);
  }

  /**
   * Checkout a branch
   */
  static async checkout(branch: string, cwd?: string): Promise<GitResult<void>> {
    const result = await this.execResult(['checkout', branch], cwd);
    return result.map(() => undefined);
  }

  /**
   * Create a new branch at HEAD and checkout
   */
  static async checkoutNewBranch(branch: string, cwd?: string): Promise<GitResult<void>> {
    const result = await this.execResult(['checkout', '-b', branch], cwd);
    return result.map(() => undefined);
  }

  /**
   * Fetch from remote
   */
  static async fetch(remote = '--all', ref?: string, cwd?: string): Promise<GitResult<void>> {
    const args = ['fetch', remote];
    if (ref) {
      args.push(ref);
    }
    const result = await this.execResult(args, cwd);
    return result.map(() => undefined);
  }

  /**
   * Push to remote with force-with-lease
   */
  static async pushForce(branch: string, remote = 'origin', cwd?: string): Promise<GitResult<void>> {
    const result = await this.execResult(
      ['push', '--force-with-lease', remote, branch],
      cwd
    );
    return result.map(() => undefined);
  }

  /**
   * Get full commit hash
   */
  static async getCommit(ref = 'HEAD', cwd?: string): Promise<GitResult<string>> {
    return this.execResult(['rev-parse', '--verify', `${ref}^{commit}`], cwd);
  }

  /**
   * Check if commit A is an ancestor of (or equal to) commit B
   */
  static async isAncestor(commitA: string, commitB: string, cwd?: string): Promise<boolean> {
    const result = await this.exec(['merge-base', '--is-ancestor', commitA, commitB], cwd);
    return result.exitCode === 0;
  }

  /**
   * Latest commit of the upstream trunk: fetched from the remote when one is
   * configured, otherwise the local trunk.
   */
  static async resolveUpstreamTip(
    trunk: string,
    remote = 'origin',
    cwd?: string
  ): Promise<GitResult<string>> {
    if (!(await this.remoteExists(remote, cwd))) {
      return this.getCommit(trunk, cwd);
    }

    const fetchResult = await this.fetch(remote, trunk, cwd);
    if (fetchResult.isErr()) {
      return err(fetchResult.error);
    }

    if (await this.remoteBranchExists(trunk, remote, cwd)) {
      return this.getCommit(`refs/remotes/${remote}/${trunk}`, cwd);
    }
    return this.getCommit(trunk, cwd);
  }

  /**
   * Whether a rebase is halted in this repository, and which paths are unmerged
   */
  static async getRebaseState(cwd?: string): Promise<GitResult<RebaseState>> {
    const base = cwd || process.cwd();
    let inProgress = false;

    for (const dir of ['rebase-merge', 'rebase-apply']) {
      const pathResult = await this.execResult(['rev-parse', '--git-path', dir], cwd);
      if (pathResult.isErr()) {
        return err(pathResult.error);
      }
      if (existsSync(resolve(base, pathResult.value))) {
        inProgress = true;
      }
    }

    const unmerged = await this.execResult(['diff', '--name-only', '--diff-filter=U'], cwd);
    return unmerged.map((output) => ({
      inProgress,
      unmergedPaths: GitParser.parsePathList(output),
    }));
  }

  /**
   * Rebase a branch onto a commit. A halted rebase is left in place and
   * reported as a conflict; any other failure is an error.
   */
  static async rebase(request: RebaseRequest, cwd?: string): Promise<GitResult<RebaseResult>> {
    const before = await this.getCommit(request.branch, cwd);
    if (before.isErr()) {
      return err(before.error);
    }

    const args = request.upstream
      ? ['rebase', '--onto', request.onto, request.upstream, request.branch]
      : ['rebase', request.onto, request.branch];

    const result = await this.exec(args, cwd);

    if (result.exitCode !== 0) {
      const state = await this.getRebaseState(cwd);
      if (state.isOk() && state.value.inProgress) {
        const conflict: RebaseResult = {
          status: 'conflict',
          head: before.value,
          conflictFiles: state.value.unmergedPaths,
        };
        return ok(conflict);
      }

      return err(
        new GitError(
          result.stderr.trim() || 'Rebase failed',
          `git ${args.join(' ')}`,
          result.exitCode
        )
      );
    }

    const after = await this.getCommit(request.branch, cwd);
    return after.map((head): RebaseResult => ({
      status: head === before.value ? 'up-to-date' : 'updated',
      head,
      conflictFiles: [],
    }));
  }
}
