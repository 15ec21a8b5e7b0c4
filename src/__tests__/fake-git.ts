/**
 * In-memory repository implementing IGitOperations
 *
 * Branches point at commits with a single parent, so every history is linear.
 * Rebases replay commits with fresh ids. Config commands run against a
 * key/value map.
 */

import { ok, err } from 'neverthrow';
import type { GitExecResult, GitResult, IGitOperations } from '../git/interface.js';
import {
  GitError,
  type GitStatus,
  type RebaseRequest,
  type RebaseResult,
  type RebaseState,
} from '../git/types.js';

interface FakeCommit {
  id: string;
  parent: string | null;
  message: string;
}

interface HaltedRebase {
  request: RebaseRequest;
}

const BOOL_VALUES: Record<string, string> = {
  true: 'true',
  yes: 'true',
  on: 'true',
  '1': 'true',
  false: 'false',
  no: 'false',
  off: 'false',
  '0': 'false',
};

export class FakeGit implements IGitOperations {
  readonly commits = new Map<string, FakeCommit>();
  readonly branches = new Map<string, string>();
  readonly config = new Map<string, string[]>();
  current: string | null;
  dirty = false;

  /** Branches whose next rebase stops, with the files reported as unmerged */
  readonly conflicts = new Map<string, string[]>();
  /** Trunk tips served by resolveUpstreamTip, as if fetched from the remote */
  readonly upstreamTips = new Map<string, string>();
  readonly failingPushes = new Set<string>();
  failConfigWrites = false;

  readonly pushes: { branch: string; remote: string; commit: string }[] = [];
  readonly rebases: RebaseRequest[] = [];
  /** Every mutating operation, in order */
  readonly ops: string[] = [];

  private halted: HaltedRebase | null = null;
  private unmerged: string[] = [];
  private nextId = 1;

  constructor(trunk = 'main') {
    const root = this.makeCommit(null, 'initial');
    this.branches.set(trunk, root);
    this.current = trunk;
  }

  // ============ Test helpers ============

  /** Create a commit whose parent is `parent` without moving any branch */
  makeCommit(parent: string | null, message: string): string {
    const id = `c${this.nextId++}`;
    this.commits.set(id, { id, parent, message });
    return id;
  }

  /** Add a commit on top of a branch */
  commit(branch: string, message: string): string {
    const id = this.makeCommit(this.tip(branch), message);
    this.branches.set(branch, id);
    return id;
  }

  tip(branch: string): string {
    const id = this.branches.get(branch);
    if (!id) throw new Error(`no branch ${branch}`);
    return id;
  }

  /** Commit messages from the root commit to the branch tip */
  log(branch: string): string[] {
    return this.history(this.tip(branch))
      .map((c) => c.message)
      .reverse();
  }

  get rebaseInProgress(): boolean {
    return this.halted !== null;
  }

  /** Finish a halted rebase the way `git rebase --continue` would */
  resolveConflict(): void {
    if (!this.halted) throw new Error('no rebase in progress');
    this.applyRebase(this.halted.request);
    this.halted = null;
    this.unmerged = [];
  }

  /** Drop a halted rebase, leaving the branch where it was */
  abortRebase(): void {
    this.halted = null;
    this.unmerged = [];
  }

  /** Mark the conflicted files as staged while the rebase is still halted */
  stageConflicts(): void {
    this.unmerged = [];
  }

  // ============ IGitOperations ============

  async exec(args: string[]): Promise<GitExecResult> {
    const [cmd, ...rest] = args;

    if (cmd === 'config') {
      return this.execConfig(rest);
    }

    if (cmd === 'check-ref-format' && rest[0] === '--branch') {
      const name = rest[1] ?? '';
      const valid =
        /^[A-Za-z0-9._/-]+$/.test(name) &&
        !name.startsWith('-') &&
        !name.includes('..') &&
        !name.endsWith('/') &&
        !name.endsWith('.lock');
      return valid ? result(name + '\n') : result('', `fatal: '${name}' is not a valid branch name`, 128);
    }

    return result('', `unsupported: git ${args.join(' ')}`, 129);
  }

  async execResult(args: string[]): Promise<GitResult<string>> {
    const out = await this.exec(args);
    if (out.exitCode !== 0) {
      return err(new GitError(out.stderr || 'Git command failed', `git ${args.join(' ')}`, out.exitCode));
    }
    return ok(out.stdout.trim());
  }

  async branchExists(branch: string): Promise<boolean> {
    return this.branches.has(branch);
  }

  async getCurrentBranch(): Promise<string | null> {
    return this.current;
  }

  async getCommit(ref: string): Promise<GitResult<string>> {
    const id = this.resolve(ref);
    if (!id) {
      return err(new GitError(`fatal: Needed a single revision`, `git rev-parse --verify ${ref}`, 128));
    }
    return ok(id);
  }

  async getStatus(): Promise<GitResult<GitStatus>> {
    return ok({
      branch: this.current ?? 'HEAD',
      dirty: this.dirty || this.unmerged.length > 0,
      staged: 0,
      unstaged: this.dirty ? 1 : 0,
      unmerged: [...this.unmerged],
    });
  }

  async isAncestor(commitA: string, commitB: string): Promise<boolean> {
    const a = this.resolve(commitA);
    const b = this.resolve(commitB);
    if (!a || !b) return false;
    return this.history(b).some((c) => c.id === a);
  }

  async checkout(branch: string): Promise<GitResult<void>> {
    if (!this.branches.has(branch)) {
      return err(new GitError(`error: pathspec '${branch}' did not match`, `git checkout ${branch}`, 1));
    }
    this.ops.push(`checkout ${branch}`);
    this.current = branch;
    return ok(undefined);
  }

  async checkoutNewBranch(branch: string): Promise<GitResult<void>> {
    if (this.branches.has(branch)) {
      return err(new GitError(`fatal: a branch named '${branch}' already exists`, `git checkout -b ${branch}`, 128));
    }
    if (!this.current) {
      return err(new GitError('fatal: HEAD is detached', `git checkout -b ${branch}`, 128));
    }
    this.ops.push(`checkout -b ${branch}`);
    this.branches.set(branch, this.tip(this.current));
    this.current = branch;
    return ok(undefined);
  }

  async deleteBranch(branch: string): Promise<GitResult<void>> {
    if (!this.branches.delete(branch)) {
      return err(new GitError(`error: branch '${branch}' not found`, `git branch -D ${branch}`, 1));
    }
    this.ops.push(`delete ${branch}`);
    return ok(undefined);
  }

  async rebase(request: RebaseRequest): Promise<GitResult<RebaseResult>> {
    const before = this.resolve(request.branch);
    if (!before) {
      return err(new GitError('fatal: invalid upstream', `git rebase ${request.onto}`, 128));
    }

    this.ops.push(`rebase ${request.branch}`);
    this.rebases.push({ ...request });
    this.current = request.branch;

    const conflictFiles = this.conflicts.get(request.branch);
    if (conflictFiles) {
      this.conflicts.delete(request.branch);
      this.halted = { request: { ...request } };
      this.unmerged = [...conflictFiles];
      const conflict: RebaseResult = { status: 'conflict', head: before, conflictFiles: [...conflictFiles] };
      return ok(conflict);
    }

    const head = this.applyRebase(request);
    const rebased: RebaseResult = {
      status: head === before ? 'up-to-date' : 'updated',
      head,
      conflictFiles: [],
    };
    return ok(rebased);
  }

  async getRebaseState(): Promise<GitResult<RebaseState>> {
    return ok({ inProgress: this.halted !== null, unmergedPaths: [...this.unmerged] });
  }

  async pushForce(branch: string, remote = 'origin'): Promise<GitResult<void>> {
    if (this.failingPushes.has(branch)) {
      return err(new GitError('! [rejected] (stale info)', `git push --force-with-lease ${remote} ${branch}`, 1));
    }
    this.ops.push(`push ${branch}`);
    this.pushes.push({ branch, remote, commit: this.tip(branch) });
    return ok(undefined);
  }

  async resolveUpstreamTip(trunk: string, remote = 'origin'): Promise<GitResult<string>> {
    this.ops.push(`fetch ${remote} ${trunk}`);
    const fetched = this.upstreamTips.get(trunk);
    return fetched ? ok(fetched) : this.getCommit(trunk);
  }

  // ============ Internals ============

  private resolve(ref: string): string | null {
    return this.branches.get(ref) ?? (this.commits.has(ref) ? ref : null);
  }

  private history(id: string): FakeCommit[] {
    const chain: FakeCommit[] = [];
    let cursor: string | null = id;
    while (cursor) {
      const commit = this.commits.get(cursor);
      if (!commit) break;
      chain.push(commit);
      cursor = commit.parent;
    }
    return chain;
  }

  /**
   * Replay the branch's commits not reachable from `upstream` (or `onto`)
   * on top of `onto`, returning the new tip
   */
  private applyRebase(request: RebaseRequest): string {
    const onto = this.resolve(request.onto) ?? request.onto;
    const tip = this.tip(request.branch);
    const bound = this.resolve(request.upstream ?? request.onto) ?? onto;
    const base = new Set(this.history(bound).map((c) => c.id));

    const replay = this.history(tip)
      .filter((c) => !base.has(c.id))
      .reverse();

    // Already sitting directly on onto
    if (replay.length > 0 && replay[0].parent === onto) {
      return tip;
    }

    let head = onto;
    for (const c of replay) {
      head = this.makeCommit(head, c.message);
    }
    this.branches.set(request.branch, head);
    return head;
  }

  private execConfig(args: string[]): GitExecResult {
    let rest = args;
    let asBool = false;
    if (rest[0] === '--type=bool') {
      asBool = true;
      rest = rest.slice(1);
    }

    const [flag, key] = rest;

    switch (flag) {
      case '--get': {
        const values = this.config.get(key);
        if (!values || values.length === 0) return result('', '', 1);
        const last = values[values.length - 1];
        if (!asBool) return result(last + '\n');
        const normalized = BOOL_VALUES[last.toLowerCase()];
        return normalized
          ? result(normalized + '\n')
          : result('', `fatal: bad boolean config value '${last}' for '${key}'`, 128);
      }
      case '--get-all': {
        const values = this.config.get(key);
        if (!values || values.length === 0) return result('', '', 1);
        return result(values.join('\n') + '\n');
      }
      case '--get-regexp': {
        const pattern = new RegExp(key);
        const lines: string[] = [];
        for (const [k, values] of this.config) {
          if (!pattern.test(k)) continue;
          for (const v of values) lines.push(`${k} ${v}`);
        }
        return lines.length > 0 ? result(lines.join('\n') + '\n') : result('', '', 1);
      }
      case '--unset': {
        if (this.failConfigWrites) return result('', 'error: could not lock config file', 255);
        return this.config.delete(key) ? result('') : result('', '', 5);
      }
      default: {
        // config <key> <value>
        const [setKey, setValue, extra] = rest;
        if (setKey === undefined || setValue === undefined || extra !== undefined) {
          return result('', `unsupported: git config ${args.join(' ')}`, 129);
        }
        if (this.failConfigWrites) return result('', 'error: could not lock config file', 255);
        this.config.set(setKey, [setValue]);
        return result('');
      }
    }
  }
}

function result(stdout: string, stderr = '', exitCode = 0): GitExecResult {
  return { stdout, stderr, exitCode };
}
