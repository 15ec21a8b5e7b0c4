/**
 * Pending sync store
 *
 * When a sync halts on a conflict, the work still to do is recorded here so
 * `sync --continue` can pick it up after the operator resolves the conflict.
 * The file lives inside the git directory, next to git's own rebase state.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { Result, ResultAsync } from 'neverthrow';
import { type StackResult, StackErrors, stackOk } from './errors.js';
import type { FrontierEntry, PendingSync, SyncOptions } from './types.js';

export const PENDING_SYNC_FILE = join('git-stack', 'pending-sync.json');

export interface IPendingSyncStore {
  load(): Promise<StackResult<PendingSync | null>>;
  save(pending: PendingSync): Promise<StackResult<void>>;
  clear(): Promise<StackResult<void>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

function isOptionalBoolean(value: unknown): boolean {
  return value === undefined || typeof value === 'boolean';
}

function isSyncOptions(value: unknown): value is SyncOptions {
  return (
    isRecord(value) &&
    isOptionalBoolean(value.currentOnly) &&
    isOptionalBoolean(value.trunk) &&
    isOptionalBoolean(value.noPush) &&
    isOptionalString(value.parentOverride)
  );
}

function isFrontierEntry(value: unknown): value is FrontierEntry {
  return isRecord(value) && typeof value.branch === 'string' && isOptionalString(value.onto);
}

/**
 * Validate a pending sync read from disk
 */
export function validatePendingSync(value: unknown): value is PendingSync {
  if (!isRecord(value)) return false;

  const { originalBranch, options, conflict, frontier, createdAt } = value;
  if (typeof originalBranch !== 'string' || typeof createdAt !== 'string') return false;
  if (!isSyncOptions(options)) return false;
  if (
    !isRecord(conflict) ||
    typeof conflict.branch !== 'string' ||
    typeof conflict.parent !== 'string' ||
    typeof conflict.parentTip !== 'string'
  ) {
    return false;
  }
  return Array.isArray(frontier) && frontier.every(isFrontierEntry);
}

export class FilePendingSyncStore implements IPendingSyncStore {
  private readonly filePath: string;

  constructor(gitDir: string) {
    this.filePath = join(gitDir, PENDING_SYNC_FILE);
  }

  async load(): Promise<StackResult<PendingSync | null>> {
    if (!existsSync(this.filePath)) {
      return stackOk<PendingSync | null>(null);
    }

    const parsed = await ResultAsync.fromPromise(readFile(this.filePath, 'utf8'), describe).andThen(
      (raw) => Result.fromThrowable((): unknown => JSON.parse(raw), describe)()
    );

    if (parsed.isErr()) {
      return StackErrors.configError(`cannot read ${this.filePath}: ${parsed.error}`);
    }
    if (!validatePendingSync(parsed.value)) {
      return StackErrors.configError(`${this.filePath} is not a valid pending sync`);
    }
    return stackOk(parsed.value);
  }

  async save(pending: PendingSync): Promise<StackResult<void>> {
    const tmpPath = `${this.filePath}.tmp`;
    const written = await ResultAsync.fromPromise(
      (async () => {
        await mkdir(dirname(this.filePath), { recursive: true });
        await writeFile(tmpPath, JSON.stringify(pending, null, 2) + '\n', 'utf8');
        await rename(tmpPath, this.filePath);
      })(),
      describe
    );

    if (written.isErr()) {
      return StackErrors.configError(`cannot write ${this.filePath}: ${written.error}`);
    }
    return stackOk(undefined);
  }

  async clear(): Promise<StackResult<void>> {
    const removed = await ResultAsync.fromPromise(rm(this.filePath, { force: true }), describe);
    if (removed.isErr()) {
      return StackErrors.configError(`cannot remove ${this.filePath}: ${removed.error}`);
    }
    return stackOk(undefined);
  }
}

/**
 * In-memory implementation, for callers that do not need persistence
 */
export class InMemoryPendingSyncStore implements IPendingSyncStore {
  private pending: PendingSync | null = null;

  async load(): Promise<StackResult<PendingSync | null>> {
    return stackOk(this.pending);
  }

  async save(pending: PendingSync): Promise<StackResult<void>> {
    this.pending = structuredClone(pending);
    return stackOk(undefined);
  }

  async clear(): Promise<StackResult<void>> {
    this.pending = null;
    return stackOk(undefined);
  }
}

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
