/**
 * Tests for BranchCreator
 */

import { describe, expect, test, beforeEach } from 'vitest';
import { BranchCreator } from '../stack/creator.js';
import { RelationshipStore } from '../stack/store.js';
import { TreeBuilder } from '../stack/tree.js';
import { renderTree } from '../stack/visualizer.js';
import { FakeGit } from './fake-git.js';

describe('BranchCreator', () => {
  let git: FakeGit;
  let store: RelationshipStore;
  let creator: BranchCreator;

  beforeEach(() => {
    git = new FakeGit();
    store = new RelationshipStore('/repo', git);
    creator = new BranchCreator('/repo', store, git);
  });

  test('stacks the new branch on the current one and checks it out', async () => {
    const mainTip = git.tip('main');

    const created = (await creator.createBranch('feature-1'))._unsafeUnwrap();

    expect(created).toEqual({
      record: { name: 'feature-1', parent: 'main', parentSyncedCommit: mainTip },
      commit: mainTip,
    });
    expect(git.current).toBe('feature-1');
    expect(git.tip('feature-1')).toBe(mainTip);
  });

  test('a branch created on feature-1 renders nested under it', async () => {
    await creator.createBranch('feature-1');
    git.commit('feature-1', 'one');

    const created = (await creator.createBranch('feature-x'))._unsafeUnwrap();
    expect(created.record.parent).toBe('feature-1');

    const root = (await new TreeBuilder('/repo', store, git).getCurrentRoot())._unsafeUnwrap();
    expect(renderTree(root)).toBe('main\n    feature-1\n        feature-x\n');
  });

  test('records an explicit parent', async () => {
    await creator.createBranch('feature-1');
    git.commit('feature-1', 'one');

    const created = (await creator.createBranch('side', 'main'))._unsafeUnwrap();

    expect(created.record.parent).toBe('main');
    expect(created.record.parentSyncedCommit).toBe(git.tip('main'));
    expect(created.commit).toBe(git.tip('feature-1'));
  });

  test('skips the watermark when the current commit does not contain the parent tip', async () => {
    git.branches.set('develop', git.tip('main'));
    git.commit('develop', 'develop only');

    const created = (await creator.createBranch('side', 'develop'))._unsafeUnwrap();

    expect(created.record).toEqual({ name: 'side', parent: 'develop' });
  });

  test('fails when the branch already exists', async () => {
    git.branches.set('taken', git.tip('main'));

    const error = (await creator.createBranch('taken'))._unsafeUnwrapErr();

    expect(error.code).toBe('BRANCH_EXISTS');
    expect(error.message).toBe("Branch 'taken' already exists");
    expect(git.ops).toEqual([]);
  });

  test('fails when a record already exists for the name', async () => {
    await store.setParent('ghost', 'main');

    const error = (await creator.createBranch('ghost'))._unsafeUnwrapErr();

    expect(error.code).toBe('BRANCH_EXISTS');
    expect(git.branches.has('ghost')).toBe(false);
  });

  test('rejects an invalid branch name', async () => {
    const error = (await creator.createBranch('bad..name'))._unsafeUnwrapErr();

    expect(error.code).toBe('INVALID_ARGUMENT');
    expect(error.message).toBe("'bad..name' is not a valid branch name");
  });

  test('fails on a detached HEAD without an explicit parent', async () => {
    git.current = null;

    expect((await creator.createBranch('feature-1'))._unsafeUnwrapErr().code).toBe('DETACHED_HEAD');
  });

  test('fails for an unknown parent', async () => {
    const error = (await creator.createBranch('feature-1', 'nowhere'))._unsafeUnwrapErr();

    expect(error.code).toBe('BRANCH_NOT_FOUND');
    expect(git.branches.has('feature-1')).toBe(false);
  });

  test('rolls back the branch when the record cannot be written', async () => {
    git.failConfigWrites = true;

    const error = (await creator.createBranch('feature-1'))._unsafeUnwrapErr();

    expect(error.code).toBe('CONFIG_ERROR');
    expect(git.branches.has('feature-1')).toBe(false);
    expect(git.current).toBe('main');
    expect(git.ops).toEqual(['checkout -b feature-1', 'checkout main', 'delete feature-1']);
  });
});
