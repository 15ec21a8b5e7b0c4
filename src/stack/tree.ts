/**
 * Assemble the forest of stacks from the relationship store
 */

import { err } from 'neverthrow';
import { type IGitOperations, defaultGitOps } from '../git/interface.js';
import { type StackResult, StackErrors, stackOk } from './errors.js';
import type { RelationshipStore } from './store.js';
import type { BranchRecord, TreeNode } from './types.js';

/**
 * Build the forest from records given in insertion order. A record without a
 * parent is a root; a parent name without a record becomes a trunk root.
 * Children keep the insertion order of their records.
 */
export function buildForestFromRecords(records: readonly BranchRecord[]): TreeNode[] {
  const nodes = new Map<string, TreeNode>();
  for (const record of records) {
    nodes.set(record.name, { branch: record, tracked: true, children: [] });
  }

  const roots: TreeNode[] = [];
  const trunkRoots = new Map<string, TreeNode>();

  for (const record of records) {
    const node = nodes.get(record.name);
    if (!node) continue;

    if (!record.parent) {
      roots.push(node);
      continue;
    }

    const parentNode = nodes.get(record.parent);
    if (parentNode) {
      parentNode.children.push(node);
      continue;
    }

    let trunk = trunkRoots.get(record.parent);
    if (!trunk) {
      trunk = { branch: { name: record.parent }, tracked: false, children: [] };
      trunkRoots.set(record.parent, trunk);
      roots.push(trunk);
    }
    trunk.children.push(node);
  }

  return roots;
}

/**
 * Visit every node in pre-order
 */
export function walkTree(
  root: TreeNode,
  visit: (node: TreeNode, depth: number) => void,
  depth = 0
): void {
  visit(root, depth);
  for (const child of root.children) {
    walkTree(child, visit, depth + 1);
  }
}

/**
 * Find a branch in a tree
 */
export function findNode(root: TreeNode, branchName: string): TreeNode | null {
  if (root.branch.name === branchName) {
    return root;
  }
  for (const child of root.children) {
    const found = findNode(child, branchName);
    if (found) return found;
  }
  return null;
}

/**
 * Nodes from the root down to a branch, or null when the branch is not in the tree
 */
export function pathTo(root: TreeNode, branchName: string): TreeNode[] | null {
  if (root.branch.name === branchName) {
    return [root];
  }
  for (const child of root.children) {
    const path = pathTo(child, branchName);
    if (path) return [root, ...path];
  }
  return null;
}

export class TreeBuilder {
  private readonly git: IGitOperations;

  constructor(
    private readonly repoRoot: string,
    private readonly store: RelationshipStore,
    gitOps?: IGitOperations
  ) {
    this.git = gitOps || defaultGitOps;
  }

  /**
   * Build every stack from the current records
   */
  async buildForest(): Promise<StackResult<TreeNode[]>> {
    const recordsResult = await this.store.loadAll();
    if (recordsResult.isErr()) return err(recordsResult.error);

    const records = recordsResult.value;
    const forest = buildForestFromRecords(records);

    // Records that never reach a root form a cycle
    const reachable = new Set<string>();
    for (const root of forest) {
      walkTree(root, (node) => {
        if (node.tracked) reachable.add(node.branch.name);
      });
    }

    const orphan = records.find((r) => !reachable.has(r.name));
    if (orphan) {
      return StackErrors.cycleDetected(orphan.name, collectCycle(records, orphan.name));
    }

    return stackOk(forest);
  }

  /**
   * The stack containing the checked-out branch
   */
  async getCurrentRoot(): Promise<StackResult<TreeNode>> {
    const current = await this.git.getCurrentBranch(this.repoRoot);
    if (!current) {
      return StackErrors.detachedHead();
    }

    const forestResult = await this.buildForest();
    if (forestResult.isErr()) return err(forestResult.error);

    for (const root of forestResult.value) {
      if (findNode(root, current)) {
        return stackOk(root);
      }
    }

    // A trunk with nothing stacked on it yet
    if (this.store.isTrunk(current)) {
      return stackOk({ branch: { name: current }, tracked: false, children: [] });
    }

    return StackErrors.notTracked(current);
  }
}

function collectCycle(records: readonly BranchRecord[], start: string): string[] {
  const parents = new Map(records.map((r) => [r.name, r.parent]));
  const chain = [start];
  const seen = new Set<string>([start]);
  let cursor = parents.get(start);
  while (cursor) {
    chain.push(cursor);
    if (seen.has(cursor)) break;
    seen.add(cursor);
    cursor = parents.get(cursor);
  }
  return chain;
}
