/**
 * Move the checkout up and down the current stack
 */

import { err } from 'neverthrow';
import { type IGitOperations, defaultGitOps } from '../git/interface.js';
import { type StackResult, StackErrors, stackOk } from './errors.js';
import { type TreeBuilder, findNode, pathTo } from './tree.js';
import type { TreeNode } from './types.js';

export interface NavigationResult {
  from: string;
  to: string;
}

/**
 * Parse a step count argument; absent means one step
 */
export function parseStepCount(raw?: string): StackResult<number> {
  if (raw === undefined) {
    return stackOk(1);
  }
  if (!/^\d+$/.test(raw) || Number.parseInt(raw, 10) < 1) {
    return StackErrors.invalidArgument(`Step count must be a positive integer, got '${raw}'`);
  }
  return stackOk(Number.parseInt(raw, 10));
}

export class StackNavigator {
  private readonly git: IGitOperations;

  constructor(
    private readonly repoRoot: string,
    private readonly trees: TreeBuilder,
    gitOps?: IGitOperations
  ) {
    this.git = gitOps || defaultGitOps;
  }

  /**
   * Check out the branch `steps` levels below the current one
   */
  async next(steps = 1): Promise<StackResult<NavigationResult>> {
    return this.move(steps, (root, current) => {
      let node = findNode(root, current);
      if (!node) {
        return StackErrors.notTracked(current);
      }

      for (let i = 0; i < steps; i++) {
        const children: TreeNode[] = node.children;
        if (children.length === 0) {
          return StackErrors.invalidArgument(
            `Cannot move ${steps} step(s) forward: '${node.branch.name}' has no children`
          );
        }
        if (children.length > 1) {
          const names = children.map((c) => c.branch.name).join(', ');
          return StackErrors.invalidArgument(
            `'${node.branch.name}' has several children (${names}); check one out directly`
          );
        }
        node = children[0];
      }
      return stackOk(node.branch.name);
    });
  }

  /**
   * Check out the branch `steps` levels above the current one
   */
  async prev(steps = 1): Promise<StackResult<NavigationResult>> {
    return this.move(steps, (root, current) => {
      const path = pathTo(root, current);
      if (!path) {
        return StackErrors.notTracked(current);
      }

      const target = path.length - 1 - steps;
      if (target < 0) {
        return StackErrors.invalidArgument(
          `Cannot move ${steps} step(s) back: '${current}' is ${path.length - 1} level(s) above '${root.branch.name}'`
        );
      }
      return stackOk(path[target].branch.name);
    });
  }

  private async move(
    steps: number,
    pickTarget: (root: TreeNode, current: string) => StackResult<string>
  ): Promise<StackResult<NavigationResult>> {
    if (!Number.isInteger(steps) || steps < 1) {
      return StackErrors.invalidArgument(`Step count must be a positive integer, got '${steps}'`);
    }

    const status = await this.git.getStatus(this.repoRoot);
    if (status.isErr()) {
      return StackErrors.gitError('status', status.error.message);
    }
    if (status.value.dirty) {
      return StackErrors.dirtyWorktree();
    }

    const current = await this.git.getCurrentBranch(this.repoRoot);
    if (!current) {
      return StackErrors.detachedHead();
    }

    const root = await this.trees.getCurrentRoot();
    if (root.isErr()) return err(root.error);

    const target = pickTarget(root.value, current);
    if (target.isErr()) return err(target.error);

    const checkout = await this.git.checkout(target.value, this.repoRoot);
    if (checkout.isErr()) {
      return StackErrors.gitError('checkout', checkout.error.message, target.value);
    }

    return stackOk({ from: current, to: target.value });
  }
}
