/**
 * Render stacks as indented text
 */

import pc from 'picocolors';
import type { TreeNode } from './types.js';
import { ColorManager } from './colors.js';
import { walkTree } from './tree.js';

const INDENT = '    ';

/**
 * One line per branch in pre-order, indented four spaces per level
 */
export function renderTree(root: TreeNode): string {
  const lines: string[] = [];
  walkTree(root, (node, depth) => {
    lines.push(INDENT.repeat(depth) + node.branch.name);
  });
  return lines.join('\n') + '\n';
}

export class StackVisualizer {
  private colorManager: ColorManager;

  constructor(colorManager?: ColorManager) {
    this.colorManager = colorManager || new ColorManager();
  }

  /**
   * Visualize every stack, each in its own color, separated by blank lines
   */
  visualizeForest(roots: readonly TreeNode[], currentBranch: string | null): string[] {
    const lines: string[] = [];

    roots.forEach((root, i) => {
      if (i > 0) lines.push('');
      lines.push(...this.visualizeStack(root, currentBranch));
    });

    return lines;
  }

  private visualizeStack(root: TreeNode, currentBranch: string | null): string[] {
    const lines: string[] = [];
    const colorFn = this.colorManager.getColorForStack(root.branch.name);

    walkTree(root, (node, depth) => {
      const isCurrent = node.branch.name === currentBranch;
      const marker = isCurrent ? pc.bold(pc.green('● ')) : '  ';
      const name = isCurrent ? pc.bold(colorFn(node.branch.name)) : colorFn(node.branch.name);

      let line = marker + INDENT.repeat(depth) + name;
      if (!node.tracked) {
        line += pc.dim(' (trunk)');
      }
      lines.push(line);
    });

    return lines;
  }
}
