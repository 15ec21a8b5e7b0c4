/**
 * Tree command - show every stack in the repository
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { GitOperations } from '../git/operations.js';
import { StackVisualizer } from '../stack/visualizer.js';
import { openRepository } from './context.js';

export async function treeCommand(): Promise<void> {
  const { repo, trees } = await openRepository();

  const forest = await trees.buildForest();
  if (forest.isErr()) {
    clack.cancel(forest.error.format());
    process.exit(1);
  }

  if (forest.value.length === 0) {
    console.log('');
    console.log(pc.dim('No stacks yet.'));
    console.log(pc.dim('Create one with: ') + pc.cyan('git-stack branch <name>'));
    console.log('');
    return;
  }

  const currentBranch = await GitOperations.getCurrentBranch(repo.root);
  const visualizer = new StackVisualizer();

  console.log('');
  for (const line of visualizer.visualizeForest(forest.value, currentBranch)) {
    console.log(line);
  }
  console.log('');
}
