/**
 * Branch command - create a new branch stacked on the current one
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { BranchCreator } from '../stack/creator.js';
import { findNode } from '../stack/tree.js';
import { renderTree } from '../stack/visualizer.js';
import { openRepository } from './context.js';

export interface BranchOptions {
  parent?: string;
}

export async function branchCommand(branchName: string, options: BranchOptions = {}): Promise<void> {
  const { repo, store, trees } = await openRepository();
  const spinner = clack.spinner();

  spinner.start('Creating branch...');

  const creator = new BranchCreator(repo.root, store);
  const result = await creator.createBranch(branchName, options.parent);
  if (result.isErr()) {
    spinner.stop('Failed');
    clack.cancel(result.error.format());
    process.exit(1);
  }

  spinner.stop('Branch created');

  const { record, commit } = result.value;
  console.log('');
  console.log(pc.green('✓') + ' Created branch ' + pc.cyan(pc.bold(record.name)));
  console.log('');
  console.log('  ' + pc.dim('Parent:') + '      ' + pc.yellow(record.parent ?? '(none)'));
  console.log('  ' + pc.dim('Base commit:') + ' ' + pc.dim(commit.slice(0, 7)));
  console.log('');

  // Show where the new branch landed
  const root = await trees.getCurrentRoot();
  if (root.isOk() && findNode(root.value, record.name)) {
    console.log(pc.dim('Stack:'));
    for (const line of renderTree(root.value).trimEnd().split('\n')) {
      console.log('  ' + line);
    }
    console.log('');
  }
}
