/**
 * Sync command - rebase every branch in the current stack onto its parent
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import type { StackResult } from '../stack/errors.js';
import { FilePendingSyncStore } from '../stack/pending.js';
import { SyncEngine } from '../stack/sync.js';
import type { SyncOptions, SyncOutcome, SyncReporter, SyncRunResult } from '../stack/types.js';
import { openRepository } from './context.js';

export interface SyncCommandOptions extends SyncOptions {
  continue?: boolean;
}

/**
 * Print each outcome as the engine reports it
 */
export const clackReporter: SyncReporter = {
  outcome(outcome: SyncOutcome): void {
    const pair = `${pc.cyan(outcome.branch)} ${pc.dim('→')} ${outcome.parent}`;
    switch (outcome.status) {
      case 'up-to-date':
        clack.log.info(`${pair} ${pc.dim('already up to date')}`);
        break;
      case 'updated':
        clack.log.success(`${pair} rebased${outcome.pushed ? pc.dim(' and pushed') : ''}`);
        break;
      case 'conflict':
        clack.log.error(`${pair} ${pc.red('conflict')}`);
        break;
    }
  },
  warn(message: string): void {
    clack.log.warn(message);
  },
};

export async function syncCommand(options: SyncCommandOptions = {}): Promise<void> {
  const { repo, gitDir, config, store, trees } = await openRepository();
  const { continue: resume, ...syncOptions } = options;

  const engine = new SyncEngine(repo.root, {
    store,
    trees,
    pending: new FilePendingSyncStore(gitDir),
    remote: config.remote,
    push: config.push,
  });

  let result: StackResult<SyncRunResult>;
  if (resume) {
    result = await engine.continueSync(clackReporter);
  } else {
    const root = await trees.getCurrentRoot();
    if (root.isErr()) {
      clack.cancel(root.error.format());
      process.exit(1);
    }
    result = await engine.sync(root.value, syncOptions, clackReporter);
  }

  if (result.isErr()) {
    clack.cancel(result.error.format());
    process.exit(1);
  }

  showSummary(result.value, repo.root);
}

function showSummary(run: SyncRunResult, repoRoot: string): void {
  const conflict = run.outcomes.find((o) => o.status === 'conflict');

  if (!conflict) {
    const updated = run.outcomes.filter((o) => o.status === 'updated').length;
    console.log('');
    console.log(
      pc.green('✓') +
        ' ' +
        pc.bold('Stack synced') +
        pc.dim(` (${updated} of ${run.outcomes.length} branch${run.outcomes.length !== 1 ? 'es' : ''} rebased)`)
    );
    console.log('');
    return;
  }

  console.log('');
  if (conflict.conflictFiles.length > 0) {
    console.log(pc.yellow('  Conflicts in:'));
    for (const file of conflict.conflictFiles) {
      console.log(`    ${pc.dim('•')} ${file}`);
    }
    console.log('');
  }
  console.log(pc.dim('  To resolve:'));
  console.log(`    1. ${pc.dim('cd')} ${repoRoot}`);
  console.log(`    2. Resolve conflicts`);
  console.log(`    3. ${pc.dim('git add')} <files>`);
  console.log(`    4. ${pc.dim('git')} rebase --continue`);
  console.log(`    5. ${pc.cyan('git-stack sync --continue')}`);
  console.log('');

  clack.log.warn(`Sync halted on ${conflict.branch}; the rebase is still in progress`);
  process.exit(1);
}
