/**
 * CLI argument parsing and command routing
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { branchCommand, type BranchOptions } from './commands/branch.js';
import { syncCommand, type SyncCommandOptions } from './commands/sync.js';
import { treeCommand } from './commands/tree.js';
import { navigateCommand, type Direction } from './commands/navigate.js';

export const VERSION = '0.1.0';

export async function runCLI(args: string[]): Promise<void> {
  const [command, ...rest] = args;

  // Show help if no command or --help flag
  if (!command || command === 'help' || command === '--help' || command === '-h') {
    showHelp();
    return;
  }

  if (command === '--version' || command === '-v') {
    showVersion();
    return;
  }

  try {
    switch (command) {
      case 'branch':
      case 'b':
        await handleBranchCommand(rest);
        break;

      case 'sync':
        await handleSyncCommand(rest);
        break;

      case 'tree':
      case 'ls':
        await handleTreeCommand(rest);
        break;

      case 'next':
      case 'prev':
        await handleNavigateCommand(command, rest);
        break;

      default:
        clack.log.error(`Unknown command: ${command}`);
        console.log('');
        showHelp();
        process.exit(1);
    }
  } catch (error) {
    clack.log.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

/**
 * Value following a flag, or exit when it is missing
 */
function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('-')) {
    clack.log.error(`${flag} requires a branch name`);
    process.exit(1);
  }
  return value;
}

async function handleBranchCommand(args: string[]): Promise<void> {
  const options: BranchOptions = {};
  let branch = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-p':
      case '--parent':
        options.parent = requireValue(args, ++i, arg);
        break;
      case '-h':
      case '--help':
        showBranchHelp();
        return;
      default:
        if (!branch && !arg.startsWith('-')) {
          branch = arg;
        } else {
          clack.log.error(`Unexpected argument: ${arg}`);
          process.exit(1);
        }
    }
  }

  if (!branch) {
    clack.log.error('Branch name required');
    showBranchHelp();
    process.exit(1);
  }

  await branchCommand(branch, options);
}

async function handleSyncCommand(args: string[]): Promise<void> {
  const options: SyncCommandOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-c':
      case '--current':
        options.currentOnly = true;
        break;
      case '--trunk':
        options.trunk = true;
        break;
      case '--no-push':
        options.noPush = true;
        break;
      case '-p':
      case '--parent':
        options.parentOverride = requireValue(args, ++i, arg);
        break;
      case '--continue':
        options.continue = true;
        break;
      case '-h':
      case '--help':
        showSyncHelp();
        return;
      default:
        clack.log.error(`Unexpected argument: ${arg}`);
        process.exit(1);
    }
  }

  if (options.continue && (options.currentOnly || options.trunk || options.parentOverride)) {
    clack.log.error('--continue reuses the options of the halted sync and takes no others');
    process.exit(1);
  }

  await syncCommand(options);
}

async function handleTreeCommand(args: string[]): Promise<void> {
  for (const arg of args) {
    switch (arg) {
      case '-h':
      case '--help':
        showTreeHelp();
        return;
      default:
        clack.log.error(`Unexpected argument: ${arg}`);
        process.exit(1);
    }
  }

  await treeCommand();
}

async function handleNavigateCommand(direction: Direction, args: string[]): Promise<void> {
  let steps: string | undefined;

  for (const arg of args) {
    switch (arg) {
      case '-h':
      case '--help':
        showNavigateHelp(direction);
        return;
      default:
        if (steps === undefined) {
          steps = arg;
        } else {
          clack.log.error(`Unexpected argument: ${arg}`);
          process.exit(1);
        }
    }
  }

  await navigateCommand(direction, steps);
}

function showVersion(): void {
  console.log(`git-stack v${VERSION}`);
}

function showHelp(): void {
  console.log(`
${pc.bold('git-stack')} - Create, visualize and rebase stacks of dependent branches

${pc.bold('Usage:')}
  git-stack <command> [options]

${pc.bold('Commands:')}
  ${pc.cyan('branch, b')}          Create a branch stacked on the current one
  ${pc.cyan('sync')}               Rebase every branch of the stack onto its parent
  ${pc.cyan('tree, ls')}           Show all stacks
  ${pc.cyan('next')}               Check out the child of the current branch
  ${pc.cyan('prev')}               Check out the parent of the current branch

${pc.bold('Options:')}
  -h, --help           Show help
  -v, --version        Show version

${pc.bold('Examples:')}
  git-stack branch feature/api           # Stack a branch on the current one
  git-stack branch fix -p main           # Stack a branch on main
  git-stack sync                         # Rebase the whole stack
  git-stack sync --trunk                 # Also pick up new upstream commits
  git-stack sync --continue              # Resume after resolving a conflict
  git-stack tree                         # Show all stacks

${pc.dim('Run')} ${pc.cyan('git-stack <command> --help')} ${pc.dim('for more information on a command.')}
`);
}

function showBranchHelp(): void {
  console.log(`
${pc.bold('git-stack branch')} - Create a branch stacked on the current one

${pc.bold('Usage:')}
  git-stack branch <name> [options]

${pc.bold('Arguments:')}
  name                   Name of the new branch (required)

${pc.bold('Options:')}
  -p, --parent <branch>  Parent branch (defaults to the current branch)
  -h, --help             Show help

${pc.bold('Examples:')}
  git-stack branch feature/ui               # Child of the current branch
  git-stack branch hotfix --parent main     # Child of main
`);
}

function showSyncHelp(): void {
  console.log(`
${pc.bold('git-stack sync')} - Rebase every branch of the stack onto its parent

${pc.bold('Usage:')}
  git-stack sync [options]

${pc.bold('Options:')}
  -c, --current          Only sync the current branch
  --trunk                Rebase the stack onto the latest upstream trunk
  --no-push              Do not force-push rebased branches
  -p, --parent <branch>  Re-parent the current branch before syncing
  --continue             Resume a sync that halted on a conflict
  -h, --help             Show help

${pc.bold('What this does:')}
  1. Walks the stack parent-first, one branch at a time
  2. Rebases each branch onto its parent's current tip
  3. Force-pushes rebased branches (with lease) unless --no-push
  4. Stops at the first conflict and leaves the rebase in progress

${pc.bold('Examples:')}
  git-stack sync                        # Sync the whole stack
  git-stack sync --current              # Sync only this branch
  git-stack sync --parent feature/api   # Move this branch onto feature/api
  git-stack sync --continue             # Resume after git rebase --continue
`);
}

function showTreeHelp(): void {
  console.log(`
${pc.bold('git-stack tree')} - Show all stacks

${pc.bold('Usage:')}
  git-stack tree

${pc.bold('Options:')}
  -h, --help           Show help
`);
}

function showNavigateHelp(direction: Direction): void {
  const toward = direction === 'next' ? 'child' : 'parent';
  console.log(`
${pc.bold(`git-stack ${direction}`)} - Check out the ${toward} of the current branch

${pc.bold('Usage:')}
  git-stack ${direction} [n]

${pc.bold('Arguments:')}
  n                    Number of steps to move (default 1)

${pc.bold('Options:')}
  -h, --help           Show help
`);
}
