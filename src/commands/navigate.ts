/**
 * Next/prev commands - move the checkout along the current stack
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { StackNavigator, parseStepCount } from '../stack/navigator.js';
import { openRepository } from './context.js';

export type Direction = 'next' | 'prev';

export async function navigateCommand(direction: Direction, rawSteps?: string): Promise<void> {
  const steps = parseStepCount(rawSteps);
  if (steps.isErr()) {
    clack.cancel(steps.error.format());
    process.exit(1);
  }

  const { repo, trees } = await openRepository();
  const navigator = new StackNavigator(repo.root, trees);

  const result =
    direction === 'next' ? await navigator.next(steps.value) : await navigator.prev(steps.value);
  if (result.isErr()) {
    clack.cancel(result.error.format());
    process.exit(1);
  }

  clack.log.success(`Switched from ${pc.dim(result.value.from)} to ${pc.cyan(pc.bold(result.value.to))}`);
}
