/**
 * Shared setup for commands: locate the repository and wire the collaborators
 */

import * as clack from '@clack/prompts';
import { GitOperations } from '../git/operations.js';
import type { Repository } from '../git/types.js';
import { ConfigManager } from '../config/manager.js';
import type { ResolvedConfig } from '../config/schema.js';
import { type StackResult, StackErrors, stackOk } from '../stack/errors.js';
import { RelationshipStore } from '../stack/store.js';
import { TreeBuilder } from '../stack/tree.js';

export interface CommandContext {
  repo: Repository;
  gitDir: string;
  config: ResolvedConfig;
  store: RelationshipStore;
  trees: TreeBuilder;
}

export type RepositoryLocator = Pick<
  typeof GitOperations,
  'isGitRepository' | 'getRepository' | 'getGitDir'
>;

export interface LocatedRepository {
  repo: Repository;
  gitDir: string;
}

/**
 * Find the repository containing `cwd` and its git directory
 */
export async function locateRepository(
  locator: RepositoryLocator = GitOperations,
  cwd?: string
): Promise<StackResult<LocatedRepository>> {
  if (!(await locator.isGitRepository(cwd))) {
    return StackErrors.notInRepo();
  }

  const repoResult = await locator.getRepository(cwd);
  if (repoResult.isErr()) {
    return StackErrors.gitError('rev-parse', repoResult.error.message);
  }

  const gitDirResult = await locator.getGitDir(repoResult.value.root);
  if (gitDirResult.isErr()) {
    return StackErrors.gitError('rev-parse', gitDirResult.error.message);
  }

  return stackOk({ repo: repoResult.value, gitDir: gitDirResult.value });
}

/**
 * Open the repository containing the working directory, or exit with an error
 */
export async function openRepository(): Promise<CommandContext> {
  const located = await locateRepository();
  if (located.isErr()) {
    clack.cancel(located.error.format());
    process.exit(1);
  }

  const { repo, gitDir } = located.value;
  const config = await new ConfigManager(repo.root).load();
  const store = new RelationshipStore(repo.root, undefined, config.trunks);

  return {
    repo,
    gitDir,
    config,
    store,
    trees: new TreeBuilder(repo.root, store),
  };
}
