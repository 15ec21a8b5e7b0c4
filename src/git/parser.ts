/**
 * Parse git porcelain output into structured data
 */

import type { GitStatus } from './types.js';

const UNMERGED_CODES = new Set(['DD', 'AU', 'UD', 'UA', 'DU', 'AA', 'UU']);

export interface ConfigEntry {
  key: string;
  value: string;
}

export class GitParser {
  /**
   * Parse git status --porcelain=v1 output
   */
  static parseStatus(statusOutput: string, branch: string): GitStatus {
    const lines = statusOutput.split('\n').filter((l) => l.trim());

    let staged = 0;
    let unstaged = 0;
    const unmerged: string[] = [];

    for (const line of lines) {
      const code = line.slice(0, 2);
      const x = line[0]; // Index status
      const y = line[1]; // Working tree status

      if (UNMERGED_CODES.has(code)) {
        unmerged.push(line.slice(3));
        continue;
      }

      // Untracked files never travel with a rebase
      if (x === '?' && y === '?') continue;

      if (x !== ' ') staged++;
      if (y !== ' ') unstaged++;
    }

    return {
      branch,
      dirty: staged > 0 || unstaged > 0 || unmerged.length > 0,
      staged,
      unstaged,
      unmerged,
    };
  }

  /**
   * Parse git config --get-regexp output
   * Format: <key> <value>, one entry per line; valueless keys have no space
   */
  static parseConfigEntries(output: string): ConfigEntry[] {
    const entries: ConfigEntry[] = [];

    for (const line of output.split('\n')) {
      if (!line.trim()) continue;

      const space = line.indexOf(' ');
      if (space === -1) {
        entries.push({ key: line, value: '' });
      } else {
        entries.push({ key: line.slice(0, space), value: line.slice(space + 1) });
      }
    }

    return entries;
  }

  /**
   * Parse git diff --name-only --diff-filter=U output
   */
  static parsePathList(output: string): string[] {
    return output
      .split('\n')
      .map((l) => l.trim())
      .filter(Boolean);
  }

  /**
   * Extract branch name from refs/heads/ format
   */
  static normalizeBranchName(ref: string): string {
    return ref.replace(/^refs\/heads\//, '');
  }
}
