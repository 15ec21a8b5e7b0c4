/**
 * Configuration schema and validation
 */

export interface StackConfig {
  /** Branches treated as trunks when they have no record of their own */
  trunks?: string[];
  remote?: string;
  /** Force-push rebased branches */
  push?: boolean;
}

export type ResolvedConfig = Required<StackConfig>;

export const DEFAULT_CONFIG: ResolvedConfig = {
  trunks: ['main', 'master'],
  remote: 'origin',
  push: true,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate configuration object
 */
export function validateConfig(config: unknown): config is StackConfig {
  if (!isRecord(config)) {
    return false;
  }

  const { trunks, remote, push } = config;

  if (trunks !== undefined) {
    if (!Array.isArray(trunks)) return false;
    if (!trunks.every((t) => typeof t === 'string' && t.length > 0)) return false;
  }

  if (remote !== undefined && (typeof remote !== 'string' || remote.length === 0)) {
    return false;
  }

  if (push !== undefined && typeof push !== 'boolean') {
    return false;
  }

  return true;
}

/**
 * Merge two configurations (right takes precedence)
 */
export function mergeConfigs(base: ResolvedConfig, override: StackConfig): ResolvedConfig {
  return {
    trunks: override.trunks ?? base.trunks,
    remote: override.remote ?? base.remote,
    push: override.push ?? base.push,
  };
}
