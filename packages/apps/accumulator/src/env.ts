/**
 * Environment configuration for the accumulator service.
 */
import { resolveDepth } from "@frontier/merkletree";

/**
 * Environment variables read by loadConfig.
 */
export interface Env {
  /** Tree depth in levels, 1-53. Defaults to 32. */
  FRONTIER_TREE_DEPTH?: string;
  /** Key the frontier record is stored under. Defaults to "TREE". */
  FRONTIER_STORE_KEY?: string;
  /** Directory for the file backed store. In-memory when unset. */
  FRONTIER_STORE_DIR?: string;
}

export interface AccumulatorConfig {
  depth: number;
  storeKey: string;
  storeDir?: string;
}

/** Default key of the single frontier record */
export const DEFAULT_STORE_KEY = "TREE";

function parseDepth(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") {
    return resolveDepth();
  }
  if (!/^\d+$/.test(raw)) {
    throw new Error(
      `Invalid FRONTIER_TREE_DEPTH "${raw}": expected a decimal integer`,
    );
  }
  try {
    return resolveDepth({ depth: Number(raw) });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid FRONTIER_TREE_DEPTH "${raw}": ${reason}`);
  }
}

/**
 * Build the service configuration from environment variables.
 *
 * @throws Error naming the offending variable
 */
export function loadConfig(env: Env = process.env): AccumulatorConfig {
  const storeKey = env.FRONTIER_STORE_KEY ?? DEFAULT_STORE_KEY;
  if (storeKey.trim() === "") {
    throw new Error("FRONTIER_STORE_KEY must not be empty");
  }

  const config: AccumulatorConfig = {
    depth: parseDepth(env.FRONTIER_TREE_DEPTH),
    storeKey,
  };
  if (env.FRONTIER_STORE_DIR) {
    config.storeDir = env.FRONTIER_STORE_DIR;
  }
  return config;
}
