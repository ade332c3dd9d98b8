/**
 * Accumulator service: the caller-facing operations over a stored frontier.
 *
 * Each call loads the frontier, works on it in memory, and (for insert)
 * saves it back. Calls on one store must be serialized by the caller; the
 * service holds no locks.
 */
import { bytesToHex } from "@noble/hashes/utils";
import {
  branchRoot,
  cloneFrontier,
  createFrontier,
  insert,
  resolveDepth,
  root,
  arraysEqual,
} from "@frontier/merkletree";
import type { Frontier, Hash, TreeOptions } from "@frontier/merkletree";
import type { AccumulatorConfig } from "./env.js";
import { FileKVNamespace, MemoryKVNamespace } from "./kv/index.js";
import type { FrontierKVNamespace } from "./kv/index.js";
import { KVFrontierStore } from "./store.js";
import type { FrontierStore } from "./store.js";

export type Logger = Pick<Console, "log" | "error">;

export interface AccumulatorOptions extends TreeOptions {
  /** Defaults to console */
  logger?: Logger;
}

export class Accumulator {
  private readonly store: FrontierStore;
  private readonly logger: Logger;
  readonly depth: number;

  constructor(store: FrontierStore, options: AccumulatorOptions = {}) {
    this.store = store;
    this.depth = resolveDepth(options);
    this.logger = options.logger ?? console;
  }

  /**
   * The stored frontier, or an empty one if nothing has been inserted.
   */
  async getTree(): Promise<Frontier> {
    const stored = await this.store.load();
    return stored ?? createFrontier();
  }

  /**
   * Append a leaf and persist the result.
   *
   * Nothing is saved when the insert is rejected.
   *
   * @returns A copy of the frontier after the insert
   */
  async insert(leaf: Hash): Promise<Frontier> {
    const tree = await this.getTree();

    try {
      insert(tree, leaf, { depth: this.depth });
    } catch (error) {
      this.logger.error("[accumulator] insert rejected", error);
      throw error;
    }

    await this.store.save(tree);
    this.logger.log("[accumulator] inserted leaf", {
      index: tree.count - 1,
      leaf: bytesToHex(leaf),
      count: tree.count,
    });
    return cloneFrontier(tree);
  }

  /**
   * Root of the stored tree.
   */
  async getRoot(): Promise<Hash> {
    const tree = await this.getTree();
    try {
      return root(tree, { depth: this.depth });
    } catch (error) {
      this.logger.error("[accumulator] root unavailable", error);
      throw error;
    }
  }

  /**
   * Root implied by a leaf, its sibling path and its index. Reads no
   * stored state.
   */
  branchRoot(leaf: Hash, proof: readonly Hash[], index: number | bigint): Hash {
    return branchRoot(leaf, proof, index, { depth: this.depth });
  }

  /**
   * Checks an inclusion proof against the stored root.
   */
  async verifyInclusion(
    leaf: Hash,
    proof: readonly Hash[],
    index: number | bigint,
  ): Promise<boolean> {
    const candidate = this.branchRoot(leaf, proof, index);
    const current = await this.getRoot();
    const included = arraysEqual(candidate, current);
    if (!included) {
      this.logger.log("[accumulator] proof does not match root", {
        index: index.toString(),
        root: bytesToHex(current),
      });
    }
    return included;
  }
}

/**
 * Build an accumulator from configuration.
 *
 * Uses the given KV namespace, else a directory store when storeDir is set,
 * else an in-memory one.
 */
export function createAccumulator(
  config: AccumulatorConfig,
  options: { kv?: FrontierKVNamespace; logger?: Logger } = {},
): Accumulator {
  const kv =
    options.kv ??
    (config.storeDir !== undefined
      ? new FileKVNamespace(config.storeDir)
      : new MemoryKVNamespace());
  return new Accumulator(new KVFrontierStore(kv, config.storeKey), {
    depth: config.depth,
    logger: options.logger,
  });
}
