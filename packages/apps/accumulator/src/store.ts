/**
 * Persistence boundary for the frontier.
 *
 * The service loads the frontier once per call and saves it back after a
 * successful insert; nothing else about storage leaks into the tree code.
 */
import type { Frontier } from "@frontier/merkletree";
import { decodeFrontier, encodeFrontier } from "./encoding.js";
import { DEFAULT_STORE_KEY } from "./env.js";
import type { FrontierKVNamespace } from "./kv/index.js";

export interface FrontierStore {
  /** The stored frontier, or null if none has been saved yet */
  load(): Promise<Frontier | null>;
  save(tree: Frontier): Promise<void>;
}

/**
 * Stores the frontier as a single CBOR record under one fixed key.
 */
export class KVFrontierStore implements FrontierStore {
  private readonly kv: FrontierKVNamespace;
  readonly key: string;

  constructor(kv: FrontierKVNamespace, key: string = DEFAULT_STORE_KEY) {
    this.kv = kv;
    this.key = key;
  }

  async load(): Promise<Frontier | null> {
    const data = await this.kv.get(this.key);
    return data === null ? null : decodeFrontier(data);
  }

  async save(tree: Frontier): Promise<void> {
    await this.kv.put(this.key, encodeFrontier(tree));
  }
}
