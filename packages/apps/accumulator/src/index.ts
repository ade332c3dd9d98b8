/**
 * @frontier/accumulator
 *
 * Persistent accumulator service: loads the frontier from a key-value
 * store, applies one operation, and saves it back.
 */

export { Accumulator, createAccumulator } from "./accumulator.js";
export type { AccumulatorOptions, Logger } from "./accumulator.js";

export { KVFrontierStore } from "./store.js";
export type { FrontierStore } from "./store.js";

export { encodeFrontier, decodeFrontier, FRONTIER_RECORD_VERSION } from "./encoding.js";

export { loadConfig, DEFAULT_STORE_KEY } from "./env.js";
export type { Env, AccumulatorConfig } from "./env.js";

export { MemoryKVNamespace, FileKVNamespace } from "./kv/index.js";
export type { FrontierKVNamespace } from "./kv/index.js";
