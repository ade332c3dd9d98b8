/**
 * Key-value namespace the frontier store writes through.
 *
 * Kept to the three calls the store needs so any KV binding, database
 * table or object store can sit behind it.
 */

export interface FrontierKVNamespace {
  get(key: string): Promise<Uint8Array | null>;
  put(key: string, value: Uint8Array): Promise<void>;
  delete(key: string): Promise<void>;
}

export { MemoryKVNamespace } from "./memory.js";
export { FileKVNamespace } from "./file.js";
