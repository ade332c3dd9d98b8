import type { FrontierKVNamespace } from "./index.js";

/**
 * In-process KV namespace. Values are copied in and out.
 */
export class MemoryKVNamespace implements FrontierKVNamespace {
  private readonly entries = new Map<string, Uint8Array>();

  async get(key: string): Promise<Uint8Array | null> {
    const value = this.entries.get(key);
    return value === undefined ? null : value.slice();
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    this.entries.set(key, value.slice());
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  /** Number of stored keys */
  get size(): number {
    return this.entries.size;
  }
}
