/**
 * KV namespace backed by a directory, one file per key.
 *
 * Keys are URI-encoded into file names. Writes go to a temporary file that
 * is renamed over the target, so a reader sees either the old record or the
 * new one.
 */
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { FrontierKVNamespace } from "./index.js";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileKVNamespace implements FrontierKVNamespace {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  private pathFor(key: string): string {
    return join(this.directory, `${encodeURIComponent(key)}.cbor`);
  }

  async get(key: string): Promise<Uint8Array | null> {
    try {
      return new Uint8Array(await readFile(this.pathFor(key)));
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const target = this.pathFor(key);
    const temporary = `${target}.${process.pid}.tmp`;
    try {
      await writeFile(temporary, value);
      await rename(temporary, target);
    } catch (error) {
      await rm(temporary, { force: true });
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }
}
