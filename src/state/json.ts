import { open, readFile, rename } from "node:fs/promises";

import { z } from "zod";

import { StoreError } from "../errors.js";
import type { DedupStore, MediaCandidate, PostedRecord } from "../types.js";
import { ensureParentDir } from "../utils/fs.js";

interface JsonDedupStoreOptions {
  jsonPath: string;
}

const postedNamesSchema = z.array(z.union([z.string(), z.number()]));

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Flat store of posted file names, written as a sorted JSON array.
 * Only the name takes part in the key, so the same file name from two
 * sources counts as one item.
 */
export class JsonDedupStore implements DedupStore {
  private posted = new Set<string>();

  constructor(private readonly options: JsonDedupStoreOptions) {}

  async init(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.options.jsonPath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        this.posted = new Set();
        return;
      }
      throw new StoreError(`Cannot read ${this.options.jsonPath}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = raw.trim() ? JSON.parse(raw) : [];
    } catch (error) {
      throw new StoreError(`${this.options.jsonPath} is not valid JSON`, { cause: error });
    }

    const names = postedNamesSchema.safeParse(parsed);
    if (!names.success) {
      throw new StoreError(`${this.options.jsonPath} must contain a JSON array of names`);
    }
    this.posted = new Set(names.data.map((name) => String(name)));
  }

  keyFor(candidate: Pick<MediaCandidate, "sourceKind" | "handle" | "name">): string {
    return candidate.name;
  }

  async listSeen(): Promise<string[]> {
    return [...this.posted].sort();
  }

  async listRecords(): Promise<PostedRecord[]> {
    return [...this.posted].sort().map((name) => ({
      sourceKind: null,
      handle: null,
      name,
      postId: "",
      postedAt: "",
    }));
  }

  async recordPosted(candidate: MediaCandidate, _postId: string): Promise<void> {
    const key = this.keyFor(candidate);
    if (!key || this.posted.has(key)) {
      return;
    }

    const next = new Set(this.posted);
    next.add(key);
    await this.write([...next].sort());
    this.posted = next;
  }

  private async write(names: string[]): Promise<void> {
    await ensureParentDir(this.options.jsonPath);
    const tmpPath = `${this.options.jsonPath}.tmp`;
    const handle = await open(tmpPath, "w");
    try {
      await handle.writeFile(`${JSON.stringify(names, null, 2)}\n`, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tmpPath, this.options.jsonPath);
  }

  async close(): Promise<void> {
    return;
  }
}
