import { mkdirSync } from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";

import { StoreError } from "../errors.js";
import type { DedupStore, MediaCandidate, PostedRecord, SourceKind } from "../types.js";

interface SqliteDedupStoreOptions {
  dbPath: string;
  now?: () => Date;
}

interface PostedMediaRow {
  source: SourceKind;
  handle: string | null;
  name: string | null;
  post_id: string | null;
  posted_at: number;
}

const KEY_SEPARATOR = "\u0000";

export function tripleKey(
  candidate: Pick<MediaCandidate, "sourceKind" | "handle" | "name">,
): string {
  return [candidate.sourceKind, candidate.handle ?? "", candidate.name].join(KEY_SEPARATOR);
}

export class SqliteDedupStore implements DedupStore {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(options: SqliteDedupStoreOptions) {
    if (options.dbPath !== ":memory:") {
      mkdirSync(path.dirname(options.dbPath), { recursive: true });
    }
    try {
      this.db = new Database(options.dbPath);
    } catch (error) {
      throw new StoreError(`Cannot open dedup database at ${options.dbPath}`, {
        cause: error,
      });
    }
    this.db.pragma("journal_mode = WAL");
    // Each recordPosted must be on disk before the source item is cleaned up.
    this.db.pragma("synchronous = FULL");
    this.now = options.now ?? (() => new Date());
  }

  async init(): Promise<void> {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS posted_media (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        source TEXT NOT NULL,
        handle TEXT,
        name TEXT,
        post_id TEXT,
        posted_at INTEGER NOT NULL
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_posted_unique
      ON posted_media (source, COALESCE(handle, ''), COALESCE(name, ''));
    `);
  }

  keyFor(candidate: Pick<MediaCandidate, "sourceKind" | "handle" | "name">): string {
    return tripleKey(candidate);
  }

  async listSeen(): Promise<string[]> {
    const rows = this.db
      .prepare<[], Pick<PostedMediaRow, "source" | "handle" | "name">>(
        "SELECT source, handle, name FROM posted_media",
      )
      .all();
    return rows.map((row) =>
      tripleKey({ sourceKind: row.source, handle: row.handle, name: row.name ?? "" }),
    );
  }

  async listRecords(): Promise<PostedRecord[]> {
    const rows = this.db
      .prepare<[], PostedMediaRow>(
        `
        SELECT source, handle, name, post_id, posted_at
        FROM posted_media
        ORDER BY posted_at DESC, id DESC
      `,
      )
      .all();

    return rows.map((row) => ({
      sourceKind: row.source,
      handle: row.handle,
      name: row.name ?? "",
      postId: row.post_id ?? "",
      postedAt: new Date(row.posted_at * 1000).toISOString(),
    }));
  }

  async recordPosted(candidate: MediaCandidate, postId: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT OR IGNORE INTO posted_media (source, handle, name, post_id, posted_at)
        VALUES (?, ?, ?, ?, ?)
      `,
      )
      .run(
        candidate.sourceKind,
        candidate.handle,
        candidate.name,
        postId,
        Math.floor(this.now().getTime() / 1000),
      );
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
