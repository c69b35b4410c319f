import type {
  DedupStore,
  LocalMediaFile,
  MediaCandidate,
  MediaSource,
  PostedRecord,
  SourceKind,
} from "../src/types.js";

export function candidate(
  name: string,
  modifiedAt: string,
  overrides: Partial<MediaCandidate> = {},
): MediaCandidate {
  return {
    sourceKind: "local",
    handle: name,
    name,
    sizeBytes: 10,
    mimeCategory: "video",
    mimeType: "video/mp4",
    modifiedAt: new Date(modifiedAt),
    ...overrides,
  };
}

/** Dedup store kept in memory, keyed the same way as the SQLite store. */
export class MemoryDedupStore implements DedupStore {
  readonly records: PostedRecord[] = [];
  recordCalls = 0;

  keyFor(item: Pick<MediaCandidate, "sourceKind" | "handle" | "name">): string {
    return `${item.sourceKind}|${item.handle ?? ""}|${item.name}`;
  }

  async init(): Promise<void> {
    return;
  }

  async listSeen(): Promise<string[]> {
    return this.records.map((record) =>
      this.keyFor({
        sourceKind: record.sourceKind ?? "local",
        handle: record.handle,
        name: record.name,
      }),
    );
  }

  async recordPosted(item: MediaCandidate, postId: string): Promise<void> {
    this.recordCalls += 1;
    if ((await this.listSeen()).includes(this.keyFor(item))) {
      return;
    }
    this.records.push({
      sourceKind: item.sourceKind,
      handle: item.handle,
      name: item.name,
      postId,
      postedAt: "2024-01-01T00:00:00.000Z",
    });
  }

  async listRecords(): Promise<PostedRecord[]> {
    return [...this.records];
  }

  async close(): Promise<void> {
    return;
  }
}

/** Source over a fixed list; `download` hands back a path under `destDir`. */
export class StaticSource implements MediaSource {
  readonly cleaned: string[] = [];
  readonly events: string[];

  constructor(
    private readonly items: MediaCandidate[],
    private readonly options: {
      kind?: SourceKind;
      enumerable?: boolean;
      maxPostsPerRun?: number;
      events?: string[];
      failDownload?: (item: MediaCandidate) => boolean;
    } = {},
  ) {
    this.events = options.events ?? [];
  }

  get kind(): SourceKind {
    return this.options.kind ?? "local";
  }

  get maxPostsPerRun(): number | undefined {
    return this.options.maxPostsPerRun;
  }

  canEnumerate(): boolean {
    return this.options.enumerable ?? true;
  }

  async listCandidates(): Promise<MediaCandidate[]> {
    return [...this.items];
  }

  async download(item: MediaCandidate, destDir: string): Promise<LocalMediaFile> {
    if (this.options.failDownload?.(item)) {
      throw new Error(`download failed for ${item.name}`);
    }
    this.events.push(`download:${item.name}`);
    return { path: `${destDir}/${item.name}`, sizeBytes: item.sizeBytes, temporary: false };
  }

  async cleanup(item: MediaCandidate): Promise<void> {
    this.events.push(`cleanup:${item.name}`);
    this.cleaned.push(item.name);
  }
}
