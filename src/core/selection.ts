import { SourceError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { DedupStore, MediaCandidate, MediaSource } from "../types.js";

export function compareNewestFirst(left: MediaCandidate, right: MediaCandidate): number {
  const byTime = right.modifiedAt.getTime() - left.modifiedAt.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  if (left.name === right.name) {
    return 0;
  }
  return left.name < right.name ? -1 : 1;
}

/**
 * Picks unposted candidates from a source against the dedup store.
 * The seen-set is loaded once by `prepare()` and kept in step with
 * `recordPosted`, so lookups never go back to the store.
 */
export class SelectionEngine {
  private seen: Set<string> | null = null;

  constructor(private readonly store: DedupStore) {}

  async prepare(): Promise<void> {
    this.seen = new Set(await this.store.listSeen());
    logger.debug({ seen: this.seen.size }, "Loaded posted media keys");
  }

  private seenSet(): Set<string> {
    if (!this.seen) {
      throw new Error("SelectionEngine.prepare() must run before selection");
    }
    return this.seen;
  }

  async listCandidates(source: MediaSource): Promise<MediaCandidate[]> {
    let candidates: MediaCandidate[];
    try {
      candidates = await source.listCandidates();
    } catch (error) {
      if (error instanceof SourceError) {
        throw error;
      }
      throw new SourceError(`Cannot list ${source.kind} candidates: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!source.canEnumerate()) {
      return candidates.slice(0, 1);
    }

    return [...candidates].sort(compareNewestFirst);
  }

  isPosted(candidate: MediaCandidate): boolean {
    return this.seenSet().has(this.store.keyFor(candidate));
  }

  /**
   * Returns up to `limit` unposted candidates, newest first, with at most one
   * candidate per dedup key. Sources that cannot enumerate yield their single
   * item without a dedup check.
   */
  async selectNext(
    source: MediaSource,
    limit: number = Number.POSITIVE_INFINITY,
  ): Promise<{ candidates: MediaCandidate[]; selected: MediaCandidate[] }> {
    const candidates = await this.listCandidates(source);
    if (limit <= 0) {
      return { candidates, selected: [] };
    }

    if (!source.canEnumerate()) {
      logger.warn(
        { source: source.kind, name: candidates[0]?.name },
        "Source cannot enumerate, posting without a dedup check",
      );
      return { candidates, selected: candidates.slice(0, limit) };
    }

    const selected: MediaCandidate[] = [];
    const picked = new Set<string>();
    for (const candidate of candidates) {
      if (selected.length >= limit) {
        break;
      }
      if (this.isPosted(candidate)) {
        logger.debug({ name: candidate.name, handle: candidate.handle }, "Already posted, skipping");
        continue;
      }
      const key = this.store.keyFor(candidate);
      if (picked.has(key)) {
        logger.debug(
          { name: candidate.name, handle: candidate.handle },
          "Same dedup key as a newer candidate, skipping",
        );
        continue;
      }
      picked.add(key);
      selected.push(candidate);
    }

    return { candidates, selected };
  }

  /** Must only be called after the post itself succeeded. */
  async recordPosted(
    source: MediaSource,
    candidate: MediaCandidate,
    postId: string,
  ): Promise<boolean> {
    if (!source.canEnumerate()) {
      logger.info({ name: candidate.name, postId }, "Not recording post for non-enumerable source");
      return false;
    }

    const key = this.store.keyFor(candidate);
    const seen = this.seenSet();
    if (seen.has(key)) {
      return false;
    }

    await this.store.recordPosted(candidate, postId);
    seen.add(key);
    logger.info({ name: candidate.name, handle: candidate.handle, postId }, "Recorded posted media");
    return true;
  }
}
