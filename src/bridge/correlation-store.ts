import { LRUCache } from 'lru-cache';

type SourceIndex = {
  peek(sourceId: string): string[] | undefined;
  set(sourceId: string, targets: string[]): unknown;
  readonly size: number;
};

function unboundedIndex(): SourceIndex {
  const map = new Map<string, string[]>();
  return {
    peek: (sourceId) => map.get(sourceId),
    set: (sourceId, targets) => map.set(sourceId, targets),
    get size() {
      return map.size;
    },
  };
}

/**
 * Links IRC message ids (source) to the Discord message ids (target) they
 * were relayed as, and the reverse. Lists keep send order: a source fanned
 * out to several messages lists them oldest first.
 *
 * With `maxSources > 0` the oldest source ids are evicted once the bound is
 * exceeded, together with their reverse links. 0 keeps everything.
 */
export class CorrelationStore {
  private readonly bySource: SourceIndex;
  private readonly byTarget = new Map<string, string[]>();

  constructor(maxSources = 0) {
    // Reads go through peek and lists grow in place, so recency never changes
    // after insertion and the least recently used source is the oldest one.
    this.bySource = maxSources > 0
      ? new LRUCache<string, string[]>({
        max: maxSources,
        dispose: (targets, sourceId) => this.unlinkTargets(sourceId, targets),
      })
      : unboundedIndex();
  }

  /** Call once per genuinely new pair; duplicates are stored as given. */
  recordPair(sourceId: string, targetId: string): void {
    const targets = this.bySource.peek(sourceId);
    if (targets) targets.push(targetId);
    else this.bySource.set(sourceId, [targetId]);

    const sources = this.byTarget.get(targetId);
    if (sources) sources.push(sourceId);
    else this.byTarget.set(targetId, [sourceId]);
  }

  lookupBySource(sourceId: string): string[] {
    return [...(this.bySource.peek(sourceId) ?? [])];
  }

  lookupByTarget(targetId: string): string[] {
    return [...(this.byTarget.get(targetId) ?? [])];
  }

  /** Number of distinct source ids held. */
  get size(): number {
    return this.bySource.size;
  }

  private unlinkTargets(sourceId: string, targets: string[]): void {
    for (const targetId of targets) {
      const sources = this.byTarget.get(targetId);
      if (!sources) continue;
      const remaining = sources.filter((id) => id !== sourceId);
      if (remaining.length > 0) this.byTarget.set(targetId, remaining);
      else this.byTarget.delete(targetId);
    }
  }
}
