import type { CoveredEntry, MatchEntry, PathSegment, TraversalResult } from '../types.js';
import { pathKey } from './path.js';

export interface CollectorOptions<N> {
  buffer: boolean;
  onCovered?: (entry: CoveredEntry<N>) => void;
  onMatch?: (entry: MatchEntry<N>) => void;
}

/**
 * Append-only, traversal-ordered accumulator. Covered entries are unique by
 * path; matches are not (two union members matching the same node report it
 * twice). Callbacks fire synchronously as events happen, so a consumer that
 * streams results can run with `buffer: false`.
 */
export class ResultCollector<N> {
  private readonly seen = new Set<string>();
  private readonly covered: CoveredEntry<N>[] = [];
  private readonly results: MatchEntry<N>[] = [];
  private matchCount = 0;

  constructor(private readonly options: CollectorOptions<N>) {}

  get coveredCount(): number {
    return this.seen.size;
  }

  get resultCount(): number {
    return this.matchCount;
  }

  /** Records `node` as covered. Returns false when the path was already covered. */
  cover(path: PathSegment[], node: N): boolean {
    const key = pathKey(path);
    if (this.seen.has(key)) return false;
    this.seen.add(key);
    const entry: CoveredEntry<N> = { path, node };
    if (this.options.buffer) this.covered.push(entry);
    this.options.onCovered?.(entry);
    return true;
  }

  match(path: PathSegment[], node: N, label: string | undefined): void {
    const entry: MatchEntry<N> = label === undefined ? { path, node } : { path, node, label };
    this.matchCount += 1;
    if (this.options.buffer) this.results.push(entry);
    this.options.onMatch?.(entry);
  }

  toResult(): TraversalResult<N> {
    return { covered: [...this.covered], results: [...this.results] };
  }
}
