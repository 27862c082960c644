import type { ChildEntry, NodeAccessor } from '../types.js';

/**
 * Counting semaphore with a FIFO wait queue.
 */
export class Semaphore {
  private available: number;
  private readonly waitQueue: Array<() => void> = [];

  constructor(readonly maxConcurrent: number) {
    if (!Number.isSafeInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new Error(`Semaphore: maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
    this.available = maxConcurrent;
  }

  get inUse(): number {
    return this.maxConcurrent - this.available;
  }

  get waiting(): number {
    return this.waitQueue.length;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }
    await new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
    });
  }

  /** Hands the permit straight to the next waiter when there is one. */
  release(): void {
    const next = this.waitQueue.shift();
    if (next !== undefined) {
      next();
    } else {
      this.available++;
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

type Settled<N> = { ok: true; node: N } | { ok: false; error: unknown };

/**
 * Dereferences links ahead of the walker with bounded concurrency.
 *
 * Loads are stored as settled outcomes, so a failed prefetch never becomes an
 * unhandled rejection; the failure is rethrown from resolve() when the walker
 * reaches that link, in canonical order, exactly as a sequential walk would.
 */
export class LinkPrefetcher<N> {
  private readonly semaphore: Semaphore;
  private readonly pending = new Map<N, Promise<Settled<N>>>();
  private closed = false;

  constructor(
    private readonly accessor: NodeAccessor<N>,
    concurrency: number,
  ) {
    this.semaphore = new Semaphore(concurrency);
  }

  get inFlight(): number {
    return this.pending.size;
  }

  /**
   * Starts loading the link children in `entries[from, from + window)`.
   * Already pending links are left alone.
   */
  ahead(entries: readonly ChildEntry<N>[], from: number): void {
    if (this.closed) return;
    const end = Math.min(entries.length, from + this.semaphore.maxConcurrent);
    for (let i = from; i < end; i++) {
      const entry = entries[i];
      if (entry === undefined || this.pending.has(entry.node)) continue;
      if (this.accessor.kind(entry.node) !== 'link') continue;
      const link = entry.node;
      const settled = this.semaphore.run(async (): Promise<Settled<N>> => {
        // Still queued for a permit when the walk ended
        if (this.closed) return { ok: false, error: new Error('Prefetch cancelled') };
        try {
          return { ok: true, node: await this.accessor.dereference(link) };
        } catch (error: unknown) {
          return { ok: false, error };
        }
      });
      this.pending.set(link, settled);
    }
  }

  /**
   * Forgets every pending load. Loads already running finish on their own;
   * loads still waiting for a permit never start.
   */
  close(): void {
    this.closed = true;
    this.pending.clear();
  }

  /** The prefetched target when there is one, otherwise a direct load. */
  async resolve(link: N): Promise<N> {
    const settled = this.pending.get(link);
    if (settled === undefined) {
      return this.accessor.dereference(link);
    }
    this.pending.delete(link);
    const outcome = await settled;
    if (!outcome.ok) throw outcome.error;
    return outcome.node;
  }
}
