import { describe, it, expect } from 'vitest';
import { LinkPrefetcher, Semaphore } from '../../src/traversal/prefetch.js';
import { Link, type DataValue } from '../../src/store/types.js';
import type { ChildEntry } from '../../src/types.js';
import { makeAccessor, sleep, SlowAccessor } from './fixtures.js';

describe('Semaphore', () => {
  it('rejects a non-positive limit', () => {
    expect(() => new Semaphore(0)).toThrow('Semaphore: maxConcurrent must be a positive integer, got 0');
  });

  it('queues acquirers beyond the limit', async () => {
    const sem = new Semaphore(2);
    await sem.acquire();
    await sem.acquire();
    expect(sem.inUse).toBe(2);

    let third = false;
    const pending = sem.acquire().then(() => {
      third = true;
    });
    await sleep(0);
    expect(third).toBe(false);
    expect(sem.waiting).toBe(1);

    sem.release();
    await pending;
    expect(third).toBe(true);
    expect(sem.inUse).toBe(2);
    expect(sem.waiting).toBe(0);
  });

  it('run() releases the permit when the task throws', async () => {
    const sem = new Semaphore(1);
    await expect(sem.run(async () => {
      throw new Error('task failed');
    })).rejects.toThrow('task failed');
    expect(sem.inUse).toBe(0);
  });
});

describe('LinkPrefetcher', () => {
  async function entriesOf(count: number) {
    const { store } = makeAccessor();
    const entries: ChildEntry<DataValue>[] = [];
    for (let i = 0; i < count; i++) {
      entries.push({ key: i, node: await store.put({ i }) });
    }
    return { store, entries };
  }

  it('starts loads for the window after the cursor only', async () => {
    const { store, entries } = await entriesOf(5);
    const prefetcher = new LinkPrefetcher(new SlowAccessor(store, 1), 2);
    prefetcher.ahead(entries, 1);
    expect(prefetcher.inFlight).toBe(2);
    prefetcher.ahead(entries, 1);
    expect(prefetcher.inFlight).toBe(2);
  });

  it('skips entries that are not links', async () => {
    const { accessor } = makeAccessor();
    const prefetcher = new LinkPrefetcher(accessor, 3);
    prefetcher.ahead([{ key: 'a', node: 1 }, { key: 'b', node: 'x' }], 0);
    expect(prefetcher.inFlight).toBe(0);
  });

  it('resolve() hands over a prefetched target once', async () => {
    const { store, entries } = await entriesOf(2);
    const accessor = new SlowAccessor(store, 1);
    const prefetcher = new LinkPrefetcher(accessor, 2);
    prefetcher.ahead(entries, 0);
    const first = entries[0];
    if (first === undefined) throw new Error('fixture has no entries');
    expect(await prefetcher.resolve(first.node)).toEqual({ i: 0 });
    expect(prefetcher.inFlight).toBe(1);
    expect(accessor.loads).toBe(2);
  });

  it('resolve() loads directly when nothing was prefetched', async () => {
    const { store, accessor } = makeAccessor();
    const link = await store.put('direct');
    expect(await new LinkPrefetcher(accessor, 1).resolve(link)).toBe('direct');
  });

  it('close() drops pending loads and never starts queued ones', async () => {
    const { store, entries } = await entriesOf(4);
    const accessor = new SlowAccessor(store, 5);
    const prefetcher = new LinkPrefetcher(accessor, 2);
    prefetcher.ahead(entries, 0);
    prefetcher.ahead(entries, 1);
    expect(prefetcher.inFlight).toBe(3);
    // Let the first two loads take their permits
    await sleep(0);
    expect(accessor.loads).toBe(2);
    prefetcher.close();
    expect(prefetcher.inFlight).toBe(0);
    await sleep(30);
    expect(accessor.loads).toBe(2);
  });

  it('ahead() does nothing after close()', async () => {
    const { store, entries } = await entriesOf(2);
    const accessor = new SlowAccessor(store, 1);
    const prefetcher = new LinkPrefetcher(accessor, 2);
    prefetcher.close();
    prefetcher.ahead(entries, 0);
    expect(prefetcher.inFlight).toBe(0);
    await sleep(10);
    expect(accessor.loads).toBe(0);
  });

  it('keeps a failed load until it is resolved', async () => {
    const { accessor } = makeAccessor();
    const prefetcher = new LinkPrefetcher(accessor, 2);
    const missing = new Link('sha256-missing');
    prefetcher.ahead([{ key: 0, node: missing }], 0);
    await sleep(5);
    await expect(prefetcher.resolve(missing)).rejects.toThrow('Block sha256-missing not found');
  });
});
