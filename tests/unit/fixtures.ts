import { DataModelAccessor } from '../../src/accessor/data-model.js';
import { MemoryBlockStore } from '../../src/store/memory-store.js';
import type { DataValue } from '../../src/store/types.js';
import type { CoveredEntry, MatchEntry } from '../../src/types.js';

export function makeAccessor(): { store: MemoryBlockStore; accessor: DataModelAccessor } {
  const store = new MemoryBlockStore();
  return { store, accessor: new DataModelAccessor(store) };
}

/** Slash-joined paths, '' for the root. */
export function paths(entries: ReadonlyArray<CoveredEntry<DataValue> | MatchEntry<DataValue>>): string[] {
  return entries.map((e) => e.path.join('/'));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Accessor that delays every dereference and records how many were in
 * flight at once.
 */
export class SlowAccessor extends DataModelAccessor {
  active = 0;
  maxActive = 0;
  loads = 0;

  constructor(store: MemoryBlockStore, private readonly delayMs: number) {
    super(store);
  }

  override async dereference(link: DataValue): Promise<DataValue> {
    this.active += 1;
    this.loads += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await sleep(this.delayMs);
      return await super.dereference(link);
    } finally {
      this.active -= 1;
    }
  }
}

/** Awaits an expected rejection and narrows it to `type`; anything else is rethrown. */
export async function caught<E extends Error>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => E,
): Promise<E> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`Expected a rejection with ${type.name}`);
}
