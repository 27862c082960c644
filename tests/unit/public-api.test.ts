import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports the walker and builders', async () => {
    const api = await import('../../src/index.js');
    expect(typeof api.SelectorWalker).toBe('function');
    expect(typeof api.evaluate).toBe('function');
    expect(typeof api.select.recursive).toBe('function');
    expect(typeof api.where.and).toBe('function');
  });

  it('exports the codec and canonical key', async () => {
    const { encodeSelector, decodeSelector, canonicalSelectorKey, select } = await import('../../src/index.js');
    const sel = select.all(select.matcher());
    expect(canonicalSelectorKey(decodeSelector(encodeSelector(sel)))).toBe(canonicalSelectorKey(sel));
  });

  it('exports error classes usable with instanceof', async () => {
    const { StructuralError } = await import('../../src/index.js');
    const err = new StructuralError('x', '', '');
    expect(err).toBeInstanceOf(StructuralError);
    expect(err.name).toBe('StructuralError');
  });

  it('does NOT export walker internals', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['ResultCollector']).toBeUndefined();
    expect((api as Record<string, unknown>)['RecursionController']).toBeUndefined();
    expect((api as Record<string, unknown>)['resolveOptions']).toBeUndefined();
  });

  it('exposes the block stores from the store entry point', async () => {
    const store = await import('../../src/store/index.js');
    expect(typeof store.MemoryBlockStore).toBe('function');
    expect(typeof store.PostgresBlockStore).toBe('function');
    expect(typeof store.cidOf).toBe('function');
  });

  it('end to end: stores, walks and decodes a selector', async () => {
    const { DataModelAccessor, SelectorWalker, decodeSelector } = await import('../../src/index.js');
    const { MemoryBlockStore } = await import('../../src/store/index.js');
    const store = new MemoryBlockStore();
    const leaf = await store.put({ title: 'leaf' });
    const root = await store.put({ title: 'root', children: [leaf] });
    const walker = new SelectorWalker(new DataModelAccessor(store));
    const sel = decodeSelector({
      R: {
        l: { depth: 5 },
        ':>': { f: { 'f>': { title: { '.': {} }, children: { a: { '>': { '@': {} } } } } } },
      },
    });
    const { results } = await walker.evaluate(sel, root);
    expect(results.map((r) => r.path.join('/'))).toEqual(['title', 'children/0/title']);
    expect(results.map((r) => r.node)).toEqual(['root', 'leaf']);
  });
});
