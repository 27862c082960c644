import { describe, it, expect } from 'vitest';
import { AccessorError } from '../../src/errors.js';
import { Link } from '../../src/store/types.js';
import { caught, makeAccessor } from './fixtures.js';

describe('DataModelAccessor', () => {
  it('reports node kinds', () => {
    const { accessor } = makeAccessor();
    expect(accessor.kind(null)).toBe('null');
    expect(accessor.kind(false)).toBe('bool');
    expect(accessor.kind(3)).toBe('int');
    expect(accessor.kind(3n)).toBe('int');
    expect(accessor.kind(0.5)).toBe('float');
    expect(accessor.kind('s')).toBe('string');
    expect(accessor.kind(new Uint8Array(1))).toBe('bytes');
    expect(accessor.kind(new Link('sha256-x'))).toBe('link');
    expect(accessor.kind([])).toBe('list');
    expect(accessor.kind({})).toBe('map');
  });

  it('looks up own map keys only', () => {
    const { accessor } = makeAccessor();
    expect(accessor.child({ a: 1 }, 'a')).toBe(1);
    expect(accessor.child({ a: 1 }, 'toString')).toBeUndefined();
    expect(accessor.child([1], '0')).toBeUndefined();
  });

  it('returns list elements within bounds', () => {
    const { accessor } = makeAccessor();
    expect(accessor.element(['x', 'y'], 1)).toBe('y');
    expect(accessor.element(['x', 'y'], 2)).toBeUndefined();
    expect(accessor.element({ 0: 'x' }, 0)).toBeUndefined();
  });

  it('lists children in natural order', () => {
    const { accessor } = makeAccessor();
    expect(accessor.children({ b: 1, a: 2 })).toEqual([
      { key: 'b', node: 1 },
      { key: 'a', node: 2 },
    ]);
    expect(accessor.children(['p'])).toEqual([{ key: 0, node: 'p' }]);
    expect(accessor.children('leaf')).toEqual([]);
    expect(accessor.children(new Link('sha256-x'))).toEqual([]);
  });

  it('exposes scalar values only', () => {
    const { accessor } = makeAccessor();
    expect(accessor.value(7)).toBe(7);
    expect(accessor.value(null)).toBeNull();
    expect(accessor.value([7])).toBeUndefined();
    expect(accessor.value(new Link('sha256-x'))).toBeUndefined();
  });

  it('dereferences links through the block store', async () => {
    const { store, accessor } = makeAccessor();
    const link = await store.put({ hello: 'world' });
    expect(await accessor.dereference(link)).toEqual({ hello: 'world' });
  });

  it('fails for missing blocks and non-link nodes', async () => {
    const { accessor } = makeAccessor();
    const missing = await caught(accessor.dereference(new Link('sha256-gone')), AccessorError);
    expect(missing.message).toBe('Block sha256-gone not found');
    const notLink = await caught(accessor.dereference({}), AccessorError);
    expect(notLink.message).toBe('Cannot dereference a map node');
  });
});
