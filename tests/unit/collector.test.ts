import { describe, it, expect, vi } from 'vitest';
import { ResultCollector } from '../../src/traversal/collector.js';

describe('ResultCollector', () => {
  it('records each path as covered once', () => {
    const collector = new ResultCollector<string>({ buffer: true });
    expect(collector.cover(['a'], 'x')).toBe(true);
    expect(collector.cover(['a'], 'x')).toBe(false);
    expect(collector.coveredCount).toBe(1);
    expect(collector.toResult().covered).toEqual([{ path: ['a'], node: 'x' }]);
  });

  it('tells a map key "0" from list index 0', () => {
    const collector = new ResultCollector<string>({ buffer: true });
    collector.cover(['0'], 'key');
    collector.cover([0], 'index');
    expect(collector.coveredCount).toBe(2);
  });

  it('keeps duplicate matches', () => {
    const collector = new ResultCollector<string>({ buffer: true });
    collector.match([], 'root', 'first');
    collector.match([], 'root', undefined);
    expect(collector.resultCount).toBe(2);
    expect(collector.toResult().results).toEqual([
      { path: [], node: 'root', label: 'first' },
      { path: [], node: 'root' },
    ]);
  });

  it('fires callbacks without buffering', () => {
    const onCovered = vi.fn();
    const onMatch = vi.fn();
    const collector = new ResultCollector<number>({ buffer: false, onCovered, onMatch });
    collector.cover([1], 10);
    collector.cover([1], 10);
    collector.match([1], 10, undefined);
    expect(onCovered).toHaveBeenCalledTimes(1);
    expect(onMatch).toHaveBeenCalledWith({ path: [1], node: 10 });
    expect(collector.toResult()).toEqual({ covered: [], results: [] });
    expect(collector.coveredCount).toBe(1);
    expect(collector.resultCount).toBe(1);
  });

  it('toResult() returns copies', () => {
    const collector = new ResultCollector<string>({ buffer: true });
    collector.match(['a'], 'x', undefined);
    const first = collector.toResult();
    collector.match(['b'], 'y', undefined);
    expect(first.results).toHaveLength(1);
    expect(collector.toResult().results).toHaveLength(2);
  });
});
