import type { Condition } from '../condition/types.js';
import { SelectorDefinitionError } from '../errors.js';
import type { Selector } from './types.js';

/**
 * True when `sequence` reaches an ExploreRecursiveEdge that belongs to the
 * enclosing ExploreRecursive. Edges inside a nested ExploreRecursive's own
 * sequence are owned by that nested selector and do not count.
 */
export function hasReachableEdge(sequence: Selector): boolean {
  switch (sequence.kind) {
    case 'ExploreRecursiveEdge':
      return true;
    case 'Matcher':
    case 'ExploreRecursive':
      return false;
    case 'ExploreAll':
    case 'ExploreIndex':
    case 'ExploreRange':
    case 'ExploreConditional':
      return hasReachableEdge(sequence.next);
    case 'ExploreFields':
      return sequence.fields.some(([, next]) => hasReachableEdge(next));
    case 'ExploreUnion':
      return sequence.members.some(hasReachableEdge);
    default: {
      const unreachable: never = sequence;
      throw new Error(`Unknown selector: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function assertIndex(value: number, what: string, at = ''): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new SelectorDefinitionError(`${what} must be a non-negative integer, got ${String(value)}`, at);
  }
}

export function assertRange(start: number, end: number, at = ''): void {
  assertIndex(start, 'ExploreRange start', at);
  assertIndex(end, 'ExploreRange end', at);
  if (end < start) {
    throw new SelectorDefinitionError(`ExploreRange end (${end}) is before start (${start})`, at);
  }
}

/**
 * Stable string form of a selector, usable as a cache key. ExploreFields keys
 * are sorted, so selectors that differ only in field order share a key.
 */
export function canonicalSelectorKey(selector: Selector): string {
  function canonicalScalar(v: unknown): unknown {
    if (typeof v === 'bigint') return { bigint: v.toString() };
    if (v instanceof Uint8Array) return { bytes: Array.from(v) };
    return v;
  }

  function canonicalCondition(c: Condition | undefined): unknown {
    if (c === undefined) return null;
    switch (c.kind) {
      case 'HasField':
        return [c.kind, c.field];
      case 'HasKind':
        return [c.kind, c.nodeKind];
      case 'HasValue':
      case 'GreaterThan':
      case 'LessThan':
        return [c.kind, canonicalScalar(c.value)];
      case 'IsLink':
        return [c.kind];
      case 'And':
      case 'Or':
        return [c.kind, c.conditions.map(canonicalCondition)];
      case 'Not':
        return [c.kind, canonicalCondition(c.condition)];
    }
  }

  function canonical(s: Selector): unknown {
    switch (s.kind) {
      case 'Matcher':
        return [s.kind, s.label ?? null, canonicalCondition(s.onlyIf)];
      case 'ExploreAll':
        return [s.kind, canonical(s.next)];
      case 'ExploreFields': {
        const entries = [...s.fields].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        return [s.kind, entries.map(([k, sub]) => [k, canonical(sub)])];
      }
      case 'ExploreIndex':
        return [s.kind, s.index, canonical(s.next)];
      case 'ExploreRange':
        return [s.kind, s.start, s.end, canonical(s.next)];
      case 'ExploreRecursive':
        return [s.kind, s.maxDepth, canonicalCondition(s.stopAt), canonical(s.sequence)];
      case 'ExploreRecursiveEdge':
        return [s.kind];
      case 'ExploreUnion':
        return [s.kind, s.members.map(canonical)];
      case 'ExploreConditional':
        return [s.kind, canonicalCondition(s.condition), canonical(s.next)];
    }
  }

  return JSON.stringify(canonical(selector));
}
