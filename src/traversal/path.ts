import type { PathSegment } from '../types.js';

/**
 * Persistent singly linked list. Each visit extends its parent's trail in
 * O(1); arrays and strings are only built when an entry is emitted or an
 * error is raised.
 */
export interface Trail<T> {
  readonly head: T;
  readonly parent: Trail<T> | null;
}

export function extend<T>(parent: Trail<T> | null, head: T): Trail<T> {
  return { head, parent };
}

export function toArray<T>(trail: Trail<T> | null): T[] {
  const out: T[] = [];
  for (let t = trail; t !== null; t = t.parent) {
    out.push(t.head);
  }
  return out.reverse();
}

/** Slash-separated display form; the root is the empty string. */
export function formatNodePath(path: Trail<PathSegment> | null): string {
  return toArray(path).map(String).join('/');
}

export function formatSelectorPath(path: Trail<string> | null): string {
  return toArray(path).join('/');
}

/** Identity key for the covered set. Distinguishes "0" (map key) from 0 (index). */
export function pathKey(segments: readonly PathSegment[]): string {
  return JSON.stringify(segments);
}
