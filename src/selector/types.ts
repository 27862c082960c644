import type { Condition } from '../condition/types.js';

export interface Matcher {
  readonly kind: 'Matcher';
  readonly onlyIf?: Condition;
  readonly label?: string;
}

export interface ExploreAll {
  readonly kind: 'ExploreAll';
  readonly next: Selector;
}

export type FieldEntry = readonly [key: string, next: Selector];

/** Entries are visited in array order; keys are unique. */
export interface ExploreFields {
  readonly kind: 'ExploreFields';
  readonly fields: readonly FieldEntry[];
}

export interface ExploreIndex {
  readonly kind: 'ExploreIndex';
  readonly index: number;
  readonly next: Selector;
}

/** Visits indices in `[start, end)`. */
export interface ExploreRange {
  readonly kind: 'ExploreRange';
  readonly start: number;
  readonly end: number;
  readonly next: Selector;
}

/**
 * Bounded recursive descent. `sequence` must reach at least one
 * ExploreRecursiveEdge that is not owned by a nested ExploreRecursive.
 */
export interface ExploreRecursive {
  readonly kind: 'ExploreRecursive';
  readonly sequence: Selector;
  readonly maxDepth: number;
  readonly stopAt?: Condition;
}

export interface ExploreRecursiveEdge {
  readonly kind: 'ExploreRecursiveEdge';
}

export interface ExploreUnion {
  readonly kind: 'ExploreUnion';
  readonly members: readonly Selector[];
}

export interface ExploreConditional {
  readonly kind: 'ExploreConditional';
  readonly condition: Condition;
  readonly next: Selector;
}

export type Selector =
  | Matcher
  | ExploreAll
  | ExploreFields
  | ExploreIndex
  | ExploreRange
  | ExploreRecursive
  | ExploreRecursiveEdge
  | ExploreUnion
  | ExploreConditional;

export type SelectorKind = Selector['kind'];
