import type { AccessorError } from './errors.js';

export type ScalarKind = 'null' | 'bool' | 'int' | 'float' | 'string' | 'bytes';

export type NodeKind = 'map' | 'list' | 'link' | ScalarKind;

export type ScalarValue = null | boolean | number | bigint | string | Uint8Array;

export type PathSegment = string | number;

export type MaybePromise<T> = T | Promise<T>;

export interface ChildEntry<N> {
  key: PathSegment;
  node: N;
}

/**
 * Read-only view over a data tree. The walker never constructs nodes itself;
 * every method may be synchronous or return a promise (e.g. a remote fetch).
 */
export interface NodeAccessor<N> {
  kind(node: N): NodeKind;
  /** Map entry by key, `undefined` when absent or when the node is not a map. */
  child(node: N, key: string): MaybePromise<N | undefined>;
  /** List element by index, `undefined` when out of range or not a list. */
  element(node: N, index: number): MaybePromise<N | undefined>;
  /** Map entries or list elements in their natural order; empty for scalars and links. */
  children(node: N): MaybePromise<readonly ChildEntry<N>[]>;
  /** Loads the target of a link node. Rejects on storage or network failure. */
  dereference(link: N): Promise<N>;
  /** Scalar payload of a scalar node; `undefined` for maps, lists and links. */
  value(node: N): ScalarValue | undefined;
}

export interface CoveredEntry<N> {
  path: PathSegment[];
  node: N;
}

export interface MatchEntry<N> {
  path: PathSegment[];
  node: N;
  label?: string;
}

export interface TraversalResult<N> {
  covered: CoveredEntry<N>[];
  results: MatchEntry<N>[];
}

export type AccessorErrorPolicy = 'abort' | 'skip';

export interface EvaluateOptions<N> {
  /** Cooperative cancellation, checked before every node visit. */
  signal?: AbortSignal;
  /** Units available to each condition check. Defaults to 256. */
  conditionBudget?: number;
  /** Overall cap on node visits for one evaluation. Unlimited by default. */
  maxVisits?: number;
  /** Defaults to 'abort'. Under 'skip' a failing branch is treated as empty. */
  onAccessorError?: AccessorErrorPolicy;
  /** Dereference links when a selector explores below them. Defaults to true. */
  followLinks?: boolean;
  /** Links dereferenced ahead of the walk. Defaults to 1 (no prefetch). */
  prefetchConcurrency?: number;
  /** Keep covered/result entries in the returned result. Defaults to true. */
  buffer?: boolean;
  onCovered?: (entry: CoveredEntry<N>) => void;
  onMatch?: (entry: MatchEntry<N>) => void;
  /** Called for skipped accessor failures. */
  onError?: (err: AccessorError) => void;
}
