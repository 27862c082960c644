import type { AccessorError } from '../errors.js';
import type { AccessorErrorPolicy, CoveredEntry, EvaluateOptions, MatchEntry } from '../types.js';

export const DEFAULT_CONDITION_BUDGET = 256;

/** Internal: options with defaults applied */
export interface ResolvedOptions<N> {
  signal: AbortSignal | undefined;
  conditionBudget: number;
  maxVisits: number;
  onAccessorError: AccessorErrorPolicy;
  followLinks: boolean;
  prefetchConcurrency: number;
  buffer: boolean;
  onCovered?: (entry: CoveredEntry<N>) => void;
  onMatch?: (entry: MatchEntry<N>) => void;
  onError: (err: AccessorError) => void;
}

function defaultOnError(err: AccessorError): void {
  console.warn(`[selector-walk] skipped branch at /${err.nodePath}: ${err.message}`);
}

function assertCount(value: number, name: string, min: number): void {
  const ok = value === Infinity || (Number.isSafeInteger(value) && value >= min);
  if (!ok) {
    throw new Error(`resolveOptions: ${name} must be an integer >= ${min}, got ${value}`);
  }
}

/**
 * Applies defaults and validates numeric options. Later sources win, so a
 * walker's defaults can be overridden per evaluation.
 */
export function resolveOptions<N>(...sources: EvaluateOptions<N>[]): ResolvedOptions<N> {
  const merged = sources.reduce<EvaluateOptions<N>>((acc, s) => ({ ...acc, ...s }), {});

  const resolved: ResolvedOptions<N> = {
    signal: merged.signal,
    conditionBudget: merged.conditionBudget ?? DEFAULT_CONDITION_BUDGET,
    maxVisits: merged.maxVisits ?? Infinity,
    onAccessorError: merged.onAccessorError ?? 'abort',
    followLinks: merged.followLinks ?? true,
    prefetchConcurrency: merged.prefetchConcurrency ?? 1,
    buffer: merged.buffer ?? true,
    onError: merged.onError ?? defaultOnError,
  };
  if (merged.onCovered !== undefined) resolved.onCovered = merged.onCovered;
  if (merged.onMatch !== undefined) resolved.onMatch = merged.onMatch;

  assertCount(resolved.conditionBudget, 'conditionBudget', 0);
  assertCount(resolved.maxVisits, 'maxVisits', 0);
  if (resolved.prefetchConcurrency === Infinity) {
    throw new Error('resolveOptions: prefetchConcurrency must be finite');
  }
  assertCount(resolved.prefetchConcurrency, 'prefetchConcurrency', 1);
  return resolved;
}
