import { ConditionBudget, ConditionBudgetExceeded, evaluateCondition } from '../condition/evaluate.js';
import type { Condition } from '../condition/types.js';
import {
  AccessorError,
  ResourceLimitError,
  StructuralError,
  TraversalAbortedError,
} from '../errors.js';
import type { ExploreRecursive, Selector } from '../selector/types.js';
import type {
  ChildEntry,
  EvaluateOptions,
  NodeAccessor,
  PathSegment,
  TraversalResult,
} from '../types.js';
import { ResultCollector } from './collector.js';
import { resolveOptions, type ResolvedOptions } from './options.js';
import { extend, formatNodePath, formatSelectorPath, toArray, type Trail } from './path.js';
import { LinkPrefetcher } from './prefetch.js';
import { pushFrame, RecursionController, type RecursionStack } from './recursion.js';

type NodeTrail = Trail<PathSegment> | null;
type SelectorTrail = Trail<string> | null;

/** Marks a branch dropped under the 'skip' accessor-error policy. */
const SKIP = Symbol('skip');
type Skip = typeof SKIP;

function selectorStep(selector: Selector): string {
  return selector.kind;
}

function isTraversalError(err: unknown): boolean {
  return (
    err instanceof StructuralError ||
    err instanceof ResourceLimitError ||
    err instanceof TraversalAbortedError
  );
}

/**
 * State for one evaluate() call: collector, budgets and prefetcher. The
 * recursion stack is not here; it travels with each visit.
 */
class WalkRun<N> {
  readonly collector: ResultCollector<N>;
  private readonly prefetcher: LinkPrefetcher<N>;
  private visits = 0;

  constructor(
    private readonly accessor: NodeAccessor<N>,
    private readonly config: ResolvedOptions<N>,
    private readonly recursion: RecursionController,
  ) {
    this.collector = new ResultCollector<N>({
      buffer: config.buffer,
      ...(config.onCovered !== undefined ? { onCovered: config.onCovered } : {}),
      ...(config.onMatch !== undefined ? { onMatch: config.onMatch } : {}),
    });
    this.prefetcher = new LinkPrefetcher(accessor, config.prefetchConcurrency);
  }

  async visit(
    selector: Selector,
    node: N,
    path: NodeTrail,
    parentSelectorPath: SelectorTrail,
    stack: RecursionStack,
  ): Promise<void> {
    const here = extend(parentSelectorPath, selectorStep(selector));
    this.enter(here, path);
    const segments = toArray(path);
    this.collector.cover(segments, node);

    switch (selector.kind) {
      case 'Matcher': {
        if (selector.onlyIf === undefined || (await this.check(selector.onlyIf, node, here, path))) {
          this.collector.match(segments, node, selector.label);
        }
        return;
      }

      case 'ExploreAll': {
        const target = await this.descendable(node, here, path);
        if (target === SKIP) return;
        const entries = await this.guard(() => this.accessor.children(target), here, path);
        if (entries === SKIP) return;
        await this.visitEntries(selector.next, entries, path, here, stack);
        return;
      }

      case 'ExploreFields': {
        const target = await this.descendable(node, here, path);
        if (target === SKIP || this.accessor.kind(target) !== 'map') return;
        for (const [key, next] of selector.fields) {
          const child = await this.guard(() => this.accessor.child(target, key), here, path);
          if (child === SKIP || child === undefined) continue;
          await this.visit(next, child, extend(path, key), extend(here, JSON.stringify(key)), stack);
        }
        return;
      }

      case 'ExploreIndex': {
        const target = await this.descendable(node, here, path);
        if (target === SKIP || this.accessor.kind(target) !== 'list') return;
        const index = selector.index;
        const child = await this.guard(() => this.accessor.element(target, index), here, path);
        if (child === SKIP || child === undefined) return;
        await this.visit(selector.next, child, extend(path, index), here, stack);
        return;
      }

      case 'ExploreRange': {
        const target = await this.descendable(node, here, path);
        if (target === SKIP || this.accessor.kind(target) !== 'list') return;
        for (let i = selector.start; i < selector.end; i++) {
          const index = i;
          const child = await this.guard(() => this.accessor.element(target, index), here, path);
          if (child === SKIP) continue;
          // Indices are contiguous: once one is out of range, so is every later one
          if (child === undefined) return;
          await this.visit(selector.next, child, extend(path, index), here, stack);
        }
        return;
      }

      case 'ExploreUnion': {
        let i = 0;
        for (const member of selector.members) {
          await this.visit(member, node, path, extend(here, String(i)), stack);
          i++;
        }
        return;
      }

      case 'ExploreConditional': {
        if (await this.check(selector.condition, node, here, path)) {
          await this.visit(selector.next, node, path, here, stack);
        }
        return;
      }

      case 'ExploreRecursive':
        await this.iterate(selector, selector.maxDepth, node, path, here, stack);
        return;

      case 'ExploreRecursiveEdge': {
        const frame = this.recursion.resolveEdge(stack, here, path);
        await this.iterate(
          frame.selector,
          frame.remainingDepth - 1,
          node,
          path,
          frame.selectorPath,
          frame.parent,
        );
        return;
      }

      default: {
        const unreachable: never = selector;
        throw new Error(`Unknown selector: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /** Drops prefetches the walk never reached and cancels queued ones. */
  close(): void {
    this.prefetcher.close();
  }

  /**
   * One loop iteration of an ExploreRecursive. `outer` is the stack outside
   * this selector's frame: an edge re-entering the loop replaces the frame
   * instead of stacking a new one on top of it.
   */
  private async iterate(
    selector: ExploreRecursive,
    remainingDepth: number,
    node: N,
    path: NodeTrail,
    selectorPath: SelectorTrail,
    outer: RecursionStack,
  ): Promise<void> {
    if (remainingDepth <= 0) return;
    if (selector.stopAt !== undefined && (await this.check(selector.stopAt, node, selectorPath, path))) {
      return;
    }
    this.recursion.validate(selector, selectorPath, path);
    const frame = pushFrame(outer, selector, remainingDepth, selectorPath);
    await this.visit(selector.sequence, node, path, selectorPath, frame);
  }

  private async visitEntries(
    next: Selector,
    entries: readonly ChildEntry<N>[],
    path: NodeTrail,
    here: SelectorTrail,
    stack: RecursionStack,
  ): Promise<void> {
    const prefetch = this.config.prefetchConcurrency > 1 && this.config.followLinks && next.kind !== 'Matcher';
    for (let i = 0; i < entries.length; i++) {
      const entry = entries[i];
      if (entry === undefined) continue;
      if (prefetch) this.prefetcher.ahead(entries, i);
      await this.visit(next, entry.node, extend(path, entry.key), here, stack);
    }
  }

  /** Cancellation and visit-budget checks, run before every node visit. */
  private enter(here: SelectorTrail, path: NodeTrail): void {
    const signal = this.config.signal;
    if (signal?.aborted) {
      throw new TraversalAbortedError(formatSelectorPath(here), formatNodePath(path), signal.reason);
    }
    this.visits += 1;
    if (this.visits > this.config.maxVisits) {
      throw new ResourceLimitError('visits', this.config.maxVisits, formatSelectorPath(here), formatNodePath(path));
    }
  }

  /** The node whose children an explore step enumerates: links are loaded first. */
  private async descendable(node: N, here: SelectorTrail, path: NodeTrail): Promise<N | Skip> {
    if (this.accessor.kind(node) !== 'link') return node;
    if (!this.config.followLinks) return SKIP;
    return this.guard(() => this.prefetcher.resolve(node), here, path);
  }

  private async check(
    condition: Condition,
    node: N,
    here: SelectorTrail,
    path: NodeTrail,
  ): Promise<boolean> {
    const budget = new ConditionBudget(this.config.conditionBudget);
    try {
      return await evaluateCondition(condition, node, this.accessor, budget);
    } catch (err) {
      if (err instanceof ConditionBudgetExceeded) {
        throw new ResourceLimitError('condition', err.budget, formatSelectorPath(here), formatNodePath(path));
      }
      this.accessorFailure(err, here, path);
      return false;
    }
  }

  private async guard<T>(
    op: () => T | Promise<T>,
    here: SelectorTrail,
    path: NodeTrail,
  ): Promise<T | Skip> {
    try {
      return await op();
    } catch (err) {
      this.accessorFailure(err, here, path);
      return SKIP;
    }
  }

  /** Rethrows under 'abort'; reports and returns under 'skip'. */
  private accessorFailure(err: unknown, here: SelectorTrail, path: NodeTrail): void {
    if (isTraversalError(err)) throw err;
    const selectorPath = formatSelectorPath(here);
    const nodePath = formatNodePath(path);
    const detail = err instanceof Error ? err.message : String(err);
    const wrapped = new AccessorError(`Node access failed at /${nodePath}: ${detail}`, err, selectorPath, nodePath);
    if (this.config.onAccessorError === 'abort') throw wrapped;
    this.config.onError(wrapped);
  }
}

/**
 * Walks data trees reachable through `accessor` under a selector.
 *
 * A walker is reusable and holds no per-evaluation state besides the
 * memoised structural checks of the recursive selectors it has seen.
 *
 * @example
 * const walker = new SelectorWalker(new DataModelAccessor(store));
 * const { covered, results } = await walker.evaluate(
 *   select.fields().field('name', select.matcher()),
 *   root,
 * );
 */
export class SelectorWalker<N> {
  private readonly recursion = new RecursionController();

  constructor(
    private readonly accessor: NodeAccessor<N>,
    private readonly defaults: EvaluateOptions<N> = {},
  ) {
    // Fail at construction on invalid defaults rather than on first use
    resolveOptions(defaults);
  }

  async evaluate(selector: Selector, root: N, options: EvaluateOptions<N> = {}): Promise<TraversalResult<N>> {
    const config = resolveOptions(this.defaults, options);
    const run = new WalkRun(this.accessor, config, this.recursion);
    try {
      await run.visit(selector, root, null, null, null);
    } finally {
      run.close();
    }
    return run.collector.toResult();
  }
}

/** One-shot form of `new SelectorWalker(accessor).evaluate(selector, root, options)`. */
export async function evaluate<N>(
  selector: Selector,
  root: N,
  accessor: NodeAccessor<N>,
  options: EvaluateOptions<N> = {},
): Promise<TraversalResult<N>> {
  return new SelectorWalker(accessor).evaluate(selector, root, options);
}
