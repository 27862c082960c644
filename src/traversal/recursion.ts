import { StructuralError } from '../errors.js';
import type { ExploreRecursive } from '../selector/types.js';
import { hasReachableEdge } from '../selector/validate.js';
import type { PathSegment } from '../types.js';
import { formatNodePath, formatSelectorPath, type Trail } from './path.js';

/**
 * One active ExploreRecursive iteration. Frames form an immutable stack
 * passed down the walk, so each branch carries its own snapshot.
 */
export interface RecursionFrame {
  readonly selector: ExploreRecursive;
  readonly remainingDepth: number;
  /** Where the ExploreRecursive sits in the selector tree. */
  readonly selectorPath: Trail<string> | null;
  readonly parent: RecursionFrame | null;
}

export type RecursionStack = RecursionFrame | null;

export function pushFrame(
  stack: RecursionStack,
  selector: ExploreRecursive,
  remainingDepth: number,
  selectorPath: Trail<string> | null,
): RecursionFrame {
  return { selector, remainingDepth, selectorPath, parent: stack };
}

/**
 * Edge resolution and lazy structural validation for recursive selectors.
 * A controller can be shared by many evaluations; validation results are
 * remembered per selector instance.
 */
export class RecursionController {
  private readonly validated = new WeakSet<ExploreRecursive>();

  /**
   * Throws StructuralError when `selector.sequence` has no edge of its own.
   * Called right before the first frame for `selector` is pushed.
   */
  validate(
    selector: ExploreRecursive,
    selectorPath: Trail<string> | null,
    nodePath: Trail<PathSegment> | null,
  ): void {
    if (this.validated.has(selector)) return;
    if (!hasReachableEdge(selector.sequence)) {
      throw new StructuralError(
        'ExploreRecursive sequence has no reachable ExploreRecursiveEdge',
        formatSelectorPath(selectorPath),
        formatNodePath(nodePath),
      );
    }
    this.validated.add(selector);
  }

  /** The innermost enclosing frame; StructuralError when there is none. */
  resolveEdge(
    stack: RecursionStack,
    selectorPath: Trail<string> | null,
    nodePath: Trail<PathSegment> | null,
  ): RecursionFrame {
    if (stack === null) {
      throw new StructuralError(
        'ExploreRecursiveEdge outside of any ExploreRecursive',
        formatSelectorPath(selectorPath),
        formatNodePath(nodePath),
      );
    }
    return stack;
  }
}
