import type { Condition } from '../condition/types.js';
import type { NodeKind, ScalarValue } from '../types.js';
import type {
  ExploreAll,
  ExploreConditional,
  ExploreFields,
  ExploreIndex,
  ExploreRange,
  ExploreRecursive,
  ExploreRecursiveEdge,
  ExploreUnion,
  FieldEntry,
  Matcher,
  Selector,
} from './types.js';
import { assertIndex, assertRange } from './validate.js';

/**
 * Immutable ExploreFields builder. Every field() returns a new builder;
 * existing instances are never mutated, so a partially built selector can
 * be shared and extended in different directions.
 */
export class FieldsBuilder implements ExploreFields {
  readonly kind = 'ExploreFields';

  constructor(readonly fields: readonly FieldEntry[] = []) {}

  /** Append a sub-selector for one map key; an existing key keeps its position. */
  field(key: string, next: Selector): FieldsBuilder {
    const at = this.fields.findIndex(([k]) => k === key);
    if (at === -1) {
      return new FieldsBuilder([...this.fields, [key, next]]);
    }
    return new FieldsBuilder(this.fields.map((entry, i): FieldEntry => (i === at ? [key, next] : entry)));
  }
}

export interface RecursiveOptions {
  sequence: Selector;
  maxDepth: number;
  stopAt?: Condition;
}

/**
 * Entry point for selector construction.
 *
 * @example
 * select.recursive({
 *   maxDepth: 5,
 *   sequence: select.fields()
 *     .field('name', select.matcher({ label: 'name' }))
 *     .field('parent', select.edge()),
 * })
 */
export const select = {
  matcher(options: { label?: string; onlyIf?: Condition } = {}): Matcher {
    return {
      kind: 'Matcher',
      ...(options.label !== undefined ? { label: options.label } : {}),
      ...(options.onlyIf !== undefined ? { onlyIf: options.onlyIf } : {}),
    };
  },
  all(next: Selector): ExploreAll {
    return { kind: 'ExploreAll', next };
  },
  fields(): FieldsBuilder {
    return new FieldsBuilder();
  },
  index(index: number, next: Selector): ExploreIndex {
    assertIndex(index, 'ExploreIndex index');
    return { kind: 'ExploreIndex', index, next };
  },
  range(start: number, end: number, next: Selector): ExploreRange {
    assertRange(start, end);
    return { kind: 'ExploreRange', start, end, next };
  },
  recursive(options: RecursiveOptions): ExploreRecursive {
    assertIndex(options.maxDepth, 'ExploreRecursive maxDepth');
    return {
      kind: 'ExploreRecursive',
      sequence: options.sequence,
      maxDepth: options.maxDepth,
      ...(options.stopAt !== undefined ? { stopAt: options.stopAt } : {}),
    };
  },
  edge(): ExploreRecursiveEdge {
    return { kind: 'ExploreRecursiveEdge' };
  },
  union(...members: Selector[]): ExploreUnion {
    return { kind: 'ExploreUnion', members };
  },
  conditional(condition: Condition, next: Selector): ExploreConditional {
    return { kind: 'ExploreConditional', condition, next };
  },
};

/** Condition constructors. */
export const where = {
  hasField(field: string): Condition {
    return { kind: 'HasField', field };
  },
  hasValue(value: ScalarValue): Condition {
    return { kind: 'HasValue', value };
  },
  hasKind(nodeKind: NodeKind): Condition {
    return { kind: 'HasKind', nodeKind };
  },
  isLink(): Condition {
    return { kind: 'IsLink' };
  },
  greaterThan(value: ScalarValue): Condition {
    return { kind: 'GreaterThan', value };
  },
  lessThan(value: ScalarValue): Condition {
    return { kind: 'LessThan', value };
  },
  and(...conditions: Condition[]): Condition {
    return { kind: 'And', conditions };
  },
  or(...conditions: Condition[]): Condition {
    return { kind: 'Or', conditions };
  },
  not(condition: Condition): Condition {
    return { kind: 'Not', condition };
  },
};
