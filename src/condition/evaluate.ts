import type { NodeAccessor, ScalarValue } from '../types.js';
import type { Condition } from './types.js';

/**
 * Thrown by ConditionBudget.consume(); the walker rewraps it as a
 * ResourceLimitError carrying the selector and node paths.
 */
export class ConditionBudgetExceeded extends Error {
  override readonly name = 'ConditionBudgetExceeded';

  constructor(readonly budget: number) {
    super(`Condition budget of ${budget} exhausted`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** One unit per predicate node visited, operands of And/Or/Not included. */
export class ConditionBudget {
  private remaining: number;

  constructor(readonly budget: number) {
    this.remaining = budget;
  }

  get used(): number {
    return this.budget - this.remaining;
  }

  consume(): void {
    if (this.remaining <= 0) {
      throw new ConditionBudgetExceeded(this.budget);
    }
    this.remaining -= 1;
  }
}

function isNumeric(v: ScalarValue | undefined): v is number | bigint {
  return typeof v === 'number' || typeof v === 'bigint';
}

function signOf(diff: number): number | null {
  if (Number.isNaN(diff)) return null;
  return diff < 0 ? -1 : diff > 0 ? 1 : 0;
}

/** -1 / 0 / 1, or null when the two values are not comparable. */
export function compareScalars(a: ScalarValue | undefined, b: ScalarValue): number | null {
  if (isNumeric(a) && isNumeric(b)) {
    if (typeof a === 'bigint' || typeof b === 'bigint') {
      // Mixed bigint/float: fall back to number when either side is fractional
      if (typeof a === 'number' && !Number.isInteger(a)) return signOf(a - Number(b));
      if (typeof b === 'number' && !Number.isInteger(b)) return signOf(Number(a) - b);
      const x = BigInt(a);
      const y = BigInt(b);
      return x < y ? -1 : x > y ? 1 : 0;
    }
    if (Number.isNaN(a) || Number.isNaN(b)) return null;
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return null;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  return a.every((byte, i) => byte === b[i]);
}

export function scalarEquals(a: ScalarValue | undefined, b: ScalarValue): boolean {
  if (a === undefined) return false;
  if (a instanceof Uint8Array || b instanceof Uint8Array) {
    if (!(a instanceof Uint8Array) || !(b instanceof Uint8Array)) return false;
    return bytesEqual(a, b);
  }
  if (isNumeric(a) && isNumeric(b)) {
    return compareScalars(a, b) === 0;
  }
  return a === b;
}

/**
 * Evaluates a condition against one node. Pre-order: the budget is charged
 * before a predicate is inspected, so a condition nested deeper than the
 * budget fails before any leaf is reached.
 */
export async function evaluateCondition<N>(
  condition: Condition,
  node: N,
  accessor: NodeAccessor<N>,
  budget: ConditionBudget,
): Promise<boolean> {
  budget.consume();

  switch (condition.kind) {
    case 'HasField': {
      if (accessor.kind(node) !== 'map') return false;
      const child = await accessor.child(node, condition.field);
      return child !== undefined;
    }
    case 'HasValue':
      return scalarEquals(accessor.value(node), condition.value);
    case 'HasKind':
      return accessor.kind(node) === condition.nodeKind;
    case 'IsLink':
      return accessor.kind(node) === 'link';
    case 'GreaterThan':
      return compareScalars(accessor.value(node), condition.value) === 1;
    case 'LessThan':
      return compareScalars(accessor.value(node), condition.value) === -1;
    case 'And':
      for (const c of condition.conditions) {
        if (!(await evaluateCondition(c, node, accessor, budget))) return false;
      }
      return true;
    case 'Or':
      for (const c of condition.conditions) {
        if (await evaluateCondition(c, node, accessor, budget)) return true;
      }
      return false;
    case 'Not':
      return !(await evaluateCondition(condition.condition, node, accessor, budget));
    default: {
      const unreachable: never = condition;
      throw new Error(`Unknown condition: ${JSON.stringify(unreachable)}`);
    }
  }
}
