import type { NodeKind, ScalarValue } from '../types.js';

export type Condition =
  | { kind: 'HasField'; field: string }
  | { kind: 'HasValue'; value: ScalarValue }
  | { kind: 'HasKind'; nodeKind: NodeKind }
  | { kind: 'IsLink' }
  | { kind: 'GreaterThan'; value: ScalarValue }
  | { kind: 'LessThan'; value: ScalarValue }
  | { kind: 'And'; conditions: readonly Condition[] }
  | { kind: 'Or'; conditions: readonly Condition[] }
  | { kind: 'Not'; condition: Condition };

export type ConditionKind = Condition['kind'];
