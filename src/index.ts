export { SelectorWalker, evaluate } from './traversal/walker.js';
export { select, where, FieldsBuilder } from './selector/builder.js';
export type { RecursiveOptions } from './selector/builder.js';
export { encodeSelector, decodeSelector, encodeCondition, decodeCondition } from './selector/codec.js';
export type { JsonValue } from './selector/codec.js';
export { canonicalSelectorKey } from './selector/validate.js';
export type {
  Selector,
  SelectorKind,
  Matcher,
  ExploreAll,
  ExploreFields,
  FieldEntry,
  ExploreIndex,
  ExploreRange,
  ExploreRecursive,
  ExploreRecursiveEdge,
  ExploreUnion,
  ExploreConditional,
} from './selector/types.js';
export type { Condition, ConditionKind } from './condition/types.js';
export type {
  NodeKind,
  ScalarKind,
  ScalarValue,
  PathSegment,
  MaybePromise,
  ChildEntry,
  NodeAccessor,
  CoveredEntry,
  MatchEntry,
  TraversalResult,
  AccessorErrorPolicy,
  EvaluateOptions,
} from './types.js';
export { DataModelAccessor } from './accessor/data-model.js';
export {
  StructuralError,
  ResourceLimitError,
  AccessorError,
  TraversalAbortedError,
  SelectorDefinitionError,
  BlockStoreError,
} from './errors.js';
export type { ResourceLimit } from './errors.js';
