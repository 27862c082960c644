import type { Condition } from '../condition/types.js';
import { SelectorDefinitionError } from '../errors.js';
import type { NodeKind, ScalarValue } from '../types.js';
import type { FieldEntry, Selector } from './types.js';
import { assertIndex, assertRange } from './validate.js';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

const NODE_KINDS: readonly NodeKind[] = ['map', 'list', 'link', 'null', 'bool', 'int', 'float', 'string', 'bytes'];

function isNodeKind(v: unknown): v is NodeKind {
  return NODE_KINDS.some((k) => k === v);
}

/** Keys that JS objects enumerate before all others, whatever their insertion order. */
function isArrayIndex(key: string): boolean {
  return /^(0|[1-9]\d*)$/.test(key) && Number(key) < 2 ** 32 - 1;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v) && !(v instanceof Uint8Array);
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

function encodeScalar(value: ScalarValue): JsonValue {
  if (value instanceof Uint8Array) {
    return { '/': { bytes: Buffer.from(value).toString('base64') } };
  }
  if (typeof value === 'bigint') {
    return { '/': { int: value.toString() } };
  }
  return value;
}

export function encodeCondition(condition: Condition): JsonValue {
  switch (condition.kind) {
    case 'HasField':
      return { hasField: condition.field };
    case 'HasValue':
      return { hasValue: encodeScalar(condition.value) };
    case 'HasKind':
      return { hasKind: condition.nodeKind };
    case 'IsLink':
      return { isLink: {} };
    case 'GreaterThan':
      return { greaterThan: encodeScalar(condition.value) };
    case 'LessThan':
      return { lessThan: encodeScalar(condition.value) };
    case 'And':
      return { and: condition.conditions.map(encodeCondition) };
    case 'Or':
      return { or: condition.conditions.map(encodeCondition) };
    case 'Not':
      return { not: encodeCondition(condition.condition) };
  }
}

/**
 * Encodes a selector into its compact single-key JSON form, e.g.
 * `{ "a": { ">": { ".": {} } } }` for "match every child".
 */
export function encodeSelector(selector: Selector): JsonValue {
  switch (selector.kind) {
    case 'Matcher': {
      const body: { [key: string]: JsonValue } = {};
      if (selector.label !== undefined) body['label'] = selector.label;
      if (selector.onlyIf !== undefined) body['onlyIf'] = encodeCondition(selector.onlyIf);
      return { '.': body };
    }
    case 'ExploreAll':
      return { a: { '>': encodeSelector(selector.next) } };
    case 'ExploreFields': {
      const entries = selector.fields.map(([key, sub]): [string, JsonValue] => [key, encodeSelector(sub)]);
      // An object cannot keep integer-like keys in place; fall back to a list of pairs
      if (entries.some(([key]) => isArrayIndex(key))) {
        return { f: { 'f>': entries } };
      }
      return { f: { 'f>': Object.fromEntries(entries) } };
    }
    case 'ExploreIndex':
      return { i: { i: selector.index, '>': encodeSelector(selector.next) } };
    case 'ExploreRange':
      return { r: { '^': selector.start, $: selector.end, '>': encodeSelector(selector.next) } };
    case 'ExploreRecursive': {
      const body: { [key: string]: JsonValue } = {
        l: { depth: selector.maxDepth },
        ':>': encodeSelector(selector.sequence),
      };
      if (selector.stopAt !== undefined) body['!'] = encodeCondition(selector.stopAt);
      return { R: body };
    }
    case 'ExploreRecursiveEdge':
      return { '@': {} };
    case 'ExploreUnion':
      return { '|': selector.members.map(encodeSelector) };
    case 'ExploreConditional':
      return { '&': { '&': encodeCondition(selector.condition), '>': encodeSelector(selector.next) } };
  }
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function singleKey(json: unknown, at: string, what: string): [string, unknown] {
  if (!isObject(json)) {
    throw new SelectorDefinitionError(`${what} must be an object`, at);
  }
  const entries = Object.entries(json);
  const first = entries[0];
  if (entries.length !== 1 || first === undefined) {
    throw new SelectorDefinitionError(`${what} must have exactly one key, got ${entries.length}`, at);
  }
  return first;
}

function body(json: unknown, at: string, what: string): Record<string, unknown> {
  if (!isObject(json)) {
    throw new SelectorDefinitionError(`${what} body must be an object`, at);
  }
  return json;
}

function integer(json: unknown, at: string, what: string): number {
  if (typeof json !== 'number') {
    throw new SelectorDefinitionError(`${what} must be a number`, at);
  }
  assertIndex(json, what, at);
  return json;
}

function decodeScalar(json: unknown, at: string): ScalarValue {
  if (json === null || typeof json === 'boolean' || typeof json === 'number' || typeof json === 'string') {
    return json;
  }
  const inner = isObject(json) ? json['/'] : undefined;
  if (isObject(inner)) {
    const bytes = inner['bytes'];
    const int = inner['int'];
    if (typeof bytes === 'string') {
      return new Uint8Array(Buffer.from(bytes, 'base64'));
    }
    if (typeof int === 'string' && /^-?\d+$/.test(int)) {
      return BigInt(int);
    }
  }
  throw new SelectorDefinitionError('Condition value must be a scalar', at);
}

/** `f>` is either an object or, where key order matters, a list of `[key, selector]` pairs. */
function fieldEntries(json: unknown, at: string): FieldEntry[] {
  const seen = new Set<string>();
  const entry = (key: string, sub: unknown, where: string): FieldEntry => {
    if (seen.has(key)) {
      throw new SelectorDefinitionError(`Duplicate field "${key}"`, where);
    }
    seen.add(key);
    return [key, decodeSelectorAt(sub, where)];
  };
  if (Array.isArray(json)) {
    return json.map((pair: unknown, i): FieldEntry => {
      const where = `${at}[${i}]`;
      const [key, sub]: unknown[] = Array.isArray(pair) && pair.length === 2 ? pair : [];
      if (typeof key !== 'string') {
        throw new SelectorDefinitionError('ExploreFields entry must be a [key, selector] pair', where);
      }
      return entry(key, sub, `${where}[1]`);
    });
  }
  const raw = body(json, at, 'ExploreFields fields');
  return Object.entries(raw).map(([key, sub]) => entry(key, sub, `${at}.${key}`));
}

function conditionList(json: unknown, at: string, what: string): Condition[] {
  if (!Array.isArray(json)) {
    throw new SelectorDefinitionError(`${what} operands must be an array`, at);
  }
  return json.map((c: unknown, i) => decodeConditionAt(c, `${at}[${i}]`));
}

function decodeConditionAt(json: unknown, at: string): Condition {
  const [key, value] = singleKey(json, at, 'Condition');
  const inner = `${at}.${key}`;
  switch (key) {
    case 'hasField':
      if (typeof value !== 'string') {
        throw new SelectorDefinitionError('hasField must name a field', inner);
      }
      return { kind: 'HasField', field: value };
    case 'hasValue':
      return { kind: 'HasValue', value: decodeScalar(value, inner) };
    case 'hasKind':
      if (!isNodeKind(value)) {
        throw new SelectorDefinitionError(`hasKind must be one of ${NODE_KINDS.join(', ')}`, inner);
      }
      return { kind: 'HasKind', nodeKind: value };
    case 'isLink':
      return { kind: 'IsLink' };
    case 'greaterThan':
      return { kind: 'GreaterThan', value: decodeScalar(value, inner) };
    case 'lessThan':
      return { kind: 'LessThan', value: decodeScalar(value, inner) };
    case 'and':
      return { kind: 'And', conditions: conditionList(value, inner, 'and') };
    case 'or':
      return { kind: 'Or', conditions: conditionList(value, inner, 'or') };
    case 'not':
      return { kind: 'Not', condition: decodeConditionAt(value, inner) };
    default:
      throw new SelectorDefinitionError(`Unknown condition "${key}"`, at);
  }
}

function decodeSelectorAt(json: unknown, at: string): Selector {
  const [key, value] = singleKey(json, at, 'Selector');
  const inner = `${at}.${key}`;
  switch (key) {
    case '.': {
      const b = body(value, inner, 'Matcher');
      const label = b['label'];
      if (label !== undefined && typeof label !== 'string') {
        throw new SelectorDefinitionError('Matcher label must be a string', `${inner}.label`);
      }
      return {
        kind: 'Matcher',
        ...(label !== undefined ? { label } : {}),
        ...(b['onlyIf'] !== undefined ? { onlyIf: decodeConditionAt(b['onlyIf'], `${inner}.onlyIf`) } : {}),
      };
    }
    case 'a': {
      const b = body(value, inner, 'ExploreAll');
      return { kind: 'ExploreAll', next: decodeSelectorAt(b['>'], `${inner}.>`) };
    }
    case 'f': {
      const b = body(value, inner, 'ExploreFields');
      return { kind: 'ExploreFields', fields: fieldEntries(b['f>'], `${inner}.f>`) };
    }
    case 'i': {
      const b = body(value, inner, 'ExploreIndex');
      return {
        kind: 'ExploreIndex',
        index: integer(b['i'], `${inner}.i`, 'ExploreIndex index'),
        next: decodeSelectorAt(b['>'], `${inner}.>`),
      };
    }
    case 'r': {
      const b = body(value, inner, 'ExploreRange');
      const start = integer(b['^'], `${inner}.^`, 'ExploreRange start');
      const end = integer(b['$'], `${inner}.$`, 'ExploreRange end');
      assertRange(start, end, inner);
      return { kind: 'ExploreRange', start, end, next: decodeSelectorAt(b['>'], `${inner}.>`) };
    }
    case 'R': {
      const b = body(value, inner, 'ExploreRecursive');
      const limit = body(b['l'], `${inner}.l`, 'ExploreRecursive limit');
      if (!('depth' in limit)) {
        throw new SelectorDefinitionError('ExploreRecursive limit must be { depth: n }', `${inner}.l`);
      }
      const maxDepth = integer(limit['depth'], `${inner}.l.depth`, 'ExploreRecursive maxDepth');
      return {
        kind: 'ExploreRecursive',
        maxDepth,
        sequence: decodeSelectorAt(b[':>'], `${inner}.:>`),
        ...(b['!'] !== undefined ? { stopAt: decodeConditionAt(b['!'], `${inner}.!`) } : {}),
      };
    }
    case '@':
      return { kind: 'ExploreRecursiveEdge' };
    case '|': {
      if (!Array.isArray(value)) {
        throw new SelectorDefinitionError('ExploreUnion members must be an array', inner);
      }
      return {
        kind: 'ExploreUnion',
        members: value.map((m: unknown, i) => decodeSelectorAt(m, `${inner}[${i}]`)),
      };
    }
    case '&': {
      const b = body(value, inner, 'ExploreConditional');
      return {
        kind: 'ExploreConditional',
        condition: decodeConditionAt(b['&'], `${inner}.&`),
        next: decodeSelectorAt(b['>'], `${inner}.>`),
      };
    }
    default:
      throw new SelectorDefinitionError(`Unknown selector "${key}"`, at);
  }
}

/** Decodes the compact JSON form; `at` in thrown errors is a `$`-rooted path. */
export function decodeSelector(json: unknown): Selector {
  return decodeSelectorAt(json, '$');
}

export function decodeCondition(json: unknown): Condition {
  return decodeConditionAt(json, '$');
}
