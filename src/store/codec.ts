import { createHash } from 'node:crypto';
import { BlockStoreError } from '../errors.js';
import { Link, type DataMap, type DataValue } from './types.js';

export type JsonBlock =
  | null
  | boolean
  | number
  | string
  | JsonBlock[]
  | { [key: string]: JsonBlock };

function isJsonObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Converts a value to its JSON block form. Links become `{"/": cid}`,
 * bytes `{"/": {"bytes": base64}}`, integers beyond the safe range
 * `{"/": {"int": digits}}`. Map keys are sorted.
 */
export function toJsonBlock(value: DataValue): JsonBlock {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new BlockStoreError(`Cannot encode non-finite number ${value}`);
    }
    return value;
  }
  if (typeof value === 'bigint') {
    if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
      return Number(value);
    }
    return { '/': { int: value.toString() } };
  }
  if (value instanceof Uint8Array) {
    return { '/': { bytes: Buffer.from(value).toString('base64') } };
  }
  if (value instanceof Link) {
    return { '/': value.cid };
  }
  if (Array.isArray(value)) {
    return value.map(toJsonBlock);
  }
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  if (entries.length === 1 && entries[0]?.[0] === '/') {
    throw new BlockStoreError('Maps with "/" as their only key are reserved for links and bytes');
  }
  // fromEntries defines own properties, so a "__proto__" key stays a key
  return Object.fromEntries(entries.map(([key, entry]): [string, JsonBlock] => [key, toJsonBlock(entry)]));
}

/** Inverse of toJsonBlock, applied to JSON parsed by JSON.parse or the pg driver. */
export function fromJsonBlock(json: unknown): DataValue {
  if (json === null || typeof json === 'boolean' || typeof json === 'number' || typeof json === 'string') {
    return json;
  }
  if (Array.isArray(json)) {
    return json.map((item: unknown) => fromJsonBlock(item));
  }
  if (!isJsonObject(json)) {
    throw new BlockStoreError(`Unexpected value in block: ${String(json)}`);
  }
  const keys = Object.keys(json);
  if (keys.length === 1 && keys[0] === '/') {
    const inner = json['/'];
    if (typeof inner === 'string') return new Link(inner);
    if (isJsonObject(inner)) {
      const bytes = inner['bytes'];
      const int = inner['int'];
      if (typeof bytes === 'string') return new Uint8Array(Buffer.from(bytes, 'base64'));
      if (typeof int === 'string' && /^-?\d+$/.test(int)) return BigInt(int);
    }
    throw new BlockStoreError('Malformed "/" entry in block');
  }
  const out: DataMap = Object.fromEntries(
    Object.entries(json).map(([key, item]): [string, DataValue] => [key, fromJsonBlock(item)]),
  );
  return out;
}

/** Canonical byte-stable encoding: sorted keys, no whitespace. */
export function encodeBlock(value: DataValue): string {
  return JSON.stringify(toJsonBlock(value));
}

export function decodeBlock(text: string): DataValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new BlockStoreError(`Block is not valid JSON: ${String(err)}`, err);
  }
  return fromJsonBlock(parsed);
}

/** Content identifier of an already encoded block. */
export function cidOfEncoded(encoded: string): string {
  return `sha256-${createHash('sha256').update(encoded).digest('hex')}`;
}

export function cidOf(value: DataValue): string {
  return cidOfEncoded(encodeBlock(value));
}
