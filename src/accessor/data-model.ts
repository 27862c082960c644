import { AccessorError } from '../errors.js';
import { isDataMap, isLink, type BlockSource, type DataValue } from '../store/types.js';
import type { ChildEntry, NodeAccessor, NodeKind, ScalarValue } from '../types.js';

/**
 * NodeAccessor over plain data-model values, loading link targets from a
 * block source (MemoryBlockStore, PostgresBlockStore, or anything with get()).
 *
 * Numbers with an integral value report kind 'int'; encoded blocks do not
 * keep the distinction between 1 and 1.0.
 */
export class DataModelAccessor implements NodeAccessor<DataValue> {
  constructor(private readonly source: BlockSource) {}

  kind(node: DataValue): NodeKind {
    if (node === null) return 'null';
    if (typeof node === 'boolean') return 'bool';
    if (typeof node === 'bigint') return 'int';
    if (typeof node === 'number') return Number.isInteger(node) ? 'int' : 'float';
    if (typeof node === 'string') return 'string';
    if (node instanceof Uint8Array) return 'bytes';
    if (isLink(node)) return 'link';
    if (Array.isArray(node)) return 'list';
    return 'map';
  }

  child(node: DataValue, key: string): DataValue | undefined {
    if (!isDataMap(node) || !Object.prototype.hasOwnProperty.call(node, key)) return undefined;
    return node[key];
  }

  element(node: DataValue, index: number): DataValue | undefined {
    if (!Array.isArray(node) || index < 0 || index >= node.length) return undefined;
    return node[index];
  }

  children(node: DataValue): ChildEntry<DataValue>[] {
    if (Array.isArray(node)) {
      return node.map((child, index) => ({ key: index, node: child }));
    }
    if (isDataMap(node)) {
      return Object.entries(node).map(([key, child]) => ({ key, node: child }));
    }
    return [];
  }

  async dereference(link: DataValue): Promise<DataValue> {
    if (!isLink(link)) {
      throw new AccessorError(`Cannot dereference a ${this.kind(link)} node`);
    }
    const target = await this.source.get(link.cid);
    if (target === undefined) {
      throw new AccessorError(`Block ${link.cid} not found`);
    }
    return target;
  }

  value(node: DataValue): ScalarValue | undefined {
    if (
      node === null ||
      typeof node === 'boolean' ||
      typeof node === 'number' ||
      typeof node === 'bigint' ||
      typeof node === 'string' ||
      node instanceof Uint8Array
    ) {
      return node;
    }
    return undefined;
  }
}
