import { cidOfEncoded, decodeBlock, encodeBlock } from './codec.js';
import { Link, type BlockStore, type DataValue } from './types.js';

/**
 * In-process block store. Blocks are kept in their canonical encoding, so a
 * value read back is a fresh copy and never aliases what was put.
 */
export class MemoryBlockStore implements BlockStore {
  private readonly blocks = new Map<string, string>();

  get size(): number {
    return this.blocks.size;
  }

  async put(value: DataValue): Promise<Link> {
    const encoded = encodeBlock(value);
    const cid = cidOfEncoded(encoded);
    this.blocks.set(cid, encoded);
    return new Link(cid);
  }

  async get(cid: string): Promise<DataValue | undefined> {
    const encoded = this.blocks.get(cid);
    return encoded === undefined ? undefined : decodeBlock(encoded);
  }

  async has(cid: string): Promise<boolean> {
    return this.blocks.has(cid);
  }
}
