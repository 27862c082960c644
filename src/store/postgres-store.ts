import pg from 'pg';
import { BlockStoreError } from '../errors.js';
import { cidOf, cidOfEncoded, encodeBlock } from './codec.js';
import { mapRow, type BlockRow } from './row-mapper.js';
import { applySchema } from './schema.js';
import { Link, type BlockStore, type DataValue, type StoredBlock } from './types.js';

export interface BlockStoreConfig {
  pool: pg.Pool;
  /** Recompute the cid of every loaded block and reject mismatches. Defaults to false. */
  verify?: boolean;
}

export class PostgresBlockStore implements BlockStore {
  private readonly pool: pg.Pool;
  private readonly verify: boolean;

  constructor(config: BlockStoreConfig) {
    this.pool = config.pool;
    this.verify = config.verify ?? false;
  }

  async initializeSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await applySchema(client);
    } finally {
      client.release();
    }
  }

  async put(value: DataValue): Promise<Link> {
    const encoded = encodeBlock(value);
    const cid = cidOfEncoded(encoded);
    try {
      await this.pool.query(
        'INSERT INTO blocks (cid, data) VALUES ($1, $2::jsonb) ON CONFLICT (cid) DO NOTHING',
        [cid, encoded],
      );
    } catch (err) {
      throw new BlockStoreError(`Failed to store block ${cid}: ${String(err)}`, err);
    }
    return new Link(cid);
  }

  /** Stores several blocks in one transaction. Links come back in input order. */
  async putMany(values: DataValue[]): Promise<Link[]> {
    const encoded = values.map((v) => encodeBlock(v));
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const links: Link[] = [];
      for (const text of encoded) {
        const cid = cidOfEncoded(text);
        try {
          await client.query(
            'INSERT INTO blocks (cid, data) VALUES ($1, $2::jsonb) ON CONFLICT (cid) DO NOTHING',
            [cid, text],
          );
        } catch (err) {
          await client.query('ROLLBACK');
          throw new BlockStoreError(`Failed to store block ${cid}: ${String(err)}`, err);
        }
        links.push(new Link(cid));
      }
      await client.query('COMMIT');
      return links;
    } catch (err) {
      if (!(err instanceof BlockStoreError)) {
        await client.query('ROLLBACK').catch(() => undefined);
        throw new BlockStoreError(`Failed to store blocks: ${String(err)}`, err);
      }
      throw err;
    } finally {
      client.release();
    }
  }

  async load(cid: string): Promise<StoredBlock | undefined> {
    let result: pg.QueryResult<BlockRow>;
    try {
      result = await this.pool.query<BlockRow>(
        'SELECT cid, data, created_at FROM blocks WHERE cid = $1',
        [cid],
      );
    } catch (err) {
      throw new BlockStoreError(`Failed to load block ${cid}: ${String(err)}`, err);
    }
    const row = result.rows[0];
    if (row === undefined) return undefined;
    const block = mapRow(row);
    if (this.verify) {
      const actual = cidOf(block.value);
      if (actual !== cid) {
        throw new BlockStoreError(`Block ${cid} failed verification: content hashes to ${actual}`);
      }
    }
    return block;
  }

  async get(cid: string): Promise<DataValue | undefined> {
    const block = await this.load(cid);
    return block?.value;
  }

  async has(cid: string): Promise<boolean> {
    let result: pg.QueryResult;
    try {
      result = await this.pool.query('SELECT 1 FROM blocks WHERE cid = $1', [cid]);
    } catch (err) {
      throw new BlockStoreError(`Failed to check block ${cid}: ${String(err)}`, err);
    }
    return (result.rowCount ?? 0) > 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
