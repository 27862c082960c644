import { fromJsonBlock } from './codec.js';
import type { StoredBlock } from './types.js';

export interface BlockRow {
  cid: string;
  data: unknown;          // pg auto-parses JSONB
  created_at: Date | null; // pg auto-parses TIMESTAMPTZ
}

export function mapRow(row: BlockRow): StoredBlock {
  return {
    cid: row.cid,
    value: fromJsonBlock(row.data),
    createdAt: row.created_at,
  };
}
