import type pg from 'pg';

// Blocks are immutable and only looked up by cid.
export const DDL_CREATE_TABLE = `
CREATE TABLE IF NOT EXISTS blocks (
  cid         TEXT         PRIMARY KEY,
  data        JSONB        NOT NULL,
  created_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
)
`.trim();

export async function applySchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_TABLE);
}
