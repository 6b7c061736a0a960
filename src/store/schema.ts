import type pg from 'pg';

export const DDL_CREATE_OBJECTS_TABLE = `
CREATE TABLE IF NOT EXISTS kv_objects (
  bucket  VARCHAR(255)  NOT NULL,
  key     VARCHAR(1024) NOT NULL,
  value   JSONB         NOT NULL,
  PRIMARY KEY (bucket, key)
)
`.trim();

export const DDL_CREATE_INDEXES_TABLE = `
CREATE TABLE IF NOT EXISTS kv_secondary_indexes (
  bucket      VARCHAR(255)  NOT NULL,
  key         VARCHAR(1024) NOT NULL,
  index_name  VARCHAR(255)  NOT NULL,
  int_value   NUMERIC,
  bin_value   TEXT,
  FOREIGN KEY (bucket, key) REFERENCES kv_objects (bucket, key) ON DELETE CASCADE
)
`.trim();

export const DDL_CREATE_INT_INDEX = `
CREATE INDEX IF NOT EXISTS idx_kv_secondary_int
  ON kv_secondary_indexes (bucket, index_name, int_value)
  WHERE int_value IS NOT NULL
`.trim();

export const DDL_CREATE_BIN_INDEX = `
CREATE INDEX IF NOT EXISTS idx_kv_secondary_bin
  ON kv_secondary_indexes (bucket, index_name, bin_value)
  WHERE bin_value IS NOT NULL
`.trim();

export const DDL_CREATE_OWNER_INDEX = `
CREATE INDEX IF NOT EXISTS idx_kv_secondary_owner
  ON kv_secondary_indexes (bucket, key)
`.trim();

export async function applySchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_OBJECTS_TABLE);
  await client.query(DDL_CREATE_INDEXES_TABLE);
  await client.query(DDL_CREATE_INT_INDEX);
  await client.query(DDL_CREATE_BIN_INDEX);
  await client.query(DDL_CREATE_OWNER_INDEX);
}
