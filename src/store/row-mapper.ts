import type { Document, IndexEntry, ResultTuple } from '../types.js';

// Type aliases rather than interfaces so they satisfy pg's QueryResultRow
export type ObjectRow = {
  key: string;
  value: Document; // pg auto-parses JSONB
};

export type IndexRow = {
  key: string;
};

export function mapObjectRow(row: ObjectRow): ResultTuple {
  return [row.key, row.value];
}

export function mapIndexRow(row: IndexRow): IndexEntry {
  return { key: row.key };
}
