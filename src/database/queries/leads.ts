import type { QueryFn } from '../utils/connection.js';

/** Anything that can hand back the raw (email, created_at) rows of the lead table. */
export interface LeadSource {
  selectLeadRows(): Promise<unknown>;
}

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function quoteTableName(table: string): string {
  const parts = table.split('.');
  if (parts.length > 2 || !parts.every((p) => IDENTIFIER_RE.test(p))) {
    throw new Error(`Invalid leads table name: ${table}`);
  }
  return parts.map((p) => `"${p}"`).join('.');
}

export function leadRowsSql(table: string): string {
  // ::text keeps node-pg from reading naive timestamps in local time
  return `SELECT email, created_at::text AS created_at FROM ${quoteTableName(table)}`;
}

export function createLeadSource(query: QueryFn, table: string): LeadSource {
  const sql = leadRowsSql(table);
  return {
    async selectLeadRows() {
      const result = await query(sql);
      return result.rows;
    },
  };
}
