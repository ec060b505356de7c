import { Pool } from 'pg';

import { ConfigurationError } from '../analytics/errors.js';

import type { EventSource, RawEventTable } from './types.js';

/**
 * The slice of a SQL client the warehouse source needs
 */
export interface SqlQueryable {
  query(text: string): Promise<{
    readonly fields: readonly { readonly name: string }[];
    readonly rows: readonly Record<string, unknown>[];
  }>;
  end?(): Promise<void>;
}

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_$]*$/;

/**
 * Quote a possibly schema-qualified table name. Only plain identifiers are
 * accepted since the name is interpolated into SQL.
 */
export function quoteTableName(table: string): string {
  const parts = table.split('.');
  if (parts.length > 3 || parts.some((part) => !IDENTIFIER_PATTERN.test(part))) {
    throw new ConfigurationError(`Invalid analytics table name: ${table}`, { table });
  }
  return parts.map((part) => `"${part}"`).join('.');
}

/**
 * Warehouse table of pre-aggregated failure events, read in full.
 */
export class WarehouseEventSource implements EventSource {
  readonly id: string;
  private readonly sql: string;

  constructor(
    private readonly client: SqlQueryable,
    table: string,
    location = 'warehouse'
  ) {
    this.sql = `SELECT * FROM ${quoteTableName(table)}`;
    this.id = `warehouse:${location}/${table}`;
  }

  static fromUrl(databaseUrl: string, table: string): WarehouseEventSource {
    let location: string;
    try {
      const url = new URL(databaseUrl);
      location = `${url.host}${url.pathname}`;
    } catch {
      throw new ConfigurationError('ANALYTICS_DATABASE_URL is not a valid URL');
    }

    const pool = new Pool({ connectionString: databaseUrl });
    const client: SqlQueryable = {
      query: async (text) => {
        const result = await pool.query<Record<string, unknown>>(text);
        return { fields: result.fields, rows: result.rows };
      },
      end: () => pool.end(),
    };
    return new WarehouseEventSource(client, table, location);
  }

  async readTable(): Promise<RawEventTable> {
    const result = await this.client.query(this.sql);
    return {
      columns: result.fields.map((field) => field.name.toLowerCase()),
      rows: result.rows,
    };
  }

  async close(): Promise<void> {
    await this.client.end?.();
  }
}
